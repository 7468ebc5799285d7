/**
 * schemas.ts - Zod schemas for agent operation inputs
 *
 * Shared by the agent (which turns failures into ValidationError results)
 * and by the HTTP and MCP layers (which reuse the shapes for their own
 * request validation). Defaults live here so every surface agrees on them.
 */

import { z } from "zod";
import { ValidationError } from "../errors";

/** Default number of documents retrieved per request */
export const DEFAULT_SEARCH_LIMIT = 5;

const limit = z
  .number()
  .int("limit must be an integer")
  .positive("limit must be positive")
  .default(DEFAULT_SEARCH_LIMIT);

/** Blank strings mean "not supplied" */
const optionalText = z
  .string()
  .optional()
  .transform((value) => (value !== undefined && value.trim() !== "" ? value : undefined));

/** Ad-hoc context counts whenever it has any characters, whitespace included */
const optionalContext = z
  .string()
  .optional()
  .transform((value) => (value !== undefined && value !== "" ? value : undefined));

const requiredText = (field: string) =>
  z.string().refine((value) => value.trim() !== "", `${field} must not be empty`);

export const processQuerySchema = z.object({
  query: requiredText("query"),
  limit,
  includeContext: z.boolean().default(true),
  category: optionalText,
  userContext: optionalContext,
  includeDisclaimer: z.boolean().default(true),
});

export const assessSymptomsSchema = z.object({
  symptoms: z
    .array(requiredText("symptom"))
    .min(1, "symptoms must contain at least one entry"),
  limit,
});

export const lookupMedicationSchema = z.object({
  medicationName: requiredText("medicationName"),
  limit,
});

export const conversationMessageSchema = z.object({
  role: z.string(),
  content: z.string(),
});

export const converseSchema = z.object({
  messages: z
    .array(conversationMessageSchema)
    .min(1, "messages must contain at least one message"),
  limit,
  userContext: optionalContext,
});

export const documentInputSchema = z.object({
  id: z.string().nullish(),
  text: requiredText("text"),
  metadata: z.record(z.unknown()).optional(),
});

export const ingestSchema = z.array(documentInputSchema);

export const searchKnowledgeSchema = z.object({
  query: z.string(),
  limit,
  category: optionalText,
});

export type ProcessQueryInput = z.input<typeof processQuerySchema>;
export type AssessSymptomsInput = z.input<typeof assessSymptomsSchema>;
export type LookupMedicationInput = z.input<typeof lookupMedicationSchema>;
export type ConverseInput = z.input<typeof converseSchema>;
export type SearchKnowledgeInput = z.input<typeof searchKnowledgeSchema>;

/**
 * Parses input or throws ValidationError with one line per issue,
 * prefixed by the field path.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
