/**
 * types.ts - Types shared by the health agent and its callers
 *
 * Every agent operation returns a Result: the same payload fields on both
 * branches, plus `status` to dispatch on and `error` on the failure branch.
 * On failure the text field carries "Error <doing something>: <message>" so
 * a caller that only renders text still shows something sensible.
 */

import type { CompletionClient } from "../completion";
import type { ContextItem, KnowledgeBase } from "../knowledge";
import type { SearchResult, VectorDocument } from "../vectorstore";

export type Result<T> =
  | (T & { status: "success" })
  | (T & { status: "error"; error: string });

/**
 * One turn of a conversation. Roles other than "user" and "assistant"
 * are accepted and dropped when the prompt is built.
 */
export interface ConversationMessage {
  role: string;
  content: string;
}

export interface ContextFields {
  /** Always equal to contextDocuments.length */
  contextUsed: number;
  /** Ad-hoc context first, then retrieved documents in distance order */
  contextDocuments: ContextItem[];
}

export type QueryResult = Result<
  ContextFields & { query: string; response: string; category: string | null }
>;

export type SymptomAssessmentResult = Result<
  ContextFields & { symptoms: string[]; assessment: string }
>;

export type MedicationInfoResult = Result<
  ContextFields & { medication: string; information: string }
>;

export type ConversationResult = Result<ContextFields & { response: string }>;

export type IngestResult = Result<{
  documentsAdded: number;
  documentIds: string[];
  message: string;
}>;

export type KnowledgeStatsResult = Result<{
  totalDocuments: number;
  categories: string[];
  categoryCounts: Record<string, number>;
  collectionName: string;
}>;

export type SearchKnowledgeResult = Result<{
  query: string;
  category: string | null;
  results: SearchResult[];
  count: number;
}>;

export type CategoryListingResult = Result<{
  category: string;
  documents: VectorDocument[];
  count: number;
}>;

export type DeleteDocumentResult = Result<{ id: string; deleted: boolean }>;

export type ClearKnowledgeResult = Result<{
  documentsRemoved: number;
  message: string;
}>;

/** Generation settings and fixed texts, supplied at construction */
export interface AgentSettings {
  temperature: number;
  maxTokens: number;
  /** Appended once to every generated answer */
  disclaimer: string;
  /** Keep only the most recent N conversation messages; unbounded when absent */
  historyLimit?: number;
}

/** Logger surface the agent writes to; console satisfies it */
export type AgentLogger = Pick<Console, "warn" | "error">;

export interface HealthAgentOptions {
  knowledgeBase: KnowledgeBase;
  completion: CompletionClient;
  settings: AgentSettings;
  /** Directory holding the prompt templates; defaults to the repo's prompts/ */
  promptsDir?: string;
  logger?: AgentLogger;
}
