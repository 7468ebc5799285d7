/**
 * health-agent.ts - Retrieval-augmented orchestration of health questions
 *
 * What this file does:
 * HealthAgent is the one object every entry point (CLI, HTTP, MCP) talks to.
 * Each generating operation runs the same pipeline:
 *
 *   validate → search knowledge base → assemble context → render prompt
 *     → complete → append disclaimer → shape result
 *
 * and each knowledge operation is a typed pass-through to the KnowledgeBase.
 *
 * Failure containment:
 * No operation throws. Every failure inside a pipeline becomes a result with
 * `status: "error"`, the error message, and an "Error ..." text in the
 * payload. Counters follow what actually happened: if retrieval failed (or
 * the input never validated) contextUsed is 0; if retrieval worked and only
 * rendering or completion failed, the retrieved context is still reported.
 *
 * The agent keeps no state between calls apart from its collaborators, so a
 * single instance serves concurrent requests.
 */

import {
  TemplateRenderError,
  describeError,
} from "../errors";
import type { CompletionClient, CompletionMessage } from "../completion";
import { UNCATEGORIZED, CATEGORY_KEY } from "../knowledge";
import type { ContextItem, DocumentInput, KnowledgeBase } from "../knowledge";
import type { SearchResult } from "../vectorstore";
import { withOperationTracing, setTraceOutput } from "../tracing/context-bridge";
import { assembleContext } from "./context-assembler";
import { PromptBuilder } from "./prompt-builder";
import {
  DEFAULT_SEARCH_LIMIT,
  assessSymptomsSchema,
  converseSchema,
  ingestSchema,
  lookupMedicationSchema,
  parseInput,
  processQuerySchema,
  searchKnowledgeSchema,
  type AssessSymptomsInput,
  type ConverseInput,
  type LookupMedicationInput,
  type ProcessQueryInput,
  type SearchKnowledgeInput,
} from "./schemas";
import type {
  AgentLogger,
  AgentSettings,
  CategoryListingResult,
  ClearKnowledgeResult,
  ConversationResult,
  DeleteDocumentResult,
  HealthAgentOptions,
  IngestResult,
  KnowledgeStatsResult,
  MedicationInfoResult,
  QueryResult,
  SearchKnowledgeResult,
  SymptomAssessmentResult,
} from "./types";

/** Separator and label placed in front of the disclaimer text */
export const DISCLAIMER_PREFIX = "\n\n⚠️ **Medical Disclaimer**: ";

/** Category every medication lookup is restricted to */
export const MEDICATIONS_CATEGORY = "medications";

/**
 * What a generating operation needs, produced after its input validated.
 * `retrieve` is null when retrieval is skipped.
 */
interface GenerationPlan {
  retrieve: (() => Promise<SearchResult[]>) | null;
  userContext?: string;
  render: (context: ContextItem[]) => CompletionMessage[];
  includeDisclaimer: boolean;
}

type GenerationOutcome =
  | { ok: true; text: string; context: ContextItem[] }
  | { ok: false; message: string; context: ContextItem[] };

type Attempt<T> = { ok: true; value: T } | { ok: false; message: string };

export class HealthAgent {
  private readonly knowledgeBase: KnowledgeBase;
  private readonly completion: CompletionClient;
  private readonly settings: AgentSettings;
  private readonly prompts: PromptBuilder;
  private readonly logger: AgentLogger;

  constructor(options: HealthAgentOptions) {
    this.knowledgeBase = options.knowledgeBase;
    this.completion = options.completion;
    this.settings = options.settings;
    this.logger = options.logger ?? console;
    this.prompts = new PromptBuilder({
      promptsDir: options.promptsDir,
      historyLimit: options.settings.historyLimit,
    });
  }

  get collectionName(): string {
    return this.knowledgeBase.collectionName;
  }

  // -------------------------------------------------------------------------
  // Generating operations
  // -------------------------------------------------------------------------

  /**
   * Answers a free-form question.
   *
   * Retrieval is skipped when includeContext is false; ad-hoc userContext is
   * used either way and always comes first.
   */
  async processQuery(input: ProcessQueryInput): Promise<QueryResult> {
    return withOperationTracing("processQuery", input.query, async (): Promise<QueryResult> => {
      const outcome = await this.generate("processQuery", () => {
        const params = parseInput(processQuerySchema, input);
        return {
          retrieve: params.includeContext
            ? () => this.knowledgeBase.search(params.query, params.limit, params.category)
            : null,
          userContext: params.userContext,
          render: (context) => this.prompts.buildQueryMessages(params.query, context),
          includeDisclaimer: params.includeDisclaimer,
        };
      });

      const base = {
        query: input.query,
        category: blankToNull(input.category),
        ...contextFields(outcome.context),
      };
      if (!outcome.ok) {
        return {
          status: "error",
          ...base,
          response: `Error processing query: ${outcome.message}`,
          error: outcome.message,
        };
      }
      setTraceOutput(outcome.text);
      return { status: "success", ...base, response: outcome.text };
    });
  }

  /**
   * General assessment of a list of symptoms. The symptoms joined by spaces
   * are the retrieval query; no category filter applies.
   */
  async assessSymptoms(input: AssessSymptomsInput): Promise<SymptomAssessmentResult> {
    return withOperationTracing("assessSymptoms", traceLabel(input.symptoms), async (): Promise<SymptomAssessmentResult> => {
      const outcome = await this.generate("assessSymptoms", () => {
        const params = parseInput(assessSymptomsSchema, input);
        return {
          retrieve: () =>
            this.knowledgeBase.search(params.symptoms.join(" "), params.limit),
          render: (context) => this.prompts.buildSymptomMessages(params.symptoms, context),
          includeDisclaimer: true,
        };
      });

      const base = { symptoms: input.symptoms, ...contextFields(outcome.context) };
      if (!outcome.ok) {
        return {
          status: "error",
          ...base,
          assessment: `Error generating assessment: ${outcome.message}`,
          error: outcome.message,
        };
      }
      setTraceOutput(outcome.text);
      return { status: "success", ...base, assessment: outcome.text };
    });
  }

  /** Medication information, retrieved from the medications category only */
  async lookupMedication(input: LookupMedicationInput): Promise<MedicationInfoResult> {
    return withOperationTracing("lookupMedication", input.medicationName, async (): Promise<MedicationInfoResult> => {
      const outcome = await this.generate("lookupMedication", () => {
        const params = parseInput(lookupMedicationSchema, input);
        return {
          retrieve: () =>
            this.knowledgeBase.search(
              params.medicationName,
              params.limit,
              MEDICATIONS_CATEGORY
            ),
          render: (context) =>
            this.prompts.buildMedicationMessages(params.medicationName, context),
          includeDisclaimer: true,
        };
      });

      const base = { medication: input.medicationName, ...contextFields(outcome.context) };
      if (!outcome.ok) {
        return {
          status: "error",
          ...base,
          information: `Error generating medication info: ${outcome.message}`,
          error: outcome.message,
        };
      }
      setTraceOutput(outcome.text);
      return { status: "success", ...base, information: outcome.text };
    });
  }

  /**
   * Next assistant turn of a conversation. The last user message drives
   * retrieval; a history without one skips retrieval.
   */
  async converse(input: ConverseInput): Promise<ConversationResult> {
    const lastUserMessage = Array.isArray(input.messages)
      ? findLastUserMessage(input.messages)
      : undefined;
    return withOperationTracing("converse", lastUserMessage ?? "", async (): Promise<ConversationResult> => {
      const outcome = await this.generate("converse", () => {
        const params = parseInput(converseSchema, input);
        const query = findLastUserMessage(params.messages);
        return {
          retrieve:
            query !== undefined
              ? () => this.knowledgeBase.search(query, params.limit)
              : null,
          userContext: params.userContext,
          render: (context) =>
            this.prompts.buildConversationMessages(params.messages, context),
          includeDisclaimer: true,
        };
      });

      const base = contextFields(outcome.context);
      if (!outcome.ok) {
        return {
          status: "error",
          ...base,
          response: `Error in conversation: ${outcome.message}`,
          error: outcome.message,
        };
      }
      setTraceOutput(outcome.text);
      return { status: "success", ...base, response: outcome.text };
    });
  }

  // -------------------------------------------------------------------------
  // Knowledge operations
  // -------------------------------------------------------------------------

  async ingest(documents: DocumentInput[]): Promise<IngestResult> {
    return withOperationTracing("ingest", Array.isArray(documents) ? `${documents.length} documents` : "", async (): Promise<IngestResult> => {
      const attempt = await this.attempt("ingest", async () => {
        const valid = parseInput(ingestSchema, documents);
        return this.knowledgeBase.insert(valid);
      });

      if (!attempt.ok) {
        return {
          status: "error",
          documentsAdded: 0,
          documentIds: [],
          message: `Error adding documents: ${attempt.message}`,
          error: attempt.message,
        };
      }
      const stored = attempt.value;
      return {
        status: "success",
        documentsAdded: stored.length,
        documentIds: stored.map((doc) => doc.id),
        message: `Successfully added ${stored.length} healthcare documents to knowledge base`,
      };
    });
  }

  /** Document total and a per-category histogram over the whole collection */
  async knowledgeStats(): Promise<KnowledgeStatsResult> {
    return withOperationTracing("knowledgeStats", "", async (): Promise<KnowledgeStatsResult> => {
      const attempt = await this.attempt("knowledgeStats", async () => {
        const documents = await this.knowledgeBase.listAll();
        const found = new Set<string>();
        const categoryCounts: Record<string, number> = {};
        for (const doc of documents) {
          const value = doc.metadata[CATEGORY_KEY];
          if (value !== undefined) found.add(String(value));
          const category = value === undefined ? UNCATEGORIZED : String(value);
          categoryCounts[category] = (categoryCounts[category] ?? 0) + 1;
        }
        return { totalDocuments: documents.length, categories: [...found].sort(), categoryCounts };
      });

      const collectionName = this.knowledgeBase.collectionName;
      if (!attempt.ok) {
        return {
          status: "error",
          totalDocuments: 0,
          categories: [],
          categoryCounts: {},
          collectionName,
          error: attempt.message,
        };
      }
      return { status: "success", ...attempt.value, collectionName };
    });
  }

  /** Similarity search without generation */
  async search(input: SearchKnowledgeInput): Promise<SearchKnowledgeResult> {
    return withOperationTracing("search", input.query, async (): Promise<SearchKnowledgeResult> => {
      const attempt = await this.attempt("search", async () => {
        const params = parseInput(searchKnowledgeSchema, input);
        return this.knowledgeBase.search(params.query, params.limit, params.category);
      });

      const base = { query: input.query, category: blankToNull(input.category) };
      if (!attempt.ok) {
        return { status: "error", ...base, results: [], count: 0, error: attempt.message };
      }
      return {
        status: "success",
        ...base,
        results: attempt.value,
        count: attempt.value.length,
      };
    });
  }

  async searchByCategory(
    query: string,
    category: string,
    limit: number = DEFAULT_SEARCH_LIMIT
  ): Promise<SearchKnowledgeResult> {
    return this.search({ query, category, limit });
  }

  async listByCategory(category: string): Promise<CategoryListingResult> {
    return withOperationTracing("listByCategory", category, async (): Promise<CategoryListingResult> => {
      const attempt = await this.attempt("listByCategory", () =>
        this.knowledgeBase.listByCategory(category)
      );

      if (!attempt.ok) {
        return { status: "error", category, documents: [], count: 0, error: attempt.message };
      }
      return {
        status: "success",
        category,
        documents: attempt.value,
        count: attempt.value.length,
      };
    });
  }

  /** Removes one document; deleted is false when the id was unknown */
  async deleteDocument(id: string): Promise<DeleteDocumentResult> {
    return withOperationTracing("deleteDocument", id, async (): Promise<DeleteDocumentResult> => {
      const attempt = await this.attempt("deleteDocument", () =>
        this.knowledgeBase.delete(id)
      );

      if (!attempt.ok) {
        return { status: "error", id, deleted: false, error: attempt.message };
      }
      return { status: "success", id, deleted: attempt.value };
    });
  }

  async clearKnowledge(): Promise<ClearKnowledgeResult> {
    return withOperationTracing("clearKnowledge", "", async (): Promise<ClearKnowledgeResult> => {
      const attempt = await this.attempt("clearKnowledge", () => this.knowledgeBase.clear());

      if (!attempt.ok) {
        return {
          status: "error",
          documentsRemoved: 0,
          message: `Error clearing knowledge base: ${attempt.message}`,
          error: attempt.message,
        };
      }
      return {
        status: "success",
        documentsRemoved: attempt.value,
        message: "Healthcare knowledge base cleared successfully",
      };
    });
  }

  // -------------------------------------------------------------------------
  // Pipeline helpers
  // -------------------------------------------------------------------------

  /**
   * Runs the generation pipeline. `plan` validates input and may throw;
   * nothing escapes this method.
   */
  private async generate(
    operation: string,
    plan: () => GenerationPlan
  ): Promise<GenerationOutcome> {
    let context: ContextItem[] = [];
    try {
      const steps = plan();
      const retrieved = steps.retrieve ? await steps.retrieve() : [];
      context = assembleContext(retrieved, steps.userContext);

      const messages = steps.render(context);
      const text = await this.completion.complete(messages, {
        temperature: this.settings.temperature,
        maxTokens: this.settings.maxTokens,
      });

      return {
        ok: true,
        text: steps.includeDisclaimer ? this.withDisclaimer(text) : text,
        context,
      };
    } catch (error) {
      this.logFailure(operation, error);
      return { ok: false, message: describeError(error), context };
    }
  }

  private async attempt<T>(operation: string, fn: () => Promise<T>): Promise<Attempt<T>> {
    try {
      return { ok: true, value: await fn() };
    } catch (error) {
      this.logFailure(operation, error);
      return { ok: false, message: describeError(error) };
    }
  }

  private withDisclaimer(text: string): string {
    return `${text}${DISCLAIMER_PREFIX}${this.settings.disclaimer}`;
  }

  /**
   * Template errors are bugs in our prompts and are logged as errors;
   * everything else (bad input, store or model outages) as warnings.
   */
  private logFailure(operation: string, error: unknown): void {
    if (error instanceof TemplateRenderError) {
      this.logger.error(`[template] ${operation}: ${error.message}`);
      return;
    }
    this.logger.warn(`[healthdesk] ${operation} failed: ${describeError(error)}`);
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function contextFields(context: ContextItem[]) {
  return { contextUsed: context.length, contextDocuments: context };
}

function blankToNull(value: string | undefined): string | null {
  return value !== undefined && value.trim() !== "" ? value : null;
}

/** Span input for the symptom list; callers outside TypeScript may pass anything */
function traceLabel(symptoms: unknown): string {
  return Array.isArray(symptoms) ? symptoms.map(String).join(", ") : "";
}

function findLastUserMessage(
  messages: ReadonlyArray<{ role: string; content: string }>
): string | undefined {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message && message.role === "user") return message.content;
  }
  return undefined;
}
