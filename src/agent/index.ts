/**
 * agent/index.ts - Public API for the health agent
 */

export { HealthAgent, DISCLAIMER_PREFIX, MEDICATIONS_CATEGORY } from "./health-agent";
export { assembleContext } from "./context-assembler";
export {
  PromptBuilder,
  formatContextBlock,
  DEFAULT_PROMPTS_DIR,
  MEDICAL_CONTEXT_HEADING,
  MEDICATION_CONTEXT_HEADING,
} from "./prompt-builder";
export type { TemplateName, PromptBuilderOptions } from "./prompt-builder";
export {
  DEFAULT_SEARCH_LIMIT,
  assessSymptomsSchema,
  converseSchema,
  documentInputSchema,
  formatIssues,
  ingestSchema,
  lookupMedicationSchema,
  parseInput,
  processQuerySchema,
  searchKnowledgeSchema,
} from "./schemas";
export type {
  AssessSymptomsInput,
  ConverseInput,
  LookupMedicationInput,
  ProcessQueryInput,
  SearchKnowledgeInput,
} from "./schemas";
export type {
  AgentLogger,
  AgentSettings,
  CategoryListingResult,
  ClearKnowledgeResult,
  ContextFields,
  ConversationMessage,
  ConversationResult,
  DeleteDocumentResult,
  HealthAgentOptions,
  IngestResult,
  KnowledgeStatsResult,
  MedicationInfoResult,
  QueryResult,
  Result,
  SearchKnowledgeResult,
  SymptomAssessmentResult,
} from "./types";
