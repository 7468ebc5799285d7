/**
 * completion/index.ts - Public API for the completion module
 */

export type {
  CompletionClient,
  CompletionMessage,
  CompletionParams,
  CompletionRole,
} from "./types";
export type {
  AnthropicCompletionOptions,
  ChatModelFactory,
  ChatModelLike,
} from "./anthropic-client";
export {
  AnthropicCompletionClient,
  COMPLETION_TIMEOUT_MS,
  DEFAULT_MODEL_NAME,
  extractText,
} from "./anthropic-client";
