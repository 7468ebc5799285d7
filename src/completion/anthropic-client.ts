/**
 * anthropic-client.ts - CompletionClient backed by Claude through LangChain
 *
 * What this file does:
 * Converts our role/content messages into LangChain message objects, sends
 * them to ChatAnthropic and pulls the text out of the reply.
 *
 * Failure policy:
 * - maxRetries is 0: a failed call surfaces immediately as
 *   CompletionBackendError, and the agent turns it into an error result
 * - every request is bounded by COMPLETION_TIMEOUT_MS
 * - a reply with no text is a failure, not an empty answer
 *
 * The ChatAnthropic instance is created lazily (its constructor checks the
 * API key) and cached per temperature/maxTokens pair. Tests inject a
 * `createModel` factory instead.
 */

import { ChatAnthropic } from "@langchain/anthropic";
import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  type BaseMessage,
} from "@langchain/core/messages";
import { CompletionBackendError, describeError } from "../errors";
import type {
  CompletionClient,
  CompletionMessage,
  CompletionParams,
} from "./types";

/** Default chat model; override with MODEL_NAME */
export const DEFAULT_MODEL_NAME = "claude-sonnet-4-20250514";

/** Upper bound for one completion request */
export const COMPLETION_TIMEOUT_MS = 30_000;

/**
 * The slice of a LangChain chat model this client uses.
 * ChatAnthropic satisfies it; tests pass `{ invoke: vi.fn() }`.
 */
export interface ChatModelLike {
  invoke(
    messages: BaseMessage[],
    options?: { timeout?: number }
  ): Promise<{ content: unknown }>;
}

export type ChatModelFactory = (params: CompletionParams) => ChatModelLike;

export interface AnthropicCompletionOptions {
  apiKey?: string;
  /** Alternate API endpoint, e.g. a proxy */
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  /** Replaces ChatAnthropic construction (tests) */
  createModel?: ChatModelFactory;
}

export class AnthropicCompletionClient implements CompletionClient {
  private readonly createModel: ChatModelFactory;
  private readonly timeoutMs: number;
  private readonly models = new Map<string, ChatModelLike>();

  constructor(options: AnthropicCompletionOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? COMPLETION_TIMEOUT_MS;
    this.createModel =
      options.createModel ??
      ((params) =>
        new ChatAnthropic({
          model: options.model ?? DEFAULT_MODEL_NAME,
          temperature: params.temperature,
          maxTokens: params.maxTokens,
          maxRetries: 0,
          ...(options.apiKey ? { apiKey: options.apiKey } : {}),
          ...(options.baseUrl ? { anthropicApiUrl: options.baseUrl } : {}),
          clientOptions: { timeout: this.timeoutMs },
        }));
  }

  async complete(
    messages: CompletionMessage[],
    params: CompletionParams
  ): Promise<string> {
    let reply: { content: unknown };
    try {
      const model = this.getModel(params);
      reply = await model.invoke(messages.map(toLangChainMessage), {
        timeout: this.timeoutMs,
      });
    } catch (error) {
      throw new CompletionBackendError(
        `Completion request failed: ${describeError(error)}`,
        { cause: error }
      );
    }

    const text = extractText(reply.content);
    if (text.trim() === "") {
      throw new CompletionBackendError("Language model returned an empty response");
    }
    return text;
  }

  private getModel(params: CompletionParams): ChatModelLike {
    const key = `${params.temperature}:${params.maxTokens}`;
    let model = this.models.get(key);
    if (!model) {
      model = this.createModel(params);
      this.models.set(key, model);
    }
    return model;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function toLangChainMessage(message: CompletionMessage): BaseMessage {
  switch (message.role) {
    case "system":
      return new SystemMessage(message.content);
    case "assistant":
      return new AIMessage(message.content);
    case "user":
      return new HumanMessage(message.content);
  }
}

/**
 * Message content is either a plain string or an array of content blocks;
 * only "text" blocks contribute.
 */
export function extractText(content: unknown): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";
  return content.filter(isTextBlock).map((block) => block.text).join("");
}

function isTextBlock(block: unknown): block is { type: "text"; text: string } {
  return (
    typeof block === "object" &&
    block !== null &&
    "type" in block &&
    block.type === "text" &&
    "text" in block &&
    typeof block.text === "string"
  );
}
