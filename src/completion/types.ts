/**
 * types.ts - Completion client interface
 *
 * The agent talks to the language model through this interface only, so
 * tests can hand it a stub and the Anthropic specifics stay in one file.
 */

export type CompletionRole = "system" | "user" | "assistant";

export interface CompletionMessage {
  role: CompletionRole;
  content: string;
}

/** Generation parameters sent with every request */
export interface CompletionParams {
  temperature: number;
  maxTokens: number;
}

export interface CompletionClient {
  /**
   * Sends the messages and returns the model's text reply.
   * Rejects with CompletionBackendError on any failure, including a reply
   * that contains no text.
   */
  complete(messages: CompletionMessage[], params: CompletionParams): Promise<string>;
}
