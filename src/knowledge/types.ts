/**
 * types.ts - Knowledge base input and context types
 */

import type { SearchResult } from "../vectorstore";

/**
 * A document as callers submit it for ingestion.
 *
 * `id` and `metadata` are optional: a missing id is replaced by a synthetic
 * one, missing metadata means "uncategorized". Metadata arrives untyped from
 * JSON bodies and is validated by the knowledge base.
 */
export interface DocumentInput {
  id?: string | null;
  text: string;
  metadata?: Record<string, unknown>;
}

/**
 * Caller-supplied free text injected ahead of retrieved documents.
 * It has no distance: it always counts as the most relevant item.
 */
export interface UserContextItem {
  id: "user_context";
  text: string;
  metadata: { source: "user_context" };
}

/** One entry of the context handed to the prompt builder */
export type ContextItem = SearchResult | UserContextItem;

export function isUserContext(item: ContextItem): item is UserContextItem {
  return item.id === "user_context" && !("distance" in item);
}
