/**
 * context-assembler.ts - Merges ad-hoc context with retrieved documents
 *
 * Caller-supplied text goes first, wrapped as a pseudo-document; retrieved
 * results follow in the order the store returned them. No dedup, no
 * re-ranking, so the output is a pure function of the inputs.
 */

import type { ContextItem, UserContextItem } from "../knowledge";
import type { SearchResult } from "../vectorstore";

export function assembleContext(
  retrieved: SearchResult[],
  userContext?: string
): ContextItem[] {
  if (userContext === undefined || userContext === "") {
    return [...retrieved];
  }

  const item: UserContextItem = {
    id: "user_context",
    text: userContext,
    metadata: { source: "user_context" },
  };
  return [item, ...retrieved];
}
