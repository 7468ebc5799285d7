/**
 * knowledge/index.ts - Public API for the knowledge base module
 */

export { KnowledgeBase, CATEGORY_KEY, UNCATEGORIZED, syntheticId } from "./knowledge-base";
export { isUserContext } from "./types";
export type { DocumentInput, ContextItem, UserContextItem } from "./types";
