/**
 * vectorstore/index.ts - Public API for the vector store module
 *
 * Re-exports everything other modules need from the vector store system.
 * Import from here; never import directly from types.ts, embeddings.ts,
 * chroma-backend.ts or memory-backend.ts.
 */

export type {
  VectorStore,
  VectorDocument,
  SearchResult,
  SearchOptions,
  GetOptions,
  CollectionOptions,
  EmbeddingFunction,
  DocumentMetadata,
  MetadataFilter,
  MetadataValue,
} from "./types";

export { ChromaBackend, DEFAULT_CHROMA_URL } from "./chroma-backend";
export { InMemoryBackend } from "./memory-backend";
export { VoyageEmbedding, DEFAULT_EMBEDDING_MODEL, DEFAULT_EMBEDDING_BATCH_SIZE } from "./embeddings";
export type { VoyageEmbeddingOptions } from "./embeddings";

/**
 * Default collection for the healthcare knowledge base.
 * Override with HEALTHCARE_COLLECTION.
 */
export const HEALTHCARE_COLLECTION = "healthcare_knowledge";
