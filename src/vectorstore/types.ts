/**
 * types.ts - Vector database interfaces and types
 *
 * What this file does:
 * Defines the interfaces the rest of the system uses to talk to a vector
 * database. The knowledge base (src/knowledge) codes against VectorStore and
 * never touches Chroma directly, so the same code runs against the Chroma
 * server in production and the in-memory engine in tests and local demos.
 *
 * Key concepts:
 * - VectorStore: stores, searches, lists and deletes documents per collection
 * - EmbeddingFunction: turns text into vectors for similarity search
 * - VectorDocument: a stored document (id + text + metadata)
 * - SearchResult: a document found by similarity search, plus its distance
 */

/**
 * A function that converts text into embedding vectors.
 *
 * Similar texts produce vectors that sit close together, which is what makes
 * "blood pressure" find a document about hypertension even though the words
 * differ.
 */
export interface EmbeddingFunction {
  /**
   * Converts an array of text strings into embedding vectors.
   *
   * @returns One vector per input text, in input order
   */
  embed(texts: string[]): Promise<number[][]>;
}

/** Metadata values a vector store can filter on */
export type MetadataValue = string | number | boolean;

export type DocumentMetadata = Record<string, MetadataValue>;

/**
 * A document stored in the vector database.
 *
 * The text gets embedded for similarity search. The metadata stays as-is for
 * exact-match filtering (e.g., category "medications").
 */
export interface VectorDocument {
  /** Unique identifier within its collection */
  id: string;
  /** The content to embed and search against */
  text: string;
  /** Structured fields for filtering, not embedded */
  metadata: DocumentMetadata;
}

/**
 * A search result returned from a similarity query.
 */
export interface SearchResult extends VectorDocument {
  /**
   * Dissimilarity between the query and this document.
   *
   * With cosine distance: 0.0 = identical, 2.0 = opposite.
   * Lower means more relevant. Never negative.
   */
  distance: number;
}

/**
 * Options for creating a collection.
 */
export interface CollectionOptions {
  /**
   * The distance metric for comparing vectors. Set at creation time and
   * cannot be changed later.
   */
  distanceMetric: "cosine" | "l2" | "ip";
}

/**
 * Equality filter on metadata keys.
 *
 * `{ category: "medications" }` only matches documents whose
 * metadata.category is exactly "medications". Several keys must all match.
 */
export type MetadataFilter = Record<string, MetadataValue>;

/**
 * Options for searching a collection.
 */
export interface SearchOptions {
  /** Maximum number of results to return (default: 5) */
  nResults?: number;
  /** Metadata equality filter applied before ranking */
  where?: MetadataFilter;
}

/**
 * Options for listing documents without a query.
 */
export interface GetOptions {
  /** Only return documents with these IDs */
  ids?: string[];
  /** Metadata equality filter */
  where?: MetadataFilter;
}

/**
 * The main interface for vector database operations.
 *
 * Usage pattern:
 *   1. initialize(): create the collection (idempotent, safe to call twice)
 *   2. add(): insert documents (embeddings computed automatically)
 *   3. search() / get(): find documents by query or by filter
 *   4. delete(): remove documents by ID
 */
export interface VectorStore {
  /**
   * Creates a collection if it doesn't exist, or opens the existing one.
   */
  initialize(collection: string, options: CollectionOptions): Promise<void>;

  /**
   * Inserts documents. Each document's text is embedded with the configured
   * embedding function and stored alongside its metadata.
   */
  add(collection: string, documents: VectorDocument[]): Promise<void>;

  /**
   * Embeds the query and returns the closest documents, best first.
   */
  search(
    collection: string,
    query: string,
    options?: SearchOptions
  ): Promise<SearchResult[]>;

  /**
   * Lists documents in storage order, optionally narrowed by IDs or metadata.
   */
  get(collection: string, options?: GetOptions): Promise<VectorDocument[]>;

  /**
   * Deletes documents by ID. Unknown IDs are ignored.
   */
  delete(collection: string, ids: string[]): Promise<void>;
}
