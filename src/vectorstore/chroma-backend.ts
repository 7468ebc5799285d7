/**
 * chroma-backend.ts - Chroma implementation of the VectorStore interface
 *
 * What this file does:
 * Implements VectorStore against a Chroma server. This is the only file in
 * the project that imports from "chromadb"; everything else codes against
 * the VectorStore interface in types.ts.
 *
 * How it works:
 * 1. initialize() opens (or creates) a collection with the requested metric
 * 2. add() embeds document text via our EmbeddingFunction, then inserts
 *    vectors + text + metadata
 * 3. search() embeds the query and runs a similarity query, optionally
 *    narrowed by a metadata filter
 * 4. get() lists documents by ID or metadata without embedding anything
 * 5. delete() removes documents by ID
 *
 * We pass precomputed embeddings to Chroma (not a Chroma embedding function)
 * so the embedding model stays swappable and backend-agnostic.
 */

import { ChromaClient, type Collection, type Where } from "chromadb";
import type {
  VectorStore,
  VectorDocument,
  SearchResult,
  CollectionOptions,
  SearchOptions,
  GetOptions,
  EmbeddingFunction,
  DocumentMetadata,
  MetadataFilter,
} from "./types";

/**
 * Default Chroma server URL.
 *
 * The TypeScript SDK always talks to a running Chroma server. Run
 * `chroma run --path ./healthcare_db` locally or use Docker.
 */
export const DEFAULT_CHROMA_URL = "http://localhost:8000";

/**
 * Chroma implementation of the VectorStore interface.
 *
 * Usage:
 *   const store = new ChromaBackend(new VoyageEmbedding({ apiKey }));
 *   await store.initialize("healthcare_knowledge", { distanceMetric: "cosine" });
 *   await store.add("healthcare_knowledge", [{ id: "...", text: "...", metadata: {} }]);
 *   const results = await store.search("healthcare_knowledge", "blood pressure");
 */
export class ChromaBackend implements VectorStore {
  private readonly client: ChromaClient;
  private readonly embedder: EmbeddingFunction;

  /**
   * Collection name → Collection handle, filled by initialize() so every
   * other call skips a getOrCreateCollection round-trip.
   */
  private readonly collections: Map<string, Collection> = new Map();

  /**
   * @param embedder - Converts text to vectors; injected so the embedding
   *                   model can be swapped independently of the database
   * @param options.chromaUrl - Chroma server URL. Defaults to CHROMA_URL env
   *                            var or http://localhost:8000.
   */
  constructor(
    embedder: EmbeddingFunction,
    options?: { chromaUrl?: string }
  ) {
    this.embedder = embedder;
    const url = options?.chromaUrl ?? process.env.CHROMA_URL ?? DEFAULT_CHROMA_URL;

    const parsed = new URL(url);
    this.client = new ChromaClient({
      host: parsed.hostname,
      port: parseInt(parsed.port || (parsed.protocol === "https:" ? "443" : "8000"), 10),
      ssl: parsed.protocol === "https:",
    });
  }

  /**
   * Opens or creates the collection. Idempotent.
   *
   * embeddingFunction: null tells Chroma we always provide vectors ourselves.
   */
  async initialize(
    collection: string,
    options: CollectionOptions
  ): Promise<void> {
    const chromaCollection = await this.client.getOrCreateCollection({
      name: collection,
      configuration: {
        hnsw: { space: options.distanceMetric },
      },
      metadata: {
        description: "Healthcare knowledge base",
        domain: "healthcare",
      },
      embeddingFunction: null,
    });

    this.collections.set(collection, chromaCollection);
  }

  /**
   * Inserts documents with add(), not upsert(): stored documents are never
   * updated in place. The knowledge base checks for existing IDs first.
   */
  async add(collection: string, documents: VectorDocument[]): Promise<void> {
    const chromaCollection = this.getCollection(collection);

    if (documents.length === 0) return;

    const texts = documents.map((doc) => doc.text);
    const embeddings = await this.embedder.embed(texts);

    await chromaCollection.add({
      ids: documents.map((doc) => doc.id),
      embeddings,
      documents: texts,
      metadatas: documents.map((doc) => doc.metadata),
    });
  }

  /**
   * Similarity search. Chroma returns results sorted by distance, closest
   * first; we keep that order.
   */
  async search(
    collection: string,
    query: string,
    options?: SearchOptions
  ): Promise<SearchResult[]> {
    const chromaCollection = this.getCollection(collection);

    const queryEmbeddings = await this.embedder.embed([query]);
    const where = toChromaWhere(options?.where);

    const results = await chromaCollection.query({
      queryEmbeddings,
      nResults: options?.nResults ?? 5,
      include: ["documents", "metadatas", "distances"],
      ...(where ? { where } : {}),
    });

    // query() supports several queries at once and returns nested arrays.
    // We always send one query, so index [0] holds our results.
    const ids = results.ids[0] ?? [];
    const documents = results.documents[0] ?? [];
    const metadatas = results.metadatas[0] ?? [];
    const distances = results.distances[0] ?? [];

    return ids.map((id, i) => ({
      id,
      text: documents[i] ?? "",
      metadata: toDocumentMetadata(metadatas[i]),
      distance: Math.max(0, distances[i] ?? 0),
    }));
  }

  async get(
    collection: string,
    options?: GetOptions
  ): Promise<VectorDocument[]> {
    const chromaCollection = this.getCollection(collection);
    const where = toChromaWhere(options?.where);

    const results = await chromaCollection.get({
      include: ["documents", "metadatas"],
      ...(options?.ids ? { ids: options.ids } : {}),
      ...(where ? { where } : {}),
    });

    return results.ids.map((id, i) => ({
      id,
      text: results.documents[i] ?? "",
      metadata: toDocumentMetadata(results.metadatas[i]),
    }));
  }

  async delete(collection: string, ids: string[]): Promise<void> {
    const chromaCollection = this.getCollection(collection);
    if (ids.length === 0) return;
    await chromaCollection.delete({ ids });
  }

  /**
   * Gets a cached collection, throwing if it hasn't been initialized.
   *
   * Auto-initializing here could create a collection with the wrong
   * distance metric, which can't be changed afterwards.
   */
  private getCollection(name: string): Collection {
    const collection = this.collections.get(name);
    if (!collection) {
      throw new Error(
        `Collection "${name}" has not been initialized. ` +
          `Call initialize("${name}", { distanceMetric: "cosine" }) first.`
      );
    }
    return collection;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Builds a Chroma "where" filter from an equality filter.
 *
 * Single key: { category: "medications" }
 * Several keys: { $and: [{ category: "medications" }, { source: "WHO" }] }
 */
function toChromaWhere(filter: MetadataFilter | undefined): Where | undefined {
  if (!filter) return undefined;

  const conditions: Where[] = Object.entries(filter).map(([key, value]) => ({
    [key]: value,
  }));

  if (conditions.length === 0) return undefined;
  if (conditions.length === 1) return conditions[0];
  return { $and: conditions };
}

/**
 * Keeps the scalar metadata values we store; Chroma can return null for
 * documents stored without metadata.
 */
function toDocumentMetadata(
  metadata: Record<string, unknown> | null | undefined
): DocumentMetadata {
  const result: DocumentMetadata = {};
  if (!metadata) return result;

  for (const [key, value] of Object.entries(metadata)) {
    if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      result[key] = value;
    }
  }
  return result;
}
