/**
 * memory-backend.ts - In-process implementation of the VectorStore interface
 *
 * Keeps every collection in a Map, embeds with the injected EmbeddingFunction
 * and ranks by distance in plain TypeScript. Used for local demos
 * (VECTOR_BACKEND=memory) and as the engine behind unit tests, where it
 * behaves like Chroma for everything the knowledge base relies on:
 * insertion-ordered listing, equality filters, ascending distance.
 *
 * Nothing is persisted; a restart starts from an empty collection.
 */

import type {
  VectorStore,
  VectorDocument,
  SearchResult,
  CollectionOptions,
  SearchOptions,
  GetOptions,
  EmbeddingFunction,
  MetadataFilter,
} from "./types";

interface StoredEntry {
  document: VectorDocument;
  embedding: number[];
}

interface MemoryCollection {
  metric: CollectionOptions["distanceMetric"];
  /** Map preserves insertion order, which is our tie-break order */
  entries: Map<string, StoredEntry>;
}

export class InMemoryBackend implements VectorStore {
  private readonly embedder: EmbeddingFunction;
  private readonly collections = new Map<string, MemoryCollection>();

  constructor(embedder: EmbeddingFunction) {
    this.embedder = embedder;
  }

  async initialize(
    collection: string,
    options: CollectionOptions
  ): Promise<void> {
    if (this.collections.has(collection)) return;
    this.collections.set(collection, {
      metric: options.distanceMetric,
      entries: new Map(),
    });
  }

  async add(collection: string, documents: VectorDocument[]): Promise<void> {
    const target = this.getCollection(collection);
    if (documents.length === 0) return;

    const seen = new Set<string>();
    for (const doc of documents) {
      if (target.entries.has(doc.id) || seen.has(doc.id)) {
        throw new Error(`Document ID "${doc.id}" already exists in "${collection}"`);
      }
      seen.add(doc.id);
    }

    const embeddings = await this.embedder.embed(documents.map((doc) => doc.text));
    documents.forEach((doc, i) => {
      target.entries.set(doc.id, {
        document: { id: doc.id, text: doc.text, metadata: { ...doc.metadata } },
        embedding: embeddings[i] ?? [],
      });
    });
  }

  async search(
    collection: string,
    query: string,
    options?: SearchOptions
  ): Promise<SearchResult[]> {
    const target = this.getCollection(collection);
    const nResults = options?.nResults ?? 5;

    const candidates = [...target.entries.values()].filter((entry) =>
      matchesFilter(entry.document, options?.where)
    );
    if (candidates.length === 0) return [];

    const [queryEmbedding] = await this.embedder.embed([query]);

    const scored = candidates.map((entry) => ({
      ...entry.document,
      metadata: { ...entry.document.metadata },
      distance: computeDistance(target.metric, queryEmbedding ?? [], entry.embedding),
    }));

    // Array.prototype.sort is stable: equal distances keep insertion order
    scored.sort((a, b) => a.distance - b.distance);
    return scored.slice(0, nResults);
  }

  async get(
    collection: string,
    options?: GetOptions
  ): Promise<VectorDocument[]> {
    const target = this.getCollection(collection);
    const ids = options?.ids ? new Set(options.ids) : undefined;

    return [...target.entries.values()]
      .map((entry) => entry.document)
      .filter((doc) => (ids ? ids.has(doc.id) : true))
      .filter((doc) => matchesFilter(doc, options?.where))
      .map((doc) => ({ ...doc, metadata: { ...doc.metadata } }));
  }

  async delete(collection: string, ids: string[]): Promise<void> {
    const target = this.getCollection(collection);
    for (const id of ids) {
      target.entries.delete(id);
    }
  }

  private getCollection(name: string): MemoryCollection {
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

function matchesFilter(
  doc: VectorDocument,
  where: MetadataFilter | undefined
): boolean {
  if (!where) return true;
  return Object.entries(where).every(([key, value]) => doc.metadata[key] === value);
}

/**
 * Distance in the same ranges Chroma reports for each metric.
 *
 * - cosine: 1 - cos(a, b), 0 for identical direction; zero vectors score 1
 * - l2: squared euclidean distance
 * - ip: 1 - dot(a, b)
 *
 * Clamped at 0 so floating point noise never yields a negative distance.
 */
function computeDistance(
  metric: CollectionOptions["distanceMetric"],
  a: number[],
  b: number[]
): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  let squared = 0;

  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
    squared += (x - y) * (x - y);
  }

  if (metric === "l2") return squared;
  if (metric === "ip") return Math.max(0, 1 - dot);
  if (normA === 0 || normB === 0) return 1;
  return Math.max(0, 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB)));
}
