/**
 * knowledge-base.ts - Single-collection adapter over a VectorStore
 *
 * What this file does:
 * Gives the agent one uniform handle on "the healthcare knowledge base":
 * insert, search with an optional category filter, list, enumerate
 * categories, delete and clear. Every call addresses the one collection
 * this adapter was built for; the adapter keeps no other state between
 * calls apart from remembering that the collection was initialized.
 *
 * Error mapping:
 * - insert/delete/clear failures → StoreWriteError
 * - search/list failures → StoreQueryError
 * - a bad limit → ValidationError
 * Our own typed errors pass through unchanged.
 *
 * The VectorStore is injected (not imported) so unit tests use the
 * in-memory engine while production uses Chroma.
 */

import { createHash } from "crypto";
import {
  HealthdeskError,
  StoreQueryError,
  StoreWriteError,
  ValidationError,
  describeError,
} from "../errors";
import type {
  DocumentMetadata,
  SearchResult,
  VectorDocument,
  VectorStore,
} from "../vectorstore";
import type { DocumentInput } from "./types";

/** Metadata key used for category filtering */
export const CATEGORY_KEY = "category";

/** Category reported for documents without category metadata */
export const UNCATEGORIZED = "uncategorized";

export class KnowledgeBase {
  private readonly store: VectorStore;
  public readonly collectionName: string;

  /** Pending or finished initialization; reset on failure so the next call retries */
  private initialization: Promise<void> | null = null;

  constructor(store: VectorStore, collectionName: string) {
    this.store = store;
    this.collectionName = collectionName;
  }

  /**
   * Inserts documents into the collection.
   *
   * Documents without an id get a synthetic one derived from their content,
   * so ingesting the same document twice is reported as a duplicate instead
   * of silently creating a copy. The whole batch is checked before anything
   * is written.
   *
   * @returns The documents as stored, with their final ids
   */
  async insert(documents: DocumentInput[]): Promise<VectorDocument[]> {
    if (documents.length === 0) return [];

    return this.write("Failed to insert documents", async () => {
      const prepared = documents.map(prepareDocument);

      const ids = prepared.map((doc) => doc.id);
      const duplicates = ids.filter((id, i) => ids.indexOf(id) !== i);
      if (duplicates.length > 0) {
        throw new StoreWriteError(
          `Duplicate document IDs in batch: ${[...new Set(duplicates)].join(", ")}`
        );
      }

      await this.ensureInitialized();

      const existing = await this.store.get(this.collectionName, { ids });
      if (existing.length > 0) {
        throw new StoreWriteError(
          `Documents already exist in "${this.collectionName}": ${existing
            .map((doc) => doc.id)
            .join(", ")}. Delete them before adding them again.`
        );
      }

      await this.store.add(this.collectionName, prepared);
      return prepared;
    });
  }

  /**
   * Similarity search, optionally restricted to one category.
   *
   * A blank query returns no results without calling the engine.
   */
  async search(
    query: string,
    limit: number,
    category?: string
  ): Promise<SearchResult[]> {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ValidationError([`limit must be a positive integer, got ${limit}`]);
    }
    if (query.trim() === "") return [];

    return this.read("Search failed", async () => {
      await this.ensureInitialized();
      return this.store.search(this.collectionName, query, {
        nResults: limit,
        ...(category ? { where: { [CATEGORY_KEY]: category } } : {}),
      });
    });
  }

  async listAll(): Promise<VectorDocument[]> {
    return this.read("Failed to list documents", async () => {
      await this.ensureInitialized();
      return this.store.get(this.collectionName);
    });
  }

  async listByCategory(category: string): Promise<VectorDocument[]> {
    return this.read(`Failed to list documents in category "${category}"`, async () => {
      await this.ensureInitialized();
      return this.store.get(this.collectionName, {
        where: { [CATEGORY_KEY]: category },
      });
    });
  }

  /**
   * Distinct category values across the collection, sorted.
   * Documents without a category don't contribute one.
   */
  async categories(): Promise<string[]> {
    const documents = await this.listAll();
    const found = new Set<string>();
    for (const doc of documents) {
      const category = doc.metadata[CATEGORY_KEY];
      if (category !== undefined) found.add(String(category));
    }
    return [...found].sort();
  }

  /**
   * Deletes one document.
   *
   * @returns false when the id does not exist, so bulk loops can continue
   */
  async delete(id: string): Promise<boolean> {
    return this.write(`Failed to delete document "${id}"`, async () => {
      await this.ensureInitialized();
      const existing = await this.store.get(this.collectionName, { ids: [id] });
      if (existing.length === 0) return false;
      await this.store.delete(this.collectionName, [id]);
      return true;
    });
  }

  /**
   * Deletes every document in the collection.
   *
   * @returns How many documents were removed
   */
  async clear(): Promise<number> {
    return this.write("Failed to clear knowledge base", async () => {
      await this.ensureInitialized();
      const documents = await this.store.get(this.collectionName);
      await this.store.delete(
        this.collectionName,
        documents.map((doc) => doc.id)
      );
      return documents.length;
    });
  }

  private async ensureInitialized(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.store
        .initialize(this.collectionName, { distanceMetric: "cosine" })
        .catch((error: unknown) => {
          this.initialization = null;
          throw error;
        });
    }
    await this.initialization;
  }

  private async write<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof HealthdeskError) throw error;
      throw new StoreWriteError(`${context}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private async read<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof HealthdeskError) throw error;
      throw new StoreQueryError(`${context}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Validates metadata and assigns the final id.
 * Throws StoreWriteError for metadata values a vector store can't hold.
 */
function prepareDocument(input: DocumentInput, index: number): VectorDocument {
  const metadata: DocumentMetadata = {};
  for (const [key, value] of Object.entries(input.metadata ?? {})) {
    if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      metadata[key] = value;
    } else {
      throw new StoreWriteError(
        `Document ${index} has unsupported metadata value for "${key}": ` +
          "only strings, numbers and booleans can be stored"
      );
    }
  }

  return {
    id: input.id || syntheticId(input.text, metadata),
    text: input.text,
    metadata,
  };
}

/**
 * Stable id for a document that arrived without one: the same text and
 * metadata always produce the same id.
 */
export function syntheticId(text: string, metadata: DocumentMetadata): string {
  const sortedMetadata = Object.keys(metadata)
    .sort()
    .map((key) => [key, metadata[key]]);
  const digest = createHash("sha256")
    .update(text)
    .update("\u0000")
    .update(JSON.stringify(sortedMetadata))
    .digest("hex");
  return `doc_${digest.slice(0, 16)}`;
}
