/**
 * bootstrap.ts - Builds the HealthAgent from configuration
 *
 * The only place that picks concrete implementations: Voyage embeddings,
 * Chroma or the in-memory engine, and the Anthropic completion client.
 * CLI, HTTP server, MCP server and seed script all go through here, and
 * each builds exactly one agent that it passes around by reference.
 */

import { HealthAgent } from "./agent";
import type { AgentLogger } from "./agent";
import { AnthropicCompletionClient } from "./completion";
import type { AppConfig } from "./config";
import { KnowledgeBase } from "./knowledge";
import { ChromaBackend, InMemoryBackend, VoyageEmbedding } from "./vectorstore";
import type { VectorStore } from "./vectorstore";

export function createVectorStore(config: AppConfig): VectorStore {
  const embedder = new VoyageEmbedding({
    apiKey: config.embedding.apiKey,
    model: config.embedding.model,
  });
  return config.vectorStore.backend === "memory"
    ? new InMemoryBackend(embedder)
    : new ChromaBackend(embedder, { chromaUrl: config.vectorStore.chromaUrl });
}

export function createHealthAgent(
  config: AppConfig,
  options: { logger?: AgentLogger } = {}
): HealthAgent {
  return new HealthAgent({
    knowledgeBase: new KnowledgeBase(createVectorStore(config), config.vectorStore.collection),
    completion: new AnthropicCompletionClient({
      apiKey: config.anthropic.apiKey,
      baseUrl: config.anthropic.baseUrl,
      model: config.anthropic.model,
    }),
    settings: {
      temperature: config.generation.temperature,
      maxTokens: config.generation.maxTokens,
      disclaimer: config.disclaimer,
      historyLimit: config.historyLimit,
    },
    logger: options.logger,
  });
}
