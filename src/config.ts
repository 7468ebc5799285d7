/**
 * config.ts - Environment configuration
 *
 * Reads every setting from environment variables, validates them with zod
 * and fails with one ConfigError listing all problems. Entry points load the
 * config before building the agent, so a missing API key stops the process
 * at startup rather than on the first request.
 */

import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_MODEL_NAME } from "./completion";
import {
  DEFAULT_CHROMA_URL,
  DEFAULT_EMBEDDING_MODEL,
  HEALTHCARE_COLLECTION,
} from "./vectorstore";

export const DEFAULT_DISCLAIMER =
  "This AI assistant provides general health information only and should not replace professional medical advice, diagnosis, or treatment.";

/** Unset and empty variables both fall back to the default */
const emptyAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const envSchema = z.object({
  ANTHROPIC_API_KEY: z.string({ required_error: "ANTHROPIC_API_KEY is required" }).min(1, "ANTHROPIC_API_KEY is required"),
  ANTHROPIC_BASE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  MODEL_NAME: z.preprocess(emptyAsUndefined, z.string().default(DEFAULT_MODEL_NAME)),
  TEMPERATURE: z.preprocess(emptyAsUndefined, z.coerce.number().min(0).max(1).default(0.3)),
  MAX_TOKENS: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(1500)),
  VOYAGE_API_KEY: z.string({ required_error: "VOYAGE_API_KEY is required" }).min(1, "VOYAGE_API_KEY is required"),
  EMBEDDING_MODEL: z.preprocess(emptyAsUndefined, z.string().default(DEFAULT_EMBEDDING_MODEL)),
  VECTOR_BACKEND: z.preprocess(emptyAsUndefined, z.enum(["chroma", "memory"]).default("chroma")),
  CHROMA_URL: z.preprocess(emptyAsUndefined, z.string().url().default(DEFAULT_CHROMA_URL)),
  HEALTHCARE_COLLECTION: z.preprocess(emptyAsUndefined, z.string().default(HEALTHCARE_COLLECTION)),
  MEDICAL_DISCLAIMER: z.preprocess(emptyAsUndefined, z.string().default(DEFAULT_DISCLAIMER)),
  MAX_HISTORY_MESSAGES: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().optional()),
  HOST: z.preprocess(emptyAsUndefined, z.string().default("0.0.0.0")),
  PORT: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(1).max(65535).default(8080)),
});

export interface AppConfig {
  anthropic: { apiKey: string; baseUrl?: string; model: string };
  generation: { temperature: number; maxTokens: number };
  embedding: { apiKey: string; model: string };
  vectorStore: { backend: "chroma" | "memory"; chromaUrl: string; collection: string };
  disclaimer: string;
  historyLimit?: number;
  server: { host: string; port: number };
}

/**
 * Parses and validates the environment.
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const key = issue.path.join(".");
        return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
      })
    );
  }

  const e = parsed.data;
  return {
    anthropic: { apiKey: e.ANTHROPIC_API_KEY, baseUrl: e.ANTHROPIC_BASE_URL, model: e.MODEL_NAME },
    generation: { temperature: e.TEMPERATURE, maxTokens: e.MAX_TOKENS },
    embedding: { apiKey: e.VOYAGE_API_KEY, model: e.EMBEDDING_MODEL },
    vectorStore: {
      backend: e.VECTOR_BACKEND,
      chromaUrl: e.CHROMA_URL,
      collection: e.HEALTHCARE_COLLECTION,
    },
    disclaimer: e.MEDICAL_DISCLAIMER,
    historyLimit: e.MAX_HISTORY_MESSAGES,
    server: { host: e.HOST, port: e.PORT },
  };
}

/** The config without credentials, as served by GET /config */
export function publicConfig(config: AppConfig) {
  return {
    modelName: config.anthropic.model,
    temperature: config.generation.temperature,
    maxTokens: config.generation.maxTokens,
    embeddingModel: config.embedding.model,
    vectorBackend: config.vectorStore.backend,
    chromaUrl: config.vectorStore.chromaUrl,
    collectionName: config.vectorStore.collection,
    medicalDisclaimer: config.disclaimer,
    historyLimit: config.historyLimit ?? null,
    host: config.server.host,
    port: config.server.port,
  };
}
