/**
 * http-server.ts - Fastify HTTP API over the health agent
 *
 * One route per agent operation. Route schemas only check the body's shape
 * (types, required keys); content rules such as "query must not be empty"
 * belong to the agent, which answers them with an error result. So a body
 * of the wrong shape is a 400, and everything else is the agent's result
 * serialized as-is with 200.
 */

import * as fs from "fs";
import * as path from "path";
import Fastify from "fastify";
import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { formatIssues } from "../agent";
import type { AgentLogger, HealthAgent } from "../agent";
import { describeError } from "../errors";

export const DEFAULT_EXAMPLE_CONTEXTS_PATH = path.join(
  __dirname,
  "../../data/example-contexts.json"
);

/** JSON null and absent keys both mean "not supplied" */
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const optionalLimit = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);

const queryBody = z.object({
  query: z.string(),
  limit: optionalLimit,
  includeContext: z.boolean().optional(),
  category: optionalString,
  userContext: optionalString,
  includeDisclaimer: z.boolean().optional(),
});

const symptomsBody = z.object({
  symptoms: z.array(z.string()),
  limit: optionalLimit,
});

const medicationBody = z.object({
  medicationName: z.string(),
  limit: optionalLimit,
});

const conversationBody = z.object({
  messages: z.array(z.object({ role: z.string(), content: z.string() })),
  limit: optionalLimit,
  userContext: optionalString,
});

const addKnowledgeBody = z.object({
  documents: z.array(
    z.object({
      id: z.string().nullish(),
      text: z.string(),
      metadata: z.record(z.unknown()).optional(),
    })
  ),
});

const searchBody = z.object({
  query: z.string(),
  limit: optionalLimit,
  category: optionalString,
});

export interface HttpServerOptions {
  agent: HealthAgent;
  /** Non-secret settings served at GET /config */
  publicConfig: Record<string, unknown>;
  exampleContextsPath?: string;
  /** Enables Fastify's request logging */
  verbose?: boolean;
  logger?: AgentLogger;
}

const exampleContextSchema = z.array(z.string());

/**
 * Reads the example contexts offered to API clients. A missing file means
 * no examples; an unreadable or malformed one is logged and treated the same.
 */
export function loadExampleContexts(
  filePath: string,
  logger: AgentLogger = console
): string[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }
  try {
    const parsed = exampleContextSchema.safeParse(JSON.parse(fs.readFileSync(filePath, "utf8")));
    if (!parsed.success) {
      logger.warn(`[healthdesk] Ignoring malformed example contexts in ${filePath}`);
      return [];
    }
    return parsed.data;
  } catch (error) {
    logger.warn(`[healthdesk] Could not read example contexts from ${filePath}: ${describeError(error)}`);
    return [];
  }
}

/** Answers a body of the wrong shape with 400 and the issues */
function badRequest(reply: FastifyReply, error: z.ZodError): FastifyReply {
  return reply.code(400).send({
    status: "error",
    error: "Invalid request body",
    issues: formatIssues(error),
  });
}

/**
 * Builds the Fastify instance with every route registered. Call listen()
 * on the result to serve, or inject() to exercise it in-process.
 */
export function createHttpServer(options: HttpServerOptions): FastifyInstance {
  const { agent } = options;
  const logger = options.logger ?? console;
  const exampleContextsPath = options.exampleContextsPath ?? DEFAULT_EXAMPLE_CONTEXTS_PATH;

  const server = Fastify({ logger: options.verbose ?? false });

  server.get("/health", async () => ({ status: "healthy", service: "healthdesk" }));

  server.get("/config", async () => options.publicConfig);

  server.get("/example-contexts", async () => ({
    examples: loadExampleContexts(exampleContextsPath, logger),
  }));

  server.post("/query", async (request, reply) => {
    const body = queryBody.safeParse(request.body);
    if (!body.success) {
      return badRequest(reply, body.error);
    }
    return agent.processQuery(body.data);
  });

  server.post("/assess-symptoms", async (request, reply) => {
    const body = symptomsBody.safeParse(request.body);
    if (!body.success) {
      return badRequest(reply, body.error);
    }
    return agent.assessSymptoms(body.data);
  });

  server.post("/medication-info", async (request, reply) => {
    const body = medicationBody.safeParse(request.body);
    if (!body.success) {
      return badRequest(reply, body.error);
    }
    return agent.lookupMedication(body.data);
  });

  server.post("/conversation", async (request, reply) => {
    const body = conversationBody.safeParse(request.body);
    if (!body.success) {
      return badRequest(reply, body.error);
    }
    return agent.converse(body.data);
  });

  server.post("/knowledge/add", async (request, reply) => {
    const body = addKnowledgeBody.safeParse(request.body);
    if (!body.success) {
      return badRequest(reply, body.error);
    }
    return agent.ingest(body.data.documents);
  });

  server.get("/knowledge/stats", async () => agent.knowledgeStats());

  server.get("/knowledge/categories", async () => {
    const stats = await agent.knowledgeStats();
    if (stats.status === "error") {
      return { status: "error", categories: [], categoryCounts: {}, error: stats.error };
    }
    return {
      status: "success",
      categories: stats.categories,
      categoryCounts: stats.categoryCounts,
    };
  });

  server.get<{ Params: { category: string } }>(
    "/knowledge/category/:category",
    async (request) => agent.listByCategory(request.params.category)
  );

  server.post("/knowledge/search", async (request, reply) => {
    const body = searchBody.safeParse(request.body);
    if (!body.success) {
      return badRequest(reply, body.error);
    }
    return agent.search(body.data);
  });

  server.delete<{ Params: { id: string } }>(
    "/knowledge/documents/:id",
    async (request) => agent.deleteDocument(request.params.id)
  );

  server.delete("/knowledge/clear", async () => agent.clearKnowledge());

  return server;
}

/**
 * Starts listening and resolves once the port is bound.
 */
export async function startHttpServer(
  server: FastifyInstance,
  host: string,
  port: number,
  logger: Pick<Console, "log"> = console
): Promise<void> {
  await server.listen({ host, port });
  logger.log(`healthdesk API listening on http://${host}:${port}`);
}
