/**
 * MCP tool registration for healthdesk
 *
 * Exposes the health agent's operations as MCP tools. Each tool call runs
 * inside one `healthdesk.mcp.<tool>` span, so the agent operation and its
 * chat-model call nest under it:
 *
 *   healthdesk.mcp.ask_health_question (root span)
 *   └── healthdesk.processQuery
 *       └── anthropic.chat
 *
 * Tools answer with plain text. A result with status "error" becomes an MCP
 * result with isError set; its text is the agent's "Error ..." message.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { HealthAgent } from "../../agent";
import { conversationMessageSchema } from "../../agent/schemas";
import { withMcpRequestTracing, setTraceOutput } from "../../tracing/context-bridge";
import type { McpToolResult } from "../../tracing/context-bridge";
import { formatContextSources, formatSearchResults, formatStats } from "../format-results";

const limitField = z
  .number()
  .int()
  .positive()
  .optional()
  .describe("How many knowledge base documents to retrieve (default 5)");

const askSchema = {
  question: z.string().describe("The health question to answer"),
  category: z
    .string()
    .optional()
    .describe("Restrict retrieval to one category, e.g. symptoms, diseases, medications"),
  userContext: z
    .string()
    .optional()
    .describe("Personal details to take into account, e.g. age, conditions, allergies"),
  limit: limitField,
};

const assessSchema = {
  symptoms: z.array(z.string()).describe("Symptoms to assess, one per entry"),
  limit: limitField,
};

const medicationSchema = {
  medicationName: z.string().describe("Name of the medication"),
  limit: limitField,
};

const conversationSchema = {
  messages: z
    .array(conversationMessageSchema)
    .describe(
      "The conversation so far, oldest first. Turns other than user and assistant are ignored"
    ),
  userContext: z.string().optional().describe("Personal details to take into account"),
  limit: limitField,
};

const searchSchema = {
  query: z.string().describe("Text to search the knowledge base for"),
  category: z.string().optional().describe("Restrict the search to one category"),
  limit: limitField,
};

const addKnowledgeSchema = {
  documents: z
    .array(
      z.object({
        id: z.string().optional().describe("Document id; generated from the content when omitted"),
        text: z.string(),
        metadata: z
          .record(z.union([z.string(), z.number(), z.boolean()]))
          .optional()
          .describe('Scalar metadata; "category" is used for filtering'),
      })
    )
    .describe("Documents to add to the knowledge base"),
};

function toolResult(text: string, isError: boolean): McpToolResult {
  return { content: [{ type: "text", text }], isError };
}

/** The answer followed by the list of sources it was grounded on */
function withSources(text: string, sources: string): string {
  return sources ? `${text}\n\n${sources}` : text;
}

/**
 * Registers every healthdesk tool with an MCP server.
 */
export function registerHealthTools(server: McpServer, agent: HealthAgent): void {
  server.registerTool(
    "ask_health_question",
    {
      description: `Answer a general health question using the healthcare knowledge base.

Retrieves relevant documents, optionally within one category, and generates an
answer grounded on them. The answer ends with a medical disclaimer.`,
      inputSchema: askSchema,
    },
    async (input) =>
      withMcpRequestTracing("ask_health_question", input, async () => {
        const result = await agent.processQuery({
          query: input.question,
          category: input.category,
          userContext: input.userContext,
          limit: input.limit,
        });
        if (result.status === "error") {
          return toolResult(result.response, true);
        }
        setTraceOutput(result.response);
        return toolResult(
          withSources(result.response, formatContextSources(result.contextDocuments)),
          false
        );
      })
  );

  server.registerTool(
    "assess_symptoms",
    {
      description: `Give a general, educational assessment of a list of symptoms: possible
conditions, lifestyle recommendations, when to seek care, and prevention.`,
      inputSchema: assessSchema,
    },
    async (input) =>
      withMcpRequestTracing("assess_symptoms", input, async () => {
        const result = await agent.assessSymptoms(input);
        return toolResult(result.assessment, result.status === "error");
      })
  );

  server.registerTool(
    "medication_info",
    {
      description: `Describe a medication: uses, side effects, precautions and interactions,
based on the medications category of the knowledge base.`,
      inputSchema: medicationSchema,
    },
    async (input) =>
      withMcpRequestTracing("medication_info", input, async () => {
        const result = await agent.lookupMedication(input);
        return toolResult(result.information, result.status === "error");
      })
  );

  server.registerTool(
    "health_conversation",
    {
      description: `Continue a multi-turn health conversation. Retrieval uses the most recent
user message.`,
      inputSchema: conversationSchema,
    },
    async (input) =>
      withMcpRequestTracing("health_conversation", input, async () => {
        const result = await agent.converse(input);
        return toolResult(result.response, result.status === "error");
      })
  );

  server.registerTool(
    "search_knowledge",
    {
      description: "Similarity search over the healthcare knowledge base, without generating an answer.",
      inputSchema: searchSchema,
    },
    async (input) =>
      withMcpRequestTracing("search_knowledge", input, async () => {
        const result = await agent.search(input);
        if (result.status === "error") {
          return toolResult(`Error searching knowledge base: ${result.error}`, true);
        }
        return toolResult(formatSearchResults(result.results, agent.collectionName), false);
      })
  );

  server.registerTool(
    "knowledge_stats",
    {
      description: "Count the documents in the healthcare knowledge base, per category.",
      inputSchema: {},
    },
    async () =>
      withMcpRequestTracing("knowledge_stats", {}, async () => {
        const result = await agent.knowledgeStats();
        if (result.status === "error") {
          return toolResult(`Error getting knowledge base stats: ${result.error}`, true);
        }
        return toolResult(formatStats(result), false);
      })
  );

  server.registerTool(
    "add_knowledge",
    {
      description: "Add documents to the healthcare knowledge base. Existing ids are rejected.",
      inputSchema: addKnowledgeSchema,
    },
    async (input) =>
      withMcpRequestTracing("add_knowledge", input, async () => {
        const result = await agent.ingest(input.documents);
        return toolResult(result.message, result.status === "error");
      })
  );
}
