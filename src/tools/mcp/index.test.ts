/**
 * Unit tests for the healthdesk MCP tools
 *
 * A real MCP client talks to the server over the SDK's in-memory transport.
 * The agent runs on the in-memory engine with a stubbed completion client.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerHealthTools } from "./index";
import { HealthAgent, DISCLAIMER_PREFIX } from "../../agent";
import type { CompletionClient } from "../../completion";
import { KnowledgeBase } from "../../knowledge";
import { InMemoryBackend } from "../../vectorstore";
import { HashingEmbedding } from "../../testing/hashing-embedding";

const ANSWER = `Stay hydrated.${DISCLAIMER_PREFIX}test disclaimer`;

const clients: Client[] = [];

afterEach(async () => {
  for (const client of clients.splice(0)) {
    await client.close();
  }
});

async function connect(complete = vi.fn<CompletionClient["complete"]>().mockResolvedValue("Stay hydrated.")) {
  const knowledgeBase = new KnowledgeBase(
    new InMemoryBackend(new HashingEmbedding()),
    "test_knowledge"
  );
  await knowledgeBase.insert([
    { id: "flu", text: "Flu causes fever and headache", metadata: { category: "symptoms" } },
    { id: "ibu", text: "Ibuprofen relieves fever", metadata: { category: "medications" } },
  ]);
  const agent = new HealthAgent({
    knowledgeBase,
    completion: { complete },
    settings: { temperature: 0.3, maxTokens: 1500, disclaimer: "test disclaimer" },
    logger: { warn: vi.fn(), error: vi.fn() },
  });

  const server = new McpServer({ name: "healthdesk-test", version: "0.0.0" });
  registerHealthTools(server, agent);

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: "test-client", version: "0.0.0" });
  await server.connect(serverTransport);
  await client.connect(clientTransport);
  clients.push(client);
  return { client, complete };
}

describe("registerHealthTools", () => {
  it("lists every health tool", async () => {
    const { client } = await connect();

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "add_knowledge",
      "ask_health_question",
      "assess_symptoms",
      "health_conversation",
      "knowledge_stats",
      "medication_info",
      "search_knowledge",
    ]);
  });

  it("answers a question with its sources", async () => {
    const { client } = await connect();

    const result = await client.callTool({
      name: "ask_health_question",
      arguments: { question: "fever", category: "medications" },
    });

    expect(result).toMatchObject({
      isError: false,
      content: [
        {
          type: "text",
          text: expect.stringContaining(`${ANSWER}\n\nSources (1):\n1. ibu [medications] (distance: `),
        },
      ],
    });
  });

  it("flags a failed generation as an error", async () => {
    const failing = vi
      .fn<CompletionClient["complete"]>()
      .mockRejectedValue(new Error("overloaded"));
    const { client } = await connect(failing);

    const result = await client.callTool({
      name: "assess_symptoms",
      arguments: { symptoms: ["fever"] },
    });

    expect(result).toMatchObject({
      isError: true,
      content: [{ type: "text", text: "Error generating assessment: overloaded" }],
    });
  });

  it("describes a medication", async () => {
    const { client } = await connect();

    const result = await client.callTool({
      name: "medication_info",
      arguments: { medicationName: "Ibuprofen" },
    });

    expect(result).toMatchObject({ isError: false, content: [{ type: "text", text: ANSWER }] });
  });

  it("continues a conversation", async () => {
    const { client, complete } = await connect();

    const result = await client.callTool({
      name: "health_conversation",
      arguments: { messages: [{ role: "user", content: "I have a fever" }] },
    });

    expect(result).toMatchObject({ isError: false, content: [{ type: "text", text: ANSWER }] });
    expect(complete.mock.calls[0]?.[0].at(-1)).toEqual({ role: "user", content: "I have a fever" });
  });

  it("accepts a conversation with turns in other roles and leaves them out of the prompt", async () => {
    const { client, complete } = await connect();

    const result = await client.callTool({
      name: "health_conversation",
      arguments: {
        messages: [
          { role: "system", content: "Be brief" },
          { role: "user", content: "hi" },
        ],
      },
    });

    expect(result).toMatchObject({ isError: false, content: [{ type: "text", text: ANSWER }] });
    const sent = complete.mock.calls[0]?.[0] ?? [];
    expect(sent.slice(1)).toEqual([{ role: "user", content: "hi" }]);
  });

  it("searches without generating", async () => {
    const { client, complete } = await connect();

    const result = await client.callTool({
      name: "search_knowledge",
      arguments: { query: "fever", category: "symptoms" },
    });

    expect(result).toMatchObject({
      isError: false,
      content: [
        {
          type: "text",
          text: expect.stringMatching(/^Found 1 result in "test_knowledge" collection:\n\n1\. flu /),
        },
      ],
    });
    expect(complete).not.toHaveBeenCalled();
  });

  it("reports stats and adds knowledge", async () => {
    const { client } = await connect();

    const added = await client.callTool({
      name: "add_knowledge",
      arguments: { documents: [{ id: "sleep", text: "Sleep seven hours", metadata: { category: "lifestyle" } }] },
    });
    const stats = await client.callTool({ name: "knowledge_stats", arguments: {} });

    expect(added).toMatchObject({
      isError: false,
      content: [{ type: "text", text: "Successfully added 1 healthcare documents to knowledge base" }],
    });
    expect(stats).toMatchObject({
      isError: false,
      content: [
        {
          type: "text",
          text: 'Knowledge base "test_knowledge": 3 documents\n  lifestyle: 1\n  medications: 1\n  symptoms: 1',
        },
      ],
    });
  });

  it("flags a duplicate id as an error", async () => {
    const { client } = await connect();

    const result = await client.callTool({
      name: "add_knowledge",
      arguments: { documents: [{ id: "flu", text: "Another flu document" }] },
    });

    expect(result).toMatchObject({ isError: true });
  });
});
