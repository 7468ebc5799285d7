/**
 * health-agent.test.ts - Unit tests for the health agent
 *
 * The knowledge base runs on the in-memory engine with a hashing embedding;
 * the completion client is a vi.fn stub, so every scenario runs offline.
 */

import { describe, it, expect, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { HealthAgent, DISCLAIMER_PREFIX } from "./health-agent";
import { KnowledgeBase } from "../knowledge";
import type { DocumentInput } from "../knowledge";
import { InMemoryBackend } from "../vectorstore";
import type { VectorStore } from "../vectorstore";
import { HashingEmbedding } from "../testing/hashing-embedding";
import { CompletionBackendError } from "../errors";
import type { CompletionClient } from "../completion";

// ---------------------------------------------------------------------------
// Test fixture helpers
// ---------------------------------------------------------------------------

const DISCLAIMER = "test disclaimer";
const DISCLAIMER_BLOCK = `${DISCLAIMER_PREFIX}${DISCLAIMER}`;

const DOCUMENTS: DocumentInput[] = [
  { id: "htn", text: "Hypertension is high blood pressure", metadata: { category: "diseases" } },
  { id: "flu", text: "Flu causes fever and headache", metadata: { category: "symptoms" } },
  { id: "ibu", text: "Ibuprofen relieves headache and fever", metadata: { category: "medications" } },
  { id: "walk", text: "Walking daily lowers blood pressure", metadata: { category: "lifestyle" } },
  { id: "water", text: "Drink water every day" },
];

function createCompletion(reply = "Here is some general information.") {
  const complete = vi.fn<CompletionClient["complete"]>().mockResolvedValue(reply);
  return { complete };
}

function createLogger() {
  return { warn: vi.fn(), error: vi.fn() };
}

interface AgentFixtureOptions {
  store?: VectorStore;
  completion?: ReturnType<typeof createCompletion>;
  historyLimit?: number;
  promptsDir?: string;
}

function createAgent(options: AgentFixtureOptions = {}) {
  const store = options.store ?? new InMemoryBackend(new HashingEmbedding());
  const knowledgeBase = new KnowledgeBase(store, "test_knowledge");
  const completion = options.completion ?? createCompletion();
  const logger = createLogger();
  const agent = new HealthAgent({
    knowledgeBase,
    completion,
    settings: {
      temperature: 0.3,
      maxTokens: 1500,
      disclaimer: DISCLAIMER,
      historyLimit: options.historyLimit,
    },
    promptsDir: options.promptsDir,
    logger,
  });
  return { agent, knowledgeBase, completion, logger };
}

async function createSeededAgent(options: AgentFixtureOptions = {}) {
  const fixture = createAgent(options);
  await fixture.knowledgeBase.insert(DOCUMENTS);
  return fixture;
}

/** A store whose searches always fail */
function createFailingSearchStore(): VectorStore {
  const store = new InMemoryBackend(new HashingEmbedding());
  vi.spyOn(store, "search").mockRejectedValue(new Error("connection refused"));
  return store;
}

function failingCompletion() {
  const complete = vi
    .fn<CompletionClient["complete"]>()
    .mockRejectedValue(new CompletionBackendError("Completion request failed: 503"));
  return { complete };
}

// ---------------------------------------------------------------------------
// processQuery
// ---------------------------------------------------------------------------

describe("HealthAgent.processQuery", () => {
  it("answers with retrieved context and one disclaimer", async () => {
    const { agent } = await createSeededAgent();

    const result = await agent.processQuery({ query: "blood pressure", limit: 2 });

    expect(result.status).toBe("success");
    expect(result.response).toBe(`Here is some general information.${DISCLAIMER_BLOCK}`);
    expect(result.contextUsed).toBe(2);
    expect(result.contextDocuments).toHaveLength(2);
    expect(result.category).toBeNull();
  });

  it("sends the retrieved texts in the system message", async () => {
    const { agent, completion } = await createSeededAgent();

    await agent.processQuery({ query: "hypertension high blood pressure", limit: 1 });

    const [messages, params] = completion.complete.mock.calls[0] ?? [];
    expect(messages?.[0]?.content.endsWith(
      "Relevant medical information:\nHypertension is high blood pressure"
    )).toBe(true);
    expect(messages?.[1]).toEqual({ role: "user", content: "hypertension high blood pressure" });
    expect(params).toEqual({ temperature: 0.3, maxTokens: 1500 });
  });

  it("returns identical context for identical calls", async () => {
    const { agent } = await createSeededAgent();

    const first = await agent.processQuery({ query: "headache fever", limit: 3 });
    const second = await agent.processQuery({ query: "headache fever", limit: 3 });

    expect(second.contextDocuments).toEqual(first.contextDocuments);
  });

  it("puts ad-hoc context first", async () => {
    const { agent } = await createSeededAgent();

    const result = await agent.processQuery({
      query: "fever",
      limit: 3,
      userContext: "Patient is allergic to aspirin",
    });

    expect(result.contextUsed).toBe(4);
    expect(result.contextDocuments[0]).toEqual({
      id: "user_context",
      text: "Patient is allergic to aspirin",
      metadata: { source: "user_context" },
    });
  });

  it("skips retrieval when includeContext is false", async () => {
    const { agent } = await createSeededAgent();

    const result = await agent.processQuery({ query: "fever", includeContext: false });

    expect(result.contextUsed).toBe(0);
    expect(result.contextDocuments).toEqual([]);
  });

  it("keeps ad-hoc context even when includeContext is false", async () => {
    const { agent } = await createSeededAgent();

    const result = await agent.processQuery({
      query: "fever",
      includeContext: false,
      userContext: "Recent travel abroad",
    });

    expect(result.contextDocuments.map((item) => item.id)).toEqual(["user_context"]);
  });

  it("restricts retrieval to the requested category", async () => {
    const { agent } = await createSeededAgent();

    const result = await agent.processQuery({ query: "fever", limit: 5, category: "medications" });

    expect(result.category).toBe("medications");
    expect(result.contextDocuments.map((item) => item.id)).toEqual(["ibu"]);
  });

  it("omits the disclaimer when asked to", async () => {
    const { agent } = await createSeededAgent();

    const result = await agent.processQuery({ query: "fever", includeDisclaimer: false });

    expect(result.response).toBe("Here is some general information.");
  });

  it("reports retrieved context alongside a completion failure", async () => {
    const { agent, logger } = await createSeededAgent({ completion: failingCompletion() });

    const result = await agent.processQuery({ query: "fever", limit: 2 });

    expect(result).toMatchObject({
      status: "error",
      error: "Completion request failed: 503",
      response: "Error processing query: Completion request failed: 503",
      contextUsed: 2,
    });
    expect(result.contextDocuments).toHaveLength(2);
    expect(logger.warn).toHaveBeenCalledWith(
      "[healthdesk] processQuery failed: Completion request failed: 503"
    );
  });

  it("zeroes the counters when retrieval fails", async () => {
    const { agent, completion } = createAgent({ store: createFailingSearchStore() });

    const result = await agent.processQuery({ query: "fever", userContext: "note" });

    expect(result.status).toBe("error");
    expect(result.contextUsed).toBe(0);
    expect(result.contextDocuments).toEqual([]);
    expect(result.status === "error" ? result.error : "").toBe(
      "Search failed: connection refused"
    );
    expect(completion.complete).not.toHaveBeenCalled();
  });

  it("keeps ad-hoc context made only of whitespace", async () => {
    const { agent } = createAgent();

    const result = await agent.processQuery({ query: "q", userContext: "  ", includeContext: false });

    expect(result.status).toBe("success");
    expect(result.contextUsed).toBe(1);
    expect(result.contextDocuments[0]).toEqual({
      id: "user_context",
      text: "  ",
      metadata: { source: "user_context" },
    });
  });

  it("returns a validation error for a blank query", async () => {
    const { agent, completion } = createAgent();

    const result = await agent.processQuery({ query: "   " });

    expect(result).toMatchObject({
      status: "error",
      error: "Invalid input: query: query must not be empty",
      contextUsed: 0,
    });
    expect(completion.complete).not.toHaveBeenCalled();
  });

  it("returns a validation error for a non-positive limit", async () => {
    const { agent } = createAgent();

    const result = await agent.processQuery({ query: "fever", limit: 0 });

    expect(result.status).toBe("error");
    expect(result.status === "error" ? result.error : "").toBe(
      "Invalid input: limit: limit must be positive"
    );
  });
});

// ---------------------------------------------------------------------------
// assessSymptoms
// ---------------------------------------------------------------------------

describe("HealthAgent.assessSymptoms", () => {
  it("succeeds on an empty store with no context", async () => {
    const { agent } = createAgent();

    const result = await agent.assessSymptoms({ symptoms: ["headache", "fever"], limit: 3 });

    expect(result.status).toBe("success");
    expect(result.contextUsed).toBe(0);
    expect(result.assessment.endsWith(DISCLAIMER_BLOCK)).toBe(true);
    expect(result.assessment.length).toBeGreaterThan(DISCLAIMER_BLOCK.length);
  });

  it("retrieves with the symptoms joined by spaces", async () => {
    const store = new InMemoryBackend(new HashingEmbedding());
    const search = vi.spyOn(store, "search");
    const { agent } = createAgent({ store });

    await agent.assessSymptoms({ symptoms: ["headache", "stiff neck"], limit: 3 });

    expect(search).toHaveBeenCalledWith("test_knowledge", "headache stiff neck", { nResults: 3 });
  });

  it("renders the symptoms into the user message", async () => {
    const { agent, completion } = createAgent();

    await agent.assessSymptoms({ symptoms: ["headache", "fever"] });

    const [messages] = completion.complete.mock.calls[0] ?? [];
    expect(messages?.[1]?.content.startsWith(
      "Based on the following symptoms: headache, fever\n"
    )).toBe(true);
  });

  it("rejects an empty symptom list", async () => {
    const { agent } = createAgent();

    const result = await agent.assessSymptoms({ symptoms: [] });

    expect(result).toMatchObject({
      status: "error",
      symptoms: [],
      contextUsed: 0,
      contextDocuments: [],
      error: "Invalid input: symptoms: symptoms must contain at least one entry",
    });
  });

  it("logs template failures as errors with the template prefix", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "healthdesk-agent-"));
    fs.writeFileSync(path.join(dir, "system.md"), "Base");
    fs.writeFileSync(path.join(dir, "symptom-assessment.md"), "{symptoms} {duration}");
    const { agent, logger } = createAgent({ promptsDir: dir });

    const result = await agent.assessSymptoms({ symptoms: ["cough"] });
    fs.rmSync(dir, { recursive: true, force: true });

    expect(result.status).toBe("error");
    expect(logger.error).toHaveBeenCalledWith(
      '[template] assessSymptoms: Template "symptom-assessment" references {duration} but no value was supplied'
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// lookupMedication
// ---------------------------------------------------------------------------

describe("HealthAgent.lookupMedication", () => {
  it("only uses documents from the medications category", async () => {
    const { agent } = await createSeededAgent();

    const result = await agent.lookupMedication({ medicationName: "headache fever" });

    expect(result.status).toBe("success");
    expect(result.medication).toBe("headache fever");
    expect(result.contextDocuments.map((item) => item.id)).toEqual(["ibu"]);
    expect(result.information.endsWith(DISCLAIMER_BLOCK)).toBe(true);
  });

  it("reports a completion failure as an error result", async () => {
    const { agent } = await createSeededAgent({ completion: failingCompletion() });

    const result = await agent.lookupMedication({ medicationName: "Ibuprofen" });

    expect(result.status).toBe("error");
    expect(result.information).toBe(
      "Error generating medication info: Completion request failed: 503"
    );
    expect(result.contextUsed).toBe(result.contextDocuments.length);
  });
});

// ---------------------------------------------------------------------------
// converse
// ---------------------------------------------------------------------------

describe("HealthAgent.converse", () => {
  it("answers a greeting on an empty store without context", async () => {
    const { agent } = createAgent();

    const result = await agent.converse({ messages: [{ role: "user", content: "hi" }] });

    expect(result.status).toBe("success");
    expect(result.contextUsed).toBe(0);
    expect(result.response.endsWith(DISCLAIMER_BLOCK)).toBe(true);
  });

  it("retrieves with the last user message", async () => {
    const store = new InMemoryBackend(new HashingEmbedding());
    const search = vi.spyOn(store, "search");
    const { agent } = createAgent({ store });

    await agent.converse({
      messages: [
        { role: "user", content: "I feel dizzy" },
        { role: "assistant", content: "Since when?" },
        { role: "user", content: "Since this morning" },
        { role: "assistant", content: "Anything else?" },
      ],
      limit: 2,
    });

    expect(search).toHaveBeenCalledWith("test_knowledge", "Since this morning", { nResults: 2 });
  });

  it("skips retrieval when there is no user message", async () => {
    const store = new InMemoryBackend(new HashingEmbedding());
    const search = vi.spyOn(store, "search");
    const { agent } = createAgent({ store });

    const result = await agent.converse({
      messages: [{ role: "assistant", content: "How can I help?" }],
      userContext: "Diabetic",
    });

    expect(search).not.toHaveBeenCalled();
    expect(result.contextDocuments.map((item) => item.id)).toEqual(["user_context"]);
  });

  it("forwards the filtered history after the system message", async () => {
    const { agent, completion } = createAgent();

    await agent.converse({
      messages: [
        { role: "user", content: "one" },
        { role: "function", content: "dropped" },
        { role: "assistant", content: "two" },
        { role: "user", content: "three" },
      ],
    });

    const [messages] = completion.complete.mock.calls[0] ?? [];
    expect(messages?.map((m) => m.role)).toEqual(["system", "user", "assistant", "user"]);
    expect(messages?.slice(1).map((m) => m.content)).toEqual(["one", "two", "three"]);
  });

  it("applies the configured history limit", async () => {
    const { agent, completion } = createAgent({ historyLimit: 1 });

    await agent.converse({
      messages: [
        { role: "user", content: "one" },
        { role: "assistant", content: "two" },
        { role: "user", content: "three" },
      ],
    });

    const [messages] = completion.complete.mock.calls[0] ?? [];
    expect(messages?.slice(1)).toEqual([{ role: "user", content: "three" }]);
  });

  it("rejects an empty conversation", async () => {
    const { agent } = createAgent();

    const result = await agent.converse({ messages: [] });

    expect(result).toMatchObject({
      status: "error",
      contextUsed: 0,
      response: "Error in conversation: Invalid input: messages: messages must contain at least one message",
    });
  });
});

// ---------------------------------------------------------------------------
// Count invariant and containment across all generating operations
// ---------------------------------------------------------------------------

describe("HealthAgent result invariants", () => {
  it("keeps contextUsed equal to contextDocuments.length on every path", async () => {
    const ok = await createSeededAgent();
    const failing = await createSeededAgent({ completion: failingCompletion() });

    for (const { agent } of [ok, failing]) {
      const results = [
        await agent.processQuery({ query: "fever", userContext: "note" }),
        await agent.assessSymptoms({ symptoms: ["fever"] }),
        await agent.lookupMedication({ medicationName: "ibuprofen" }),
        await agent.converse({ messages: [{ role: "user", content: "fever" }] }),
      ];
      for (const result of results) {
        expect(result.contextUsed).toBe(result.contextDocuments.length);
      }
    }
  });

  it("never throws when the completion backend fails", async () => {
    const { agent } = await createSeededAgent({ completion: failingCompletion() });

    const statuses = [
      (await agent.processQuery({ query: "fever" })).status,
      (await agent.assessSymptoms({ symptoms: ["fever"] })).status,
      (await agent.lookupMedication({ medicationName: "ibuprofen" })).status,
      (await agent.converse({ messages: [{ role: "user", content: "fever" }] })).status,
    ];

    expect(statuses).toEqual(["error", "error", "error", "error"]);
  });

  it("appends the disclaimer exactly once", async () => {
    const { agent } = await createSeededAgent();

    const result = await agent.processQuery({ query: "fever" });

    expect(result.response.split(DISCLAIMER_BLOCK)).toHaveLength(2);
  });
});

// ---------------------------------------------------------------------------
// Knowledge operations
// ---------------------------------------------------------------------------

describe("HealthAgent knowledge operations", () => {
  it("ingests documents and reports their ids", async () => {
    const { agent } = createAgent();

    const result = await agent.ingest([
      { id: "a", text: "Sleep 7-9 hours", metadata: { category: "lifestyle" } },
      { id: "b", text: "Eat vegetables" },
    ]);

    expect(result).toEqual({
      status: "success",
      documentsAdded: 2,
      documentIds: ["a", "b"],
      message: "Successfully added 2 healthcare documents to knowledge base",
    });
  });

  it("reports a duplicate ingest as an error with zero added", async () => {
    const { agent } = await createSeededAgent();

    const result = await agent.ingest([{ id: "htn", text: "again" }]);

    expect(result.status).toBe("error");
    expect(result.documentsAdded).toBe(0);
    expect(result.message.startsWith("Error adding documents: Documents already exist")).toBe(true);
  });

  it("rejects documents with empty text", async () => {
    const { agent } = createAgent();

    const result = await agent.ingest([{ text: "" }]);

    expect(result.status === "error" ? result.error : "").toBe(
      "Invalid input: 0.text: text must not be empty"
    );
  });

  it("computes stats with uncategorized documents", async () => {
    const { agent } = await createSeededAgent();

    const result = await agent.knowledgeStats();

    expect(result).toEqual({
      status: "success",
      totalDocuments: 5,
      categories: ["diseases", "lifestyle", "medications", "symptoms"],
      categoryCounts: {
        diseases: 1,
        symptoms: 1,
        medications: 1,
        lifestyle: 1,
        uncategorized: 1,
      },
      collectionName: "test_knowledge",
    });
  });

  it("reads the collection once for counts and categories", async () => {
    const { agent, knowledgeBase } = await createSeededAgent();
    const listAll = vi.spyOn(knowledgeBase, "listAll");

    const result = await agent.knowledgeStats();

    expect(listAll).toHaveBeenCalledTimes(1);
    expect(result.categories).toEqual(["diseases", "lifestyle", "medications", "symptoms"]);
  });

  it("reports empty stats after clearing", async () => {
    const { agent } = await createSeededAgent();

    const cleared = await agent.clearKnowledge();
    const stats = await agent.knowledgeStats();

    expect(cleared).toEqual({
      status: "success",
      documentsRemoved: 5,
      message: "Healthcare knowledge base cleared successfully",
    });
    expect(stats).toEqual({
      status: "success",
      totalDocuments: 0,
      categories: [],
      categoryCounts: {},
      collectionName: "test_knowledge",
    });
  });

  it("finds the single matching document by category", async () => {
    const { agent } = createAgent();
    await agent.ingest([
      { text: "Hypertension is high blood pressure", metadata: { category: "diseases" } },
    ]);

    const result = await agent.searchByCategory("blood pressure", "diseases", 5);

    expect(result.status).toBe("success");
    expect(result.count).toBe(1);
    expect(result.results[0]?.text).toBe("Hypertension is high blood pressure");
    expect(result.results[0]?.distance).toBeGreaterThanOrEqual(0);
  });

  it("only returns documents of the searched category", async () => {
    const { agent } = await createSeededAgent();

    for (const category of ["diseases", "symptoms", "medications", "lifestyle"]) {
      const result = await agent.search({ query: "blood pressure fever", limit: 10, category });
      expect(result.results.every((r) => r.metadata.category === category)).toBe(true);
    }
  });

  it("reports search failures as error results", async () => {
    const { agent } = createAgent({ store: createFailingSearchStore() });

    const result = await agent.search({ query: "fever" });

    expect(result).toEqual({
      status: "error",
      query: "fever",
      category: null,
      results: [],
      count: 0,
      error: "Search failed: connection refused",
    });
  });

  it("lists documents by category", async () => {
    const { agent } = await createSeededAgent();

    const result = await agent.listByCategory("lifestyle");

    expect(result.count).toBe(1);
    expect(result.documents[0]?.id).toBe("walk");
  });

  it("deletes documents and reports unknown ids", async () => {
    const { agent } = await createSeededAgent();

    expect(await agent.deleteDocument("flu")).toEqual({ status: "success", id: "flu", deleted: true });
    expect(await agent.deleteDocument("flu")).toEqual({ status: "success", id: "flu", deleted: false });
  });
});

// ---------------------------------------------------------------------------
// Untyped callers
// ---------------------------------------------------------------------------

describe("HealthAgent with input from untyped callers", () => {
  it("returns a validation error when symptoms is not a list", async () => {
    const { agent, completion } = createAgent();
    const input = JSON.parse('{"symptoms":"fever"}');

    const result = await agent.assessSymptoms(input);

    expect(result).toMatchObject({
      status: "error",
      error: "Invalid input: symptoms: Expected array, received string",
      contextUsed: 0,
    });
    expect(completion.complete).not.toHaveBeenCalled();
  });

  it("returns a validation error when messages is not a list", async () => {
    const { agent } = createAgent();
    const input = JSON.parse('{"messages":"hello"}');

    const result = await agent.converse(input);

    expect(result).toMatchObject({
      status: "error",
      error: "Invalid input: messages: Expected array, received string",
      response: "Error in conversation: Invalid input: messages: Expected array, received string",
    });
  });
});
