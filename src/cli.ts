/**
 * cli.ts - Command definitions for the healthdesk CLI
 *
 * Builds the commander program. src/index.ts runs it against process.argv;
 * tests run it with their own agent and capture the output.
 *
 *   healthdesk ask "What helps with a tension headache?" --category symptoms
 *   healthdesk assess fever headache "stiff neck"
 *   healthdesk medication ibuprofen
 *   healthdesk chat
 *   healthdesk ingest data/sample-knowledge.json
 *   healthdesk stats | search <query> | list <category> | delete <id> | clear --yes
 *   healthdesk serve
 *
 * Every command returns an exit code instead of calling process.exit, so a
 * failed agent result, a bad config and a usage error all come back to the
 * caller as a number.
 */

import * as fs from "fs";
import * as readline from "readline";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { z } from "zod";
import type { ConversationMessage, HealthAgent } from "./agent";
import { documentInputSchema } from "./agent";
import { createHealthAgent } from "./bootstrap";
import { loadConfig, publicConfig } from "./config";
import type { AppConfig } from "./config";
import { ConfigError, describeError } from "./errors";
import { createHttpServer, startHttpServer } from "./server/http-server";
import { formatContextSources, formatSearchResults, formatStats } from "./tools/format-results";
import { flushTracing, initTracing } from "./tracing";

export interface CliIO {
  log(message: string): void;
  error(message: string): void;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  io?: CliIO;
  /** Builds the agent from the loaded config; defaults to createHealthAgent */
  createAgent?: (config: AppConfig) => HealthAgent;
  /** Line source for `chat`; defaults to stdin */
  input?: NodeJS.ReadableStream;
}

/** A file of documents is either a bare array or `{ "documents": [...] }` */
const documentsFileSchema = z.union([
  z.array(documentInputSchema),
  z.object({ documents: z.array(documentInputSchema) }).transform((file) => file.documents),
]);

const CHAT_EXIT_WORDS = new Set(["exit", "quit"]);

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return limit;
}

interface QueryOptions {
  category?: string;
  userContext?: string;
  limit?: number;
  retrieval: boolean;
  disclaimer: boolean;
}

/**
 * Runs the CLI once and resolves with the process exit code. `serve`
 * resolves once the server is listening and leaves it running.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const io = deps.io ?? {
    log: (message: string) => console.log(message),
    error: (message: string) => console.error(message),
  };
  const env = deps.env ?? process.env;
  const buildAgent = deps.createAgent ?? ((config: AppConfig) => createHealthAgent(config));

  let exitCode = 0;
  let loaded: { config: AppConfig; agent: HealthAgent } | null = null;

  /** Loads the config and builds the agent on first use */
  function setup(): { config: AppConfig; agent: HealthAgent } {
    if (!loaded) {
      const config = loadConfig(env);
      initTracing(env);
      loaded = { config, agent: buildAgent(config) };
    }
    return loaded;
  }

  const fail = (message: string) => {
    io.error(message);
    exitCode = 1;
  };

  const program = new Command();
  program
    .name("healthdesk")
    .description("Health questions answered from a curated knowledge base")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.log(text.trimEnd()),
      writeErr: (text) => io.error(text.trimEnd()),
    });

  // -------------------------------------------------------------------------
  // Generating commands
  // -------------------------------------------------------------------------

  program
    .command("ask")
    .description("Answer a health question")
    .argument("<question>", "The question to answer")
    .option("-c, --category <category>", "Only retrieve documents from this category")
    .option("-u, --user-context <text>", "Personal details to take into account")
    .option("-l, --limit <number>", "Documents to retrieve", parseLimit)
    .option("--no-retrieval", "Answer without searching the knowledge base")
    .option("--no-disclaimer", "Leave out the medical disclaimer")
    .action(async (question: string, options: QueryOptions) => {
      const { agent } = setup();
      const result = await agent.processQuery({
        query: question,
        category: options.category,
        userContext: options.userContext,
        limit: options.limit,
        includeContext: options.retrieval,
        includeDisclaimer: options.disclaimer,
      });
      if (result.status === "error") {
        fail(result.response);
        return;
      }
      io.log(result.response);
      const sources = formatContextSources(result.contextDocuments);
      if (sources) {
        io.log(`\n${sources}`);
      }
    });

  program
    .command("assess")
    .description("Give a general assessment of one or more symptoms")
    .argument("<symptoms...>", "Symptoms, one per argument")
    .option("-l, --limit <number>", "Documents to retrieve", parseLimit)
    .action(async (symptoms: string[], options: { limit?: number }) => {
      const { agent } = setup();
      const result = await agent.assessSymptoms({ symptoms, limit: options.limit });
      if (result.status === "error") {
        fail(result.assessment);
        return;
      }
      io.log(result.assessment);
    });

  program
    .command("medication")
    .description("Describe a medication")
    .argument("<name>", "Medication name")
    .option("-l, --limit <number>", "Documents to retrieve", parseLimit)
    .action(async (name: string, options: { limit?: number }) => {
      const { agent } = setup();
      const result = await agent.lookupMedication({ medicationName: name, limit: options.limit });
      if (result.status === "error") {
        fail(result.information);
        return;
      }
      io.log(result.information);
    });

  program
    .command("chat")
    .description("Hold a conversation; type exit or quit to leave")
    .option("-u, --user-context <text>", "Personal details to take into account")
    .option("-l, --limit <number>", "Documents to retrieve", parseLimit)
    .action(async (options: { userContext?: string; limit?: number }) => {
      const { agent } = setup();
      const messages: ConversationMessage[] = [];
      const lines = readline.createInterface({
        input: deps.input ?? process.stdin,
        terminal: false,
      });

      io.log("Ask a health question (exit to quit).");
      try {
        for await (const line of lines) {
          const text = line.trim();
          if (CHAT_EXIT_WORDS.has(text.toLowerCase())) break;
          if (!text) continue;

          messages.push({ role: "user", content: text });
          const result = await agent.converse({
            messages,
            userContext: options.userContext,
            limit: options.limit,
          });
          if (result.status === "error") {
            // Drop the failed turn so the next attempt starts clean
            messages.pop();
            io.error(result.response);
            continue;
          }
          messages.push({ role: "assistant", content: result.response });
          io.log(`\n${result.response}\n`);
        }
      } finally {
        lines.close();
      }
    });

  // -------------------------------------------------------------------------
  // Knowledge base commands
  // -------------------------------------------------------------------------

  program
    .command("ingest")
    .description("Add documents from a JSON file to the knowledge base")
    .argument("<file>", "JSON array of { id?, text, metadata? } documents")
    .action(async (file: string) => {
      let raw: unknown;
      try {
        raw = JSON.parse(fs.readFileSync(file, "utf8"));
      } catch (error) {
        fail(`Could not read ${file}: ${describeError(error)}`);
        return;
      }
      const parsed = documentsFileSchema.safeParse(raw);
      if (!parsed.success) {
        fail(`${file} is not a list of documents`);
        return;
      }

      const { agent } = setup();
      const result = await agent.ingest(parsed.data);
      if (result.status === "error") {
        fail(result.message);
        return;
      }
      io.log(result.message);
    });

  program
    .command("stats")
    .description("Count documents per category")
    .action(async () => {
      const { agent } = setup();
      const result = await agent.knowledgeStats();
      if (result.status === "error") {
        fail(`Error getting knowledge base stats: ${result.error}`);
        return;
      }
      io.log(formatStats(result));
    });

  program
    .command("search")
    .description("Similarity search without generating an answer")
    .argument("<query>", "Text to search for")
    .option("-c, --category <category>", "Only search this category")
    .option("-l, --limit <number>", "Maximum results", parseLimit)
    .action(async (query: string, options: { category?: string; limit?: number }) => {
      const { agent } = setup();
      const result = await agent.search({ query, category: options.category, limit: options.limit });
      if (result.status === "error") {
        fail(`Error searching knowledge base: ${result.error}`);
        return;
      }
      io.log(formatSearchResults(result.results, agent.collectionName));
    });

  program
    .command("list")
    .description("List the documents in one category")
    .argument("<category>", "Category name")
    .action(async (category: string) => {
      const { agent } = setup();
      const result = await agent.listByCategory(category);
      if (result.status === "error") {
        fail(`Error listing documents: ${result.error}`);
        return;
      }
      io.log(`${result.count} document${result.count === 1 ? "" : "s"} in "${category}":`);
      for (const doc of result.documents) {
        io.log(`- ${doc.id}: ${doc.text}`);
      }
    });

  program
    .command("delete")
    .description("Delete one document by id")
    .argument("<id>", "Document id")
    .action(async (id: string) => {
      const { agent } = setup();
      const result = await agent.deleteDocument(id);
      if (result.status === "error") {
        fail(`Error deleting document: ${result.error}`);
      } else if (!result.deleted) {
        fail(`No document with id "${id}"`);
      } else {
        io.log(`Deleted document "${id}"`);
      }
    });

  program
    .command("clear")
    .description("Delete every document in the knowledge base")
    .option("-y, --yes", "Confirm deletion")
    .action(async (options: { yes?: boolean }) => {
      if (!options.yes) {
        fail("Refusing to clear the knowledge base without --yes");
        return;
      }
      const { agent } = setup();
      const result = await agent.clearKnowledge();
      if (result.status === "error") {
        fail(result.message);
        return;
      }
      io.log(`${result.message} (${result.documentsRemoved} removed)`);
    });

  // -------------------------------------------------------------------------
  // HTTP API
  // -------------------------------------------------------------------------

  program
    .command("serve")
    .description("Start the HTTP API")
    .option("-v, --verbose", "Log every request")
    .action(async (options: { verbose?: boolean }) => {
      const { config, agent } = setup();
      const server = createHttpServer({
        agent,
        publicConfig: publicConfig(config),
        verbose: options.verbose,
      });

      const shutdown = () => {
        server
          .close()
          .then(() => flushTracing())
          .catch((error: unknown) => console.error("Error during shutdown:", describeError(error)));
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);

      await startHttpServer(server, config.server.host, config.server.port);
    });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit with 0
      return error.exitCode;
    }
    if (error instanceof ConfigError) {
      io.error(error.message);
      return 1;
    }
    throw error;
  }

  return exitCode;
}
