/**
 * seed-knowledge.ts - Loads the sample documents into the knowledge base
 *
 * Reads data/sample-knowledge.json and adds it to the configured collection,
 * then runs one search to show retrieval works end to end.
 *
 * Usage:
 *   npx tsx scripts/seed-knowledge.ts           # add the sample documents
 *   npx tsx scripts/seed-knowledge.ts --reset   # clear the collection first
 */

import * as fs from "fs";
import * as path from "path";
import { ingestSchema } from "../src/agent";
import { createHealthAgent } from "../src/bootstrap";
import { loadConfig } from "../src/config";
import { describeError } from "../src/errors";
import { formatSearchResults, formatStats } from "../src/tools/format-results";

const SAMPLE_FILE = path.join(__dirname, "../data/sample-knowledge.json");

async function main(): Promise<number> {
  const config = loadConfig();
  const agent = createHealthAgent(config);

  if (process.argv.includes("--reset")) {
    const cleared = await agent.clearKnowledge();
    console.log(cleared.message);
    if (cleared.status === "error") return 1;
  }

  const documents = ingestSchema.parse(JSON.parse(fs.readFileSync(SAMPLE_FILE, "utf8")));
  console.log(`Adding ${documents.length} sample documents to "${agent.collectionName}"...`);
  const added = await agent.ingest(documents);
  console.log(added.message);
  if (added.status === "error") {
    console.log("Run with --reset to replace the existing documents.");
    return 1;
  }

  const stats = await agent.knowledgeStats();
  if (stats.status === "success") {
    console.log(`\n${formatStats(stats)}`);
  }

  console.log("\nVerification search: 'high blood pressure'");
  const search = await agent.search({ query: "high blood pressure", limit: 3 });
  if (search.status === "error") {
    console.error(`Search failed: ${search.error}`);
    return 1;
  }
  console.log(formatSearchResults(search.results, agent.collectionName));
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Seeding failed: ${describeError(error)}`);
    process.exit(1);
  });
