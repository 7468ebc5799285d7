#!/usr/bin/env node
/**
 * index.ts - CLI entry point for healthdesk
 *
 * Runs the commands defined in cli.ts against process.argv. Spans still in
 * flight are flushed before the process exits; `serve` keeps the process
 * alive until SIGINT or SIGTERM.
 */

import { runCli } from "./cli";
import { describeError } from "./errors";
import { flushTracing } from "./tracing";

async function main(): Promise<void> {
  const code = await runCli(process.argv.slice(2));
  await flushTracing();
  process.exitCode = code;
}

main().catch((error: unknown) => {
  console.error("Error:", describeError(error));
  process.exit(1);
});
