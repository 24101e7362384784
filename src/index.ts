#!/usr/bin/env node

/**
 * response-judge - Entry Point
 *
 * Reads an input message and two candidate outputs from text files and asks
 * the Perplexity API which output is better.
 */

import { loadDotEnv } from './config.js';
import { runCli } from './presentation/Cli.js';

async function main() {
  loadDotEnv();

  // Ctrl+C aborts the in-flight request; runCli reports the cancellation
  const controller = new AbortController();
  const cancel = () => controller.abort();
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  const exitCode = await runCli(process.argv.slice(2), { abortSignal: controller.signal });
  process.exit(exitCode);
}

main().catch((error: unknown) => {
  console.error('Fatal error in main():', error);
  process.exit(1);
});
