#!/usr/bin/env node

/**
 * CLI entry point for notion-md.
 *
 * Commands:
 * - `push <file>`: Markdown file → Notion page (update or create child)
 * - `pull <page>`: Notion page → Markdown (file or stdout)
 * - `search <query>`: list pages matching a title
 *
 * Configuration via environment variables, or a `.env` file in the working
 * directory; see `config.ts`.
 */

import { HELP_TEXT, VERSION, parseArgs, type CliArgs } from "./cli-args.js";
import { UsageError, runPull, runPush, runSearch } from "./commands.js";
import { loadConfig, loadEnvFile } from "./config.js";
import { NotionClientWrapper } from "./notion/client.js";
import { NotionWriter } from "./sync/notion-writer.js";

function createClient(): NotionClientWrapper {
  const config = loadConfig();
  return new NotionClientWrapper({
    token: config.notionToken,
    minRequestInterval: config.minRequestInterval,
    maxRetries: config.maxRetries,
  });
}

function requireTarget(args: CliArgs, name: string): string {
  if (!args.target) {
    throw new UsageError(`${args.command} requires a ${name} argument`);
  }
  return args.target;
}

async function main(): Promise<void> {
  // Skip node and script path
  const args = parseArgs(process.argv.slice(2));

  if (args.version) {
    console.log(VERSION);
    return;
  }

  if (args.help || !args.command) {
    console.log(HELP_TEXT);
    process.exitCode = args.help ? 0 : 1;
    return;
  }

  await loadEnvFile();

  switch (args.command) {
    case "push": {
      const file = requireTarget(args, "file");
      const writer = new NotionWriter(createClient());
      await runPush(writer, {
        file,
        page: args.page,
        parent: args.parent,
        title: args.title,
      });
      break;
    }
    case "pull": {
      const page = requireTarget(args, "page");
      await runPull(createClient(), { page, output: args.output });
      break;
    }
    case "search": {
      const query = requireTarget(args, "query");
      await runSearch(createClient(), { query, limit: args.limit });
      break;
    }
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof UsageError) {
    console.error("Run with --help for usage information.");
  }
  process.exit(1);
});
