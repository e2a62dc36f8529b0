/**
 * Command-line argument parsing for the notion-md CLI.
 */

import { DEFAULT_SEARCH_LIMIT, UsageError } from "./commands.js";

export const VERSION = "0.1.0";

export type CliCommand = "push" | "pull" | "search";

const COMMANDS: readonly CliCommand[] = ["push", "pull", "search"];

export interface CliArgs {
  command: CliCommand | null;
  /** Positional argument: file (push), page (pull) or query (search) */
  target: string | null;
  page?: string;
  parent?: string;
  title?: string;
  output?: string;
  limit: number;
  help: boolean;
  version: boolean;
}

/**
 * Parses argv (without the node and script entries).
 *
 * @throws UsageError for unknown commands or options missing their value
 *
 * @example
 * ```ts
 * parseArgs(["push", "README.md", "-p", "https://notion.so/Page-0123..."]);
 * // { command: "push", target: "README.md", page: "https://notion.so/Page-0123...", ... }
 * ```
 */
export function parseArgs(args: readonly string[]): CliArgs {
  const result: CliArgs = {
    command: null,
    target: null,
    limit: DEFAULT_SEARCH_LIMIT,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    const takeValue = (): string => {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("-")) {
        throw new UsageError(`${arg} requires a value`);
      }
      i++;
      return value;
    };

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--page" || arg === "-p") {
      result.page = takeValue();
    } else if (arg === "--parent") {
      result.parent = takeValue();
    } else if (arg === "--title" || arg === "-t") {
      result.title = takeValue();
    } else if (arg === "--output" || arg === "-o") {
      result.output = takeValue();
    } else if (arg === "--limit" || arg === "-n") {
      const raw = takeValue();
      const limit = parseInt(raw, 10);
      if (!/^\d+$/.test(raw) || limit < 1) {
        throw new UsageError(`${arg} must be a positive integer (got "${raw}")`);
      }
      result.limit = limit;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (result.command === null) {
      result.command = toCommand(arg);
    } else if (result.target === null) {
      result.target = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  return result;
}

function toCommand(value: string): CliCommand {
  const command = COMMANDS.find((candidate) => candidate === value);
  if (!command) {
    throw new UsageError(`Unknown command: ${value}`);
  }
  return command;
}

export const HELP_TEXT = `
notion-md ${VERSION} - Convert between Markdown files and Notion pages

Usage:
  notion-md <command> [options]

Commands:
  push <file>     Push a Markdown file to Notion
                  --page, -p <id-or-url>   Replace the content of an existing page
                  --parent <id-or-url>     Create a new child page instead
                  --title, -t <title>      Title for the new page
                                           (default: frontmatter title, first H1
                                           or file name)
  pull <page>     Export a Notion page (ID or URL) to Markdown
                  --output, -o <file>      Write to a file (default: stdout)
  search <query>  Search Notion pages by title
                  --limit, -n <n>          Max results to show (default: ${DEFAULT_SEARCH_LIMIT})

Options:
  --help, -h      Show this help message
  --version, -v   Show the version

Environment Variables (also read from ./.env; set variables take precedence):
  NOTION_TOKEN                  Notion integration token (required)
                                Create at: https://www.notion.so/my-integrations
  NOTION_MIN_REQUEST_INTERVAL   Minimum ms between API requests (default: 334)
  NOTION_MAX_RETRIES            Retries on rate limiting (default: 3)

Examples:
  notion-md push README.md -p "https://notion.so/My-Page-0123456789abcdef0123456789abcdef"
  notion-md push guide.md --parent 0123456789abcdef0123456789abcdef --title "Guide"
  notion-md pull 0123456789abcdef0123456789abcdef -o page.md
  notion-md search "my notes" -n 5
`;
