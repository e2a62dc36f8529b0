/**
 * CLI command implementations.
 *
 * Each command takes its Notion collaborators as arguments so it can run
 * against stand-ins in tests. Progress goes to stderr when stdout may carry
 * Markdown.
 */

import { markdownToBlocks } from "./converter/md-to-blocks.js";
import { notionBlocksToMarkdown } from "./converter/notion-json.js";
import type { NotionClientWrapper } from "./notion/client.js";
import { compactPageId, parsePageId } from "./notion/page-id.js";
import { getPageTitle } from "./notion/types.js";
import { readMarkdownSource } from "./sync/file-reader.js";
import { writeMarkdownFile } from "./sync/file-writer.js";
import type { NotionWriter } from "./sync/notion-writer.js";

export const DEFAULT_SEARCH_LIMIT = 20;

/**
 * Error thrown for invalid command-line usage.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface PushOptions {
  /** Markdown file to push */
  file: string;
  /** Existing page to overwrite (ID or URL) */
  page?: string;
  /** Parent page to create a child under (ID or URL) */
  parent?: string;
  /** Title for a new child page */
  title?: string;
}

export type PushResult =
  | { mode: "updated"; pageId: string; blockCount: number }
  | { mode: "created"; pageId: string; title: string; url: string; blockCount: number };

/**
 * Pushes a Markdown file to Notion: replaces an existing page's content
 * (`page`) or creates a new child page (`parent`).
 */
export async function runPush(writer: NotionWriter, options: PushOptions): Promise<PushResult> {
  const target = resolvePushTarget(options);

  const source = await readMarkdownSource(options.file);
  const blocks = markdownToBlocks(source.body, { taskLists: true });

  if (target.kind === "page") {
    console.log(`Updating page: ${target.pageId.slice(0, 8)}...`);
    await writer.replacePageContent(target.pageId, blocks);
    console.log(`Done! Updated page with content from ${options.file}`);
    return { mode: "updated", pageId: target.pageId, blockCount: blocks.length };
  }

  const title = options.title ?? source.title;
  console.log(`Creating page '${title}' under ${target.parentId.slice(0, 8)}...`);
  const newId = await writer.createChildPage(target.parentId, title, blocks);
  const url = `https://notion.so/${compactPageId(newId)}`;
  console.log(`Done! Created page: ${url}`);
  return { mode: "created", pageId: newId, title, url, blockCount: blocks.length };
}

/**
 * Checks that exactly one of `page`/`parent` is given and parses it.
 */
function resolvePushTarget(
  options: PushOptions
): { kind: "page"; pageId: string } | { kind: "parent"; parentId: string } {
  if (options.page && options.parent) {
    throw new UsageError("Cannot specify both --page and --parent");
  }
  if (options.page) {
    return { kind: "page", pageId: parsePageId(options.page) };
  }
  if (options.parent) {
    return { kind: "parent", parentId: parsePageId(options.parent) };
  }
  throw new UsageError("Must specify --page (update) or --parent (create)");
}

export interface PullOptions {
  /** Page to export (ID or URL) */
  page: string;
  /** File to write; stdout when omitted */
  output?: string;
}

/**
 * Exports a Notion page to Markdown.
 *
 * @returns The Markdown produced
 */
export async function runPull(client: NotionClientWrapper, options: PullOptions): Promise<string> {
  const pageId = parsePageId(options.page);

  console.error(`Fetching page: ${pageId.slice(0, 8)}...`);
  const blocks = await client.getBlockTree(pageId);
  const markdown = notionBlocksToMarkdown(blocks);

  if (options.output) {
    await writeMarkdownFile(options.output, markdown);
    console.error(`Done! Saved to ${options.output}`);
  } else {
    console.log(markdown);
  }

  return markdown;
}

export interface SearchOptions {
  query: string;
  /** Maximum results to list (default: 20) */
  limit?: number;
}

export interface SearchHit {
  id: string;
  title: string;
}

/**
 * Searches Notion pages by title and prints `ID  Title` lines.
 *
 * @returns Every match, including those beyond the display limit
 */
export async function runSearch(
  client: NotionClientWrapper,
  options: SearchOptions
): Promise<SearchHit[]> {
  const limit = options.limit ?? DEFAULT_SEARCH_LIMIT;

  console.error(`Searching for: ${options.query}...`);
  const pages = await client.searchPages(options.query);
  const hits = pages.map((page) => ({ id: page.id, title: getPageTitle(page) }));

  if (hits.length === 0) {
    console.log("No pages found.");
    return hits;
  }

  console.log(`\nFound ${hits.length} pages:\n`);
  console.log(`${"ID".padEnd(36)}  Title`);
  console.log("-".repeat(70));

  for (const hit of hits.slice(0, limit)) {
    console.log(`${hit.id}  ${hit.title}`);
  }

  if (hits.length > limit) {
    console.log(`\n... and ${hits.length - limit} more (use -n to show more)`);
  }

  return hits;
}
