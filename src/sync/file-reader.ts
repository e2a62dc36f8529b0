/**
 * File reader for Markdown → Notion pushes.
 *
 * Reads a Markdown file, splits off its YAML frontmatter and works out the
 * title a new Notion page should get.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { extractFrontmatter } from "../parser/markdown-parser.js";
import type { MarkdownSource } from "../types.js";

const FIRST_H1 = /^#[ \t]+(.+)$/m;

/**
 * Reads a Markdown file for pushing to Notion.
 *
 * The title is, in order of preference: the frontmatter `title`, the text of
 * the first `# ` heading, or the file name without its extension.
 *
 * @param filePath - Path to the Markdown file
 *
 * @example
 * ```ts
 * const source = await readMarkdownSource("docs/guide.md");
 * // {
 * //   filePath: "docs/guide.md",
 * //   frontmatter: {},
 * //   body: "# User Guide\n\nWelcome.\n",
 * //   title: "User Guide"
 * // }
 * ```
 */
export async function readMarkdownSource(filePath: string): Promise<MarkdownSource> {
  const content = await fs.readFile(filePath, "utf-8");
  const { frontmatter, body } = extractFrontmatter(content);

  return {
    filePath,
    frontmatter,
    body,
    title: deriveTitle(frontmatter, body, filePath),
  };
}

/**
 * Picks a page title from frontmatter, the first H1, or the file name.
 */
export function deriveTitle(
  frontmatter: Record<string, unknown>,
  body: string,
  filePath: string
): string {
  const fromFrontmatter = frontmatter.title;
  if (typeof fromFrontmatter === "string" && fromFrontmatter.trim()) {
    return fromFrontmatter.trim();
  }

  const h1 = FIRST_H1.exec(body);
  if (h1) {
    return h1[1].trim();
  }

  return path.parse(filePath).name;
}
