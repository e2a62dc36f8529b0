/**
 * Markdown front-end.
 *
 * Tokenizes Markdown with markdown-it's CommonMark preset (plus the
 * `~~strikethrough~~` rule) into the flat token stream the block assembler
 * walks, and splits YAML frontmatter off Markdown files before tokenizing.
 */

import MarkdownIt from "markdown-it";
import { parse as parseYaml } from "yaml";

/**
 * A markdown-it token: open/close pairs for containers, `inline` tokens
 * carrying `children`, leaf tokens for fences and rules.
 */
export type MarkdownToken = ReturnType<MarkdownIt["parse"]>[number];

export interface FrontmatterExtractionResult {
  frontmatter: Record<string, unknown>;
  /** Everything after the closing delimiter's line */
  body: string;
}

const tokenizer = new MarkdownIt("commonmark").enable("strikethrough");

const CLOSING_DELIMITER = /\n---(?=\n|$)/;

/**
 * Tokenizes Markdown into markdown-it's flat token stream.
 *
 * @example
 * ```ts
 * const tokens = tokenizeMarkdown("# Hello");
 * // tokens.map((t) => t.type) = ["heading_open", "inline", "heading_close"]
 * ```
 */
export function tokenizeMarkdown(markdown: string): MarkdownToken[] {
  return tokenizer.parse(markdown, {});
}

/**
 * Splits a leading `---` delimited YAML block off a Markdown file.
 *
 * Line endings are normalized to `\n` first. Without a complete block, or
 * when the YAML does not parse, the frontmatter is `{}` and the body is the
 * whole (normalized) input. So is a block whose YAML is not a mapping, such
 * as `---\nIntro\n---`, which Markdown reads as a rule and a setext heading.
 *
 * @example
 * ```ts
 * extractFrontmatter("---\ntitle: Hello\n---\n# Content");
 * // { frontmatter: { title: "Hello" }, body: "# Content" }
 * ```
 */
export function extractFrontmatter(content: string): FrontmatterExtractionResult {
  const normalized = content.replace(/\r\n/g, "\n");

  if (!normalized.startsWith("---\n")) {
    return { frontmatter: {}, body: normalized };
  }

  // The closing delimiter is a line holding exactly "---"; "---\n---" puts
  // it at index 3
  const closing = CLOSING_DELIMITER.exec(normalized.slice(3));
  if (!closing) {
    return { frontmatter: {}, body: normalized };
  }
  const closingIndex = closing.index + 3;

  const yamlContent = normalized.slice(4, closingIndex);

  let frontmatter: Record<string, unknown> = {};
  if (yamlContent.trim()) {
    let parsed: unknown;
    try {
      parsed = parseYaml(yamlContent);
    } catch (error) {
      console.warn(
        `[markdown-parser] Failed to parse frontmatter YAML, treating as no frontmatter: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
      return { frontmatter: {}, body: normalized };
    }
    // Not a mapping: the delimiters are thematic breaks of the document
    if (!isRecord(parsed)) {
      return { frontmatter: {}, body: normalized };
    }
    frontmatter = parsed;
  }

  let body = normalized.slice(closingIndex + 4);
  if (body.startsWith("\n")) {
    body = body.slice(1);
  }

  return { frontmatter, body };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
