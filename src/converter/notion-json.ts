/**
 * Conversion between the block model and Notion's JSON block shape.
 *
 * Encoding produces creation payloads for `pages.create` and
 * `blocks.children.append`:
 *   `{ object: "block", type, [type]: { rich_text, ...kind fields } }`
 *
 * Decoding reads blocks as returned by `blocks.children.list` (or any
 * object of the same shape). Only the ten supported kinds are read; other
 * block types are skipped with a warning, and annotations Markdown cannot
 * express (underline, color) are dropped.
 */

import type {
  Annotation,
  Annotations,
  Block,
  NotionBlockJson,
  NotionRichTextJson,
  Run,
} from "../types.js";
import {
  code,
  divider,
  heading,
  listItem,
  paragraph,
  quote,
  textRun,
  toDo,
} from "./blocks.js";
import { blocksToMarkdown } from "./blocks-to-md.js";
import { markdownToBlocks } from "./md-to-blocks.js";
import { richTextToPlainText } from "./rich-text.js";

const ANNOTATION_KEYS: readonly Annotation[] = [
  "bold",
  "italic",
  "strikethrough",
  "code",
];

// =============================================================================
// Encoding
// =============================================================================

/**
 * Converts a run to a Notion rich text item.
 */
export function runToNotion(run: Run): NotionRichTextJson {
  const item: NotionRichTextJson = {
    type: "text",
    text: { content: run.text },
    plain_text: run.text,
    href: run.link ?? null,
  };

  if (run.link) {
    item.text.link = { url: run.link };
  }

  const annotations = pickAnnotations(run.annotations);
  if (Object.keys(annotations).length > 0) {
    item.annotations = annotations;
  }

  return item;
}

export function runsToNotion(runs: readonly Run[]): NotionRichTextJson[] {
  return runs.map(runToNotion);
}

/**
 * Converts a block to a Notion block payload.
 */
export function blockToNotion(block: Block): NotionBlockJson {
  switch (block.type) {
    case "paragraph":
      return { object: "block", type: "paragraph", paragraph: { rich_text: runsToNotion(block.richText) } };
    case "heading_1":
      return { object: "block", type: "heading_1", heading_1: { rich_text: runsToNotion(block.richText) } };
    case "heading_2":
      return { object: "block", type: "heading_2", heading_2: { rich_text: runsToNotion(block.richText) } };
    case "heading_3":
      return { object: "block", type: "heading_3", heading_3: { rich_text: runsToNotion(block.richText) } };
    case "bulleted_list_item":
      return {
        object: "block",
        type: "bulleted_list_item",
        bulleted_list_item: { rich_text: runsToNotion(block.richText) },
      };
    case "numbered_list_item":
      return {
        object: "block",
        type: "numbered_list_item",
        numbered_list_item: { rich_text: runsToNotion(block.richText) },
      };
    case "quote":
      return { object: "block", type: "quote", quote: { rich_text: runsToNotion(block.richText) } };
    case "code":
      return {
        object: "block",
        type: "code",
        code: { rich_text: runsToNotion(block.richText), language: block.language },
      };
    case "to_do":
      return {
        object: "block",
        type: "to_do",
        to_do: { rich_text: runsToNotion(block.richText), checked: block.checked },
      };
    case "divider":
      return { object: "block", type: "divider", divider: {} };
  }
}

export function blocksToNotion(blocks: readonly Block[]): NotionBlockJson[] {
  return blocks.map(blockToNotion);
}

/**
 * Parses Markdown straight into Notion block payloads.
 */
export function markdownToNotionBlocks(markdown: string): NotionBlockJson[] {
  return blocksToNotion(markdownToBlocks(markdown));
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Reads a Notion rich text item. The text is `plain_text`, falling back to
 * `text.content`; the link is `href`, falling back to `text.link.url`.
 * Returns null for items without text.
 */
export function runFromNotion(item: unknown): Run | null {
  if (!isRecord(item)) {
    return null;
  }

  const textObject = isRecord(item.text) ? item.text : {};
  const text = nonEmptyString(item.plain_text) ?? nonEmptyString(textObject.content);
  if (text === null) {
    return null;
  }

  const linkObject = isRecord(textObject.link) ? textObject.link : {};
  const link = nonEmptyString(item.href) ?? nonEmptyString(linkObject.url);

  const annotations = isRecord(item.annotations) ? pickAnnotations(item.annotations) : {};

  return textRun(text, annotations, link);
}

export function runsFromNotion(items: unknown): Run[] {
  if (!Array.isArray(items)) {
    return [];
  }

  const runs: Run[] = [];
  for (const item of items) {
    const run = runFromNotion(item);
    if (run) {
      runs.push(run);
    }
  }
  return runs;
}

/**
 * Reads a Notion block. Returns null (and warns) for block types outside
 * the supported set.
 *
 * @example
 * ```ts
 * blockFromNotion({
 *   type: "heading_1",
 *   heading_1: { rich_text: [{ plain_text: "Hello" }] },
 * });
 * // { type: "heading_1", richText: [{ text: "Hello", annotations: {} }] }
 * ```
 */
export function blockFromNotion(value: unknown): Block | null {
  if (!isRecord(value) || typeof value.type !== "string") {
    console.warn("[notion-json] Skipping value that is not a block");
    return null;
  }

  const type = value.type;
  const content = isRecord(value[type]) ? value[type] : {};
  const richText = runsFromNotion(content.rich_text);

  switch (type) {
    case "paragraph":
      return paragraph(richText);
    case "heading_1":
      return heading(1, richText);
    case "heading_2":
      return heading(2, richText);
    case "heading_3":
      return heading(3, richText);
    case "bulleted_list_item":
    case "numbered_list_item":
      return listItem(type, richText);
    case "quote":
      return quote(richText);
    case "code":
      return code(
        richTextToPlainText(richText),
        typeof content.language === "string" ? content.language : null
      );
    case "to_do":
      return toDo(richText, content.checked === true);
    case "divider":
      return divider();
    default:
      console.warn(
        `[notion-json] Skipping unsupported block type: ${type}${
          typeof value.id === "string" ? ` (${value.id})` : ""
        }`
      );
      return null;
  }
}

/**
 * Reads Notion blocks, dropping the unsupported ones.
 */
export function blocksFromNotion(values: readonly unknown[]): Block[] {
  const blocks: Block[] = [];
  for (const value of values) {
    const block = blockFromNotion(value);
    if (block) {
      blocks.push(block);
    }
  }
  return blocks;
}

/**
 * Converts Notion blocks straight to Markdown.
 */
export function notionBlocksToMarkdown(values: readonly unknown[]): string {
  return blocksToMarkdown(blocksFromNotion(values));
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Keeps the four supported annotation flags that are set to `true`.
 */
function pickAnnotations(source: Readonly<Record<string, unknown>>): Annotations {
  const annotations: Annotations = {};
  for (const key of ANNOTATION_KEYS) {
    if (source[key] === true) {
      annotations[key] = true;
    }
  }
  return annotations;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value !== "" ? value : null;
}
