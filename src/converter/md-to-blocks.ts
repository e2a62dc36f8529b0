/**
 * Markdown token stream to block converter.
 *
 * Walks the flat markdown-it token stream with an explicit cursor and groups
 * it into blocks. This is the reverse of `blocks-to-md.ts`'s
 * `blocksToMarkdown()`.
 *
 * Recognized patterns:
 * - heading_open … heading_close → heading_1/2/3 (levels 4-6 become heading_3)
 * - paragraph_open … paragraph_close → paragraph
 * - bullet_list_open … bullet_list_close → one bulleted_list_item per item
 * - ordered_list_open … ordered_list_close → one numbered_list_item per item
 * - fence / code_block → code
 * - blockquote_open … blockquote_close → one quote
 * - hr → divider
 *
 * Every other token is skipped. Nested lists are walked past and dropped:
 * only top-level items become blocks.
 */

import type {
  Block,
  ListItemBlock,
  MarkdownToBlocksOptions,
  Run,
} from "../types.js";
import { tokenizeMarkdown, type MarkdownToken } from "../parser/markdown-parser.js";
import { resolveInline } from "./md-to-rich-text.js";
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

/**
 * Blocks produced from the token at the cursor, and how many tokens they
 * used up.
 */
interface AssembleStep {
  blocks: Block[];
  consumed: number;
}

const TASK_MARKER = /^\[([ xX])\] /;

/**
 * Converts Markdown text to blocks.
 *
 * @example
 * ```ts
 * const blocks = markdownToBlocks("# Hello\n\nWorld");
 * // [
 * //   { type: "heading_1", richText: [{ text: "Hello", annotations: {} }] },
 * //   { type: "paragraph", richText: [{ text: "World", annotations: {} }] },
 * // ]
 * ```
 */
export function markdownToBlocks(
  markdown: string,
  options: MarkdownToBlocksOptions = {}
): Block[] {
  return assembleBlocks(tokenizeMarkdown(markdown), options);
}

/**
 * Groups a complete token stream for one document into blocks.
 */
export function assembleBlocks(
  tokens: readonly MarkdownToken[],
  options: MarkdownToBlocksOptions = {}
): Block[] {
  const blocks: Block[] = [];
  let i = 0;

  while (i < tokens.length) {
    const step = assembleAt(tokens, i, options);
    blocks.push(...step.blocks);
    i += step.consumed;
  }

  return blocks;
}

/**
 * Dispatches on the token at `index`.
 */
function assembleAt(
  tokens: readonly MarkdownToken[],
  index: number,
  options: MarkdownToBlocksOptions
): AssembleStep {
  const token = tokens[index];

  switch (token.type) {
    case "heading_open": {
      const level = parseInt(token.tag.slice(1), 10);
      return {
        blocks: [heading(level, inlineRunsAt(tokens, index + 1))],
        consumed: 3,
      };
    }

    case "paragraph_open":
      return {
        blocks: [paragraph(inlineRunsAt(tokens, index + 1))],
        consumed: 3,
      };

    case "bullet_list_open":
      return assembleList(tokens, index, "bulleted_list_item", options);

    case "ordered_list_open":
      return assembleList(tokens, index, "numbered_list_item", options);

    case "fence":
      return {
        blocks: [code(stripTrailingNewlines(token.content), token.info.trim())],
        consumed: 1,
      };

    case "code_block":
      return {
        blocks: [code(stripTrailingNewlines(token.content))],
        consumed: 1,
      };

    case "blockquote_open":
      return assembleBlockquote(tokens, index);

    case "hr":
      return { blocks: [divider()], consumed: 1 };

    default:
      return { blocks: [], consumed: 1 };
  }
}

/**
 * Converts a list starting at `start` (its list_open token).
 *
 * Each top-level item contributes the runs of its first paragraph; items
 * without a paragraph contribute nothing. A depth counter keeps the
 * open/close tokens of nested lists from ending the outer list early.
 */
function assembleList(
  tokens: readonly MarkdownToken[],
  start: number,
  type: ListItemBlock["type"],
  options: MarkdownToBlocksOptions
): AssembleStep {
  const blocks: Block[] = [];
  let i = start + 1;
  let depth = 1;

  while (i < tokens.length && depth > 0) {
    const token = tokens[i];

    if (isListOpen(token)) {
      depth++;
      i++;
    } else if (isListClose(token)) {
      depth--;
      i++;
    } else if (token.type === "list_item_open" && depth === 1) {
      const item = collectListItem(tokens, i + 1);
      if (item.richText !== null) {
        blocks.push(makeListItem(type, item.richText, options));
      }
      // Skip list_item_close
      i = item.end + 1;
    } else {
      i++;
    }
  }

  return { blocks, consumed: i - start };
}

/**
 * Reads one list item from just after its list_item_open up to its
 * list_item_close. Returns the first paragraph's runs (null when the item
 * has none) and the index of the list_item_close.
 */
function collectListItem(
  tokens: readonly MarkdownToken[],
  start: number
): { richText: Run[] | null; end: number } {
  let richText: Run[] | null = null;
  let i = start;

  while (i < tokens.length && tokens[i].type !== "list_item_close") {
    const token = tokens[i];

    if (token.type === "paragraph_open") {
      if (richText === null) {
        richText = inlineRunsAt(tokens, i + 1);
      }
      i += 3;
    } else if (isListOpen(token)) {
      i = skipNestedList(tokens, i);
    } else {
      i++;
    }
  }

  return { richText, end: i };
}

/**
 * Returns the index just past the nested list opened at `start`.
 */
function skipNestedList(tokens: readonly MarkdownToken[], start: number): number {
  let depth = 1;
  let i = start + 1;

  while (i < tokens.length && depth > 0) {
    if (isListOpen(tokens[i])) {
      depth++;
    } else if (isListClose(tokens[i])) {
      depth--;
    }
    i++;
  }

  return i;
}

/**
 * Builds a list item, or a to_do when task lists are enabled and a bulleted
 * item opens with a `[ ] ` / `[x] ` marker.
 */
function makeListItem(
  type: ListItemBlock["type"],
  richText: Run[],
  options: MarkdownToBlocksOptions
): Block {
  if (options.taskLists && type === "bulleted_list_item") {
    const task = parseTaskMarker(richText);
    if (task) {
      return toDo(task.richText, task.checked);
    }
  }
  return listItem(type, richText);
}

function parseTaskMarker(
  richText: Run[]
): { richText: Run[]; checked: boolean } | null {
  const [first, ...rest] = richText;
  if (!first || first.link || Object.keys(first.annotations).length > 0) {
    return null;
  }

  const match = TASK_MARKER.exec(first.text);
  if (!match) {
    return null;
  }

  const remainder = first.text.slice(match[0].length);
  return {
    richText: remainder ? [textRun(remainder), ...rest] : rest,
    checked: match[1] !== " ",
  };
}

/**
 * Converts a blockquote starting at `start` into a single quote block whose
 * runs are every top-level paragraph's runs, concatenated. Nested
 * blockquotes are tracked by depth and their paragraphs left out.
 */
function assembleBlockquote(
  tokens: readonly MarkdownToken[],
  start: number
): AssembleStep {
  const runs: Run[] = [];
  let i = start + 1;
  let depth = 1;

  while (i < tokens.length && depth > 0) {
    const token = tokens[i];

    if (token.type === "blockquote_open") {
      depth++;
      i++;
    } else if (token.type === "blockquote_close") {
      depth--;
      i++;
    } else if (token.type === "paragraph_open" && depth === 1) {
      runs.push(...inlineRunsAt(tokens, i + 1));
      i += 3;
    } else {
      i++;
    }
  }

  return {
    blocks: runs.length > 0 ? [quote(runs)] : [],
    consumed: i - start,
  };
}

/**
 * Resolves the runs of the inline token at `index`; anything else there
 * yields no runs.
 */
function inlineRunsAt(tokens: readonly MarkdownToken[], index: number): Run[] {
  const token: MarkdownToken | undefined = tokens[index];
  if (!token || token.type !== "inline") {
    return [];
  }
  return resolveInline(token.children ?? []);
}

function isListOpen(token: MarkdownToken): boolean {
  return token.type === "bullet_list_open" || token.type === "ordered_list_open";
}

function isListClose(token: MarkdownToken): boolean {
  return token.type === "bullet_list_close" || token.type === "ordered_list_close";
}

function stripTrailingNewlines(content: string): string {
  return content.replace(/\n+$/, "");
}
