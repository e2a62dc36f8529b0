/**
 * Blocks to Markdown converter.
 *
 * Renders each block to a Markdown fragment and joins the fragments:
 * - a blank line between blocks
 * - a single newline between consecutive list items (bulleted or numbered,
 *   in any mix)
 *
 * Blocks that render to an empty fragment (a paragraph or quote with no
 * text) are dropped without affecting the spacing of their neighbours.
 */

import type { Block, BlockType, CodeBlock, QuoteBlock } from "../types.js";
import { PLAIN_TEXT_LANGUAGE } from "../types.js";
import { isListItemType } from "./blocks.js";
import { renderRichText, richTextToPlainText } from "./rich-text.js";

/**
 * Fragments joined so far, and the type of the last block that produced one.
 */
interface JoinState {
  parts: string[];
  previousType: BlockType | null;
}

/**
 * Converts blocks to a Markdown string.
 *
 * @example
 * ```ts
 * const md = blocksToMarkdown([
 *   heading(1, [textRun("Title")]),
 *   listItem("bulleted_list_item", [textRun("one")]),
 *   listItem("bulleted_list_item", [textRun("two")]),
 * ]);
 * // "# Title\n\n- one\n- two"
 * ```
 */
export function blocksToMarkdown(blocks: readonly Block[]): string {
  const initial: JoinState = { parts: [], previousType: null };

  const { parts } = blocks.reduce<JoinState>((state, block) => {
    const fragment = convertBlock(block);
    if (!fragment) {
      return state;
    }

    const separator =
      state.previousType === null
        ? ""
        : isListItemType(state.previousType) && isListItemType(block.type)
          ? "\n"
          : "\n\n";

    return {
      parts: [...state.parts, separator, fragment],
      previousType: block.type,
    };
  }, initial);

  return parts.join("");
}

/**
 * Converts a single block to its Markdown fragment.
 */
export function convertBlock(block: Block): string {
  switch (block.type) {
    case "paragraph":
      return renderRichText(block.richText);

    case "heading_1":
      return `# ${renderRichText(block.richText)}`;

    case "heading_2":
      return `## ${renderRichText(block.richText)}`;

    case "heading_3":
      return `### ${renderRichText(block.richText)}`;

    case "bulleted_list_item":
      return `- ${renderRichText(block.richText)}`;

    case "numbered_list_item":
      // Always "1."; Markdown renderers number the items themselves
      return `1. ${renderRichText(block.richText)}`;

    case "code":
      return convertCode(block);

    case "quote":
      return convertQuote(block);

    case "divider":
      return "---";

    case "to_do": {
      const checkbox = block.checked ? "[x]" : "[ ]";
      return `- ${checkbox} ${renderRichText(block.richText)}`;
    }

    default:
      return assertNever(block);
  }
}

/**
 * Converts a code block to a fenced block. The body is the raw text of the
 * runs; "plain text" becomes an empty info string.
 */
function convertCode(block: CodeBlock): string {
  const content = richTextToPlainText(block.richText);
  const language = block.language === PLAIN_TEXT_LANGUAGE ? "" : block.language;

  return `\`\`\`${language}\n${content}\n\`\`\``;
}

/**
 * Converts a quote block, prefixing every line with `> `.
 */
function convertQuote(block: QuoteBlock): string {
  const text = renderRichText(block.richText);
  if (!text) {
    return "";
  }

  return text
    .split("\n")
    .map((line) => `> ${line}`)
    .join("\n");
}

function assertNever(value: never): never {
  throw new Error(`Unhandled block: ${JSON.stringify(value)}`);
}
