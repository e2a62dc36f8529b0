/**
 * Constructors for blocks and runs.
 *
 * Every converter builds its output through these so that the model's
 * invariants (heading levels 1-3, the "plain text" language sentinel, the
 * shape of line-break runs) live in one place.
 */

import {
  PLAIN_TEXT_LANGUAGE,
  type Annotations,
  type BlockType,
  type CodeBlock,
  type DividerBlock,
  type HeadingBlock,
  type ListItemBlock,
  type ParagraphBlock,
  type QuoteBlock,
  type RichText,
  type Run,
  type ToDoBlock,
} from "../types.js";

/**
 * Creates a run. The annotations object is copied so that later changes to
 * the caller's object never reach the run.
 */
export function textRun(
  text: string,
  annotations: Annotations = {},
  link?: string | null
): Run {
  const run: { text: string; annotations: Annotations; link?: string } = {
    text,
    annotations: { ...annotations },
  };
  if (link) {
    run.link = link;
  }
  return run;
}

/** The run standing for a soft or hard line break. */
export function lineBreakRun(): Run {
  return textRun("\n");
}

export function paragraph(richText: RichText): ParagraphBlock {
  return { type: "paragraph", richText };
}

/**
 * Creates a heading block. Notion only has three heading levels, so deeper
 * levels collapse into heading_3.
 */
export function heading(level: number, richText: RichText): HeadingBlock {
  if (level <= 1) {
    return { type: "heading_1", richText };
  }
  if (level === 2) {
    return { type: "heading_2", richText };
  }
  return { type: "heading_3", richText };
}

export function listItem(
  type: ListItemBlock["type"],
  richText: RichText
): ListItemBlock {
  return type === "bulleted_list_item"
    ? { type: "bulleted_list_item", richText }
    : { type: "numbered_list_item", richText };
}

/**
 * Creates a code block holding `content` as a single plain run.
 * An empty or missing language becomes "plain text".
 */
export function code(content: string, language?: string | null): CodeBlock {
  return {
    type: "code",
    richText: content ? [textRun(content)] : [],
    language: language || PLAIN_TEXT_LANGUAGE,
  };
}

export function quote(richText: RichText): QuoteBlock {
  return { type: "quote", richText };
}

export function divider(): DividerBlock {
  return { type: "divider" };
}

export function toDo(richText: RichText, checked: boolean): ToDoBlock {
  return { type: "to_do", richText, checked };
}

/** Returns true for bulleted and numbered list items. */
export function isListItemType(type: BlockType): type is ListItemBlock["type"] {
  return type === "bulleted_list_item" || type === "numbered_list_item";
}
