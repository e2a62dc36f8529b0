/**
 * Core types for the Markdown <-> Notion block converter.
 */

// =============================================================================
// Rich Text
// =============================================================================

/**
 * Inline formatting a run can carry.
 */
export type Annotation = "bold" | "italic" | "strikethrough" | "code";

/**
 * Annotation set of a run. Only flags that are set appear, and they are
 * always `true`; an empty object means plain text.
 */
export type Annotations = Partial<Record<Annotation, true>>;

/**
 * An atomic span of text sharing one annotation set and link target.
 */
export interface Run {
  /** Never empty */
  readonly text: string;
  readonly annotations: Readonly<Annotations>;
  /** URL the whole run links to */
  readonly link?: string;
}

/** Ordered runs forming the inline content of a block. */
export type RichText = readonly Run[];

// =============================================================================
// Blocks
// =============================================================================

interface RichTextBlock<T extends string> {
  readonly type: T;
  readonly richText: RichText;
}

export type ParagraphBlock = RichTextBlock<"paragraph">;
export type Heading1Block = RichTextBlock<"heading_1">;
export type Heading2Block = RichTextBlock<"heading_2">;
export type Heading3Block = RichTextBlock<"heading_3">;
export type BulletedListItemBlock = RichTextBlock<"bulleted_list_item">;
export type NumberedListItemBlock = RichTextBlock<"numbered_list_item">;
export type QuoteBlock = RichTextBlock<"quote">;

export interface CodeBlock extends RichTextBlock<"code"> {
  /** Fence info label; `"plain text"` when the fence had none */
  readonly language: string;
}

export interface ToDoBlock extends RichTextBlock<"to_do"> {
  readonly checked: boolean;
}

export interface DividerBlock {
  readonly type: "divider";
}

/**
 * One structural unit of a document. Blocks form a flat sequence; list items
 * carry no nested children.
 */
export type Block =
  | ParagraphBlock
  | Heading1Block
  | Heading2Block
  | Heading3Block
  | BulletedListItemBlock
  | NumberedListItemBlock
  | CodeBlock
  | QuoteBlock
  | DividerBlock
  | ToDoBlock;

export type BlockType = Block["type"];

export type HeadingBlock = Heading1Block | Heading2Block | Heading3Block;

export type ListItemBlock = BulletedListItemBlock | NumberedListItemBlock;

/** Language label standing for "no fence info". */
export const PLAIN_TEXT_LANGUAGE = "plain text";

// =============================================================================
// Conversion Options
// =============================================================================

export interface MarkdownToBlocksOptions {
  /**
   * Turn bulleted items starting with `[ ] ` / `[x] ` into to_do blocks.
   * Off by default, in which case such items stay bulleted list items with
   * the marker kept as text.
   */
  taskLists?: boolean;
}

// =============================================================================
// Notion Wire Format
// =============================================================================

/**
 * Rich text item as sent to (and read from) the Notion API.
 * `annotations` is omitted entirely for plain runs.
 */
export interface NotionRichTextJson {
  type: "text";
  text: {
    content: string;
    link?: { url: string };
  };
  plain_text: string;
  href: string | null;
  annotations?: Annotations;
}

type RichTextBlockJson<T extends string> = { object: "block"; type: T } & {
  [K in T]: { rich_text: NotionRichTextJson[] };
};

/** Block kinds whose payload is rich text alone. */
export type TextBlockType = Exclude<BlockType, "code" | "to_do" | "divider">;

/**
 * Block payload as sent to the Notion API: `{ object, type, [type]: {...} }`.
 */
export type NotionBlockJson =
  | { [T in TextBlockType]: RichTextBlockJson<T> }[TextBlockType]
  | {
      object: "block";
      type: "code";
      code: { rich_text: NotionRichTextJson[]; language: string };
    }
  | {
      object: "block";
      type: "to_do";
      to_do: { rich_text: NotionRichTextJson[]; checked: boolean };
    }
  | {
      object: "block";
      type: "divider";
      divider: Record<string, never>;
    };

// =============================================================================
// Configuration
// =============================================================================

export interface AppConfig {
  /** Notion integration token */
  notionToken: string;
  /** Minimum delay between API requests in ms */
  minRequestInterval: number;
  /** Retry attempts on HTTP 429 */
  maxRetries: number;
}

/**
 * A Markdown file read for pushing to Notion.
 */
export interface MarkdownSource {
  filePath: string;
  /** Parsed YAML frontmatter, empty when the file has none */
  frontmatter: Record<string, unknown>;
  /** Markdown content without frontmatter */
  body: string;
  /** Page title derived from frontmatter, first H1 or file name */
  title: string;
}
