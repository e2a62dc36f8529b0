/**
 * Mock factories for Notion API response shapes.
 *
 * The objects mirror what @notionhq/client returns closely enough for the
 * codec and client tests, without hitting the API.
 */

export type MockColor = "default" | "gray" | "red" | "blue" | "yellow_background";

/** Formatting flags for `mockRichText`; unset flags come out `false`. */
export interface MockAnnotations {
  bold?: boolean;
  italic?: boolean;
  strikethrough?: boolean;
  underline?: boolean;
  code?: boolean;
  color?: MockColor;
}

export interface MockRichTextItem {
  type: "text";
  text: { content: string; link: { url: string } | null };
  plain_text: string;
  href: string | null;
  annotations: Required<MockAnnotations>;
}

/**
 * A rich text item as the API returns it: every annotation present, and the
 * link repeated in `href`.
 */
export function mockRichText(
  text: string,
  annotations: MockAnnotations = {},
  link?: string
): MockRichTextItem {
  const { color = "default", ...flags } = annotations;
  return {
    type: "text",
    text: { content: text, link: link ? { url: link } : null },
    plain_text: text,
    href: link ?? null,
    annotations: {
      bold: false,
      italic: false,
      strikethrough: false,
      underline: false,
      code: false,
      ...flags,
      color,
    },
  };
}

/**
 * Block types the factory builds. `toggle` and `callout` are there to
 * exercise the unsupported-type path.
 */
export type MockBlockType =
  | "paragraph"
  | "heading_1"
  | "heading_2"
  | "heading_3"
  | "bulleted_list_item"
  | "numbered_list_item"
  | "to_do"
  | "code"
  | "quote"
  | "divider"
  | "toggle"
  | "callout";

export interface MockBlockOptions {
  id?: string;
  hasChildren?: boolean;
  /** code only */
  language?: string;
  /** to_do only */
  checked?: boolean;
}

export type MockBlock = Record<string, unknown> & {
  object: "block";
  id: string;
  type: MockBlockType;
  has_children: boolean;
};

const TIMESTAMP = "2026-01-15T10:00:00.000Z";
const USER = { object: "user", id: "user-001" } as const;

let blockCount = 0;
let pageCount = 0;

function nextId(prefix: string, count: number): string {
  return `${prefix}-${String(count).padStart(4, "0")}`;
}

/**
 * Type-specific payload stored under the block's type key.
 */
function blockPayload(
  type: MockBlockType,
  richText: MockRichTextItem[],
  options: MockBlockOptions
): Record<string, unknown> {
  switch (type) {
    case "divider":
      return {};
    case "code":
      return { rich_text: richText, caption: [], language: options.language ?? "plain text" };
    case "to_do":
      return { rich_text: richText, checked: options.checked ?? false, color: "default" };
    case "callout":
      return { rich_text: richText, icon: { type: "emoji", emoji: "💡" }, color: "default" };
    case "heading_1":
    case "heading_2":
    case "heading_3":
      return { rich_text: richText, is_toggleable: false, color: "default" };
    default:
      return { rich_text: richText, color: "default" };
  }
}

/**
 * A block as returned by `blocks.children.list`. Ids are `block-0001`,
 * `block-0002`, … unless given.
 *
 * @param content - Plain text for a single run, or the rich text items
 */
export function mockBlock(
  type: MockBlockType,
  content: string | MockRichTextItem[] = "",
  options: MockBlockOptions = {}
): MockBlock {
  const richText = typeof content === "string" ? (content ? [mockRichText(content)] : []) : content;

  return {
    object: "block",
    id: options.id ?? nextId("block", ++blockCount),
    type,
    parent: { type: "page_id", page_id: "page-001" },
    created_time: TIMESTAMP,
    created_by: USER,
    last_edited_time: TIMESTAMP,
    last_edited_by: USER,
    has_children: options.hasChildren ?? false,
    archived: false,
    in_trash: false,
    [type]: blockPayload(type, richText, options),
  };
}

/**
 * A full page object whose `title` property holds `title` (none when empty).
 * Ids are `page-0001`, `page-0002`, … unless given.
 */
export function mockNotionPage(
  title: string,
  id: string = nextId("page", ++pageCount)
): Record<string, unknown> & { object: "page"; id: string } {
  return {
    object: "page",
    id,
    url: `https://www.notion.so/${id.replace(/-/g, "")}`,
    parent: { type: "page_id", page_id: "parent-001" },
    created_time: TIMESTAMP,
    last_edited_time: TIMESTAMP,
    archived: false,
    in_trash: false,
    properties: {
      title: { id: "title", type: "title", title: title ? [mockRichText(title)] : [] },
    },
  };
}

interface MockListResponse {
  object: "list";
  results: unknown[];
  next_cursor: string | null;
  has_more: boolean;
}

function listResponse(results: unknown[], nextCursor: string | null): MockListResponse {
  return {
    object: "list",
    results,
    next_cursor: nextCursor,
    has_more: nextCursor !== null,
  };
}

/**
 * A `blocks.children.list` response; pass a cursor to signal more pages.
 */
export function mockBlocksResponse(
  blocks: unknown[],
  nextCursor: string | null = null
): MockListResponse & { type: "block"; block: Record<string, never> } {
  return { ...listResponse(blocks, nextCursor), type: "block", block: {} };
}

/**
 * A `search` response; pass a cursor to signal more pages.
 */
export function mockSearchResponse(
  results: unknown[],
  nextCursor: string | null = null
): MockListResponse & { type: "page_or_data_source"; page_or_data_source: Record<string, never> } {
  return {
    ...listResponse(results, nextCursor),
    type: "page_or_data_source",
    page_or_data_source: {},
  };
}

/** Restarts the generated id sequences. */
export function resetMockCounters(): void {
  blockCount = 0;
  pageCount = 0;
}
