/**
 * notion-md-bridge
 *
 * Bidirectional conversion between Markdown and Notion blocks.
 *
 * @packageDocumentation
 */

// =============================================================================
// Core Converters
// =============================================================================

/**
 * Markdown → blocks
 */
export { markdownToBlocks, assembleBlocks } from "./converter/md-to-blocks.js";
export { resolveInline } from "./converter/md-to-rich-text.js";
export { tokenizeMarkdown, extractFrontmatter, type MarkdownToken } from "./parser/markdown-parser.js";

/**
 * Blocks → Markdown
 */
export { blocksToMarkdown, convertBlock } from "./converter/blocks-to-md.js";
export { renderRichText, richTextToPlainText } from "./converter/rich-text.js";

/**
 * Block and run constructors
 */
export {
  textRun,
  lineBreakRun,
  paragraph,
  heading,
  listItem,
  code,
  quote,
  divider,
  toDo,
} from "./converter/blocks.js";

/**
 * Notion JSON shape
 */
export {
  blockToNotion,
  blocksToNotion,
  blockFromNotion,
  blocksFromNotion,
  runToNotion,
  runFromNotion,
  markdownToNotionBlocks,
  notionBlocksToMarkdown,
} from "./converter/notion-json.js";

// =============================================================================
// Notion Client and Writer
// =============================================================================

export {
  NotionClientWrapper,
  NotionRateLimitError,
  type NotionClientConfig,
} from "./notion/client.js";
export { NotionWriter, MAX_BLOCKS_PER_REQUEST } from "./sync/notion-writer.js";
export {
  normalizePageId,
  parsePageId,
  compactPageId,
  InvalidPageIdError,
} from "./notion/page-id.js";
export { getPageTitle } from "./notion/types.js";
export type { NotionBlock, NotionBlockWithChildren, NotionPage } from "./notion/types.js";

// =============================================================================
// Files and Configuration
// =============================================================================

export { readMarkdownSource, deriveTitle } from "./sync/file-reader.js";
export { writeMarkdownFile } from "./sync/file-writer.js";
export { loadConfig, ConfigError } from "./config.js";

// =============================================================================
// Core Types
// =============================================================================

export { PLAIN_TEXT_LANGUAGE } from "./types.js";
export type {
  Annotation,
  Annotations,
  Run,
  RichText,
  Block,
  BlockType,
  ParagraphBlock,
  HeadingBlock,
  Heading1Block,
  Heading2Block,
  Heading3Block,
  ListItemBlock,
  BulletedListItemBlock,
  NumberedListItemBlock,
  CodeBlock,
  QuoteBlock,
  DividerBlock,
  ToDoBlock,
  MarkdownToBlocksOptions,
  NotionBlockJson,
  NotionRichTextJson,
  TextBlockType,
  AppConfig,
  MarkdownSource,
} from "./types.js";
