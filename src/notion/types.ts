/**
 * Notion SDK type helpers.
 *
 * Re-exports the SDK helpers the client layer uses, and defines the aliases
 * the rest of the codebase refers to.
 */

export { isFullPage, isFullBlock, Client } from "@notionhq/client";

import type { PageObjectResponse, BlockObjectResponse } from "@notionhq/client";

/**
 * A page result from search.
 * Search results can be pages or data sources, full or partial; we always
 * filter to full page objects using isFullPage().
 */
export type NotionPage = PageObjectResponse;

/**
 * A block from blocks.children.list.
 * We always filter to full block objects using isFullBlock().
 */
export type NotionBlock = BlockObjectResponse;

/**
 * A block with its children fetched and attached.
 *
 * The Notion API returns blocks without children inline; they must be
 * fetched separately for every block with `has_children: true`.
 */
export type NotionBlockWithChildren = NotionBlock & {
  children?: NotionBlockWithChildren[];
};

/**
 * Returns the plain text of a page's title property, or "(untitled)" when the
 * page has no title.
 */
export function getPageTitle(page: NotionPage): string {
  for (const property of Object.values(page.properties)) {
    if (property.type === "title") {
      const title = property.title.map((item) => item.plain_text).join("");
      if (title) {
        return title;
      }
    }
  }
  return "(untitled)";
}
