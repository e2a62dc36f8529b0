/**
 * Notion page writer.
 *
 * Sinks for converted Markdown: replaces the content of an existing page,
 * or creates a child page under a parent page.
 *
 * Block replacement strategy:
 * 1. Delete all existing top-level child blocks
 * 2. Append new blocks in batches of 100
 */

import { NotionClientWrapper } from "../notion/client.js";
import { blocksToNotion } from "../converter/notion-json.js";
import type { Block, NotionBlockJson } from "../types.js";

/**
 * Maximum number of blocks per API call.
 * Notion's API limits children array to 100 blocks.
 */
export const MAX_BLOCKS_PER_REQUEST = 100;

/**
 * Writes converted blocks to Notion pages.
 *
 * All API calls go through `NotionClientWrapper.request` for rate limiting
 * and retry handling.
 *
 * @example
 * ```ts
 * const client = new NotionClientWrapper({ token: config.notionToken });
 * const writer = new NotionWriter(client);
 *
 * await writer.replacePageContent(pageId, markdownToBlocks(markdown));
 * const childId = await writer.createChildPage(parentId, "Guide", blocks);
 * ```
 */
export class NotionWriter {
  constructor(private readonly client: NotionClientWrapper) {}

  /**
   * Replaces all content blocks on an existing page.
   *
   * Deleting a block also deletes its children, so only the top-level
   * children are fetched and deleted.
   *
   * @param pageId - The Notion page ID
   * @param blocks - The new page content
   */
  async replacePageContent(pageId: string, blocks: readonly Block[]): Promise<void> {
    const existingBlocks = await this.client.getBlockChildren(pageId);

    for (const block of existingBlocks) {
      await this.client.request(() =>
        this.client.rawClient.blocks.delete({ block_id: block.id })
      );
    }

    const payloads = blocksToNotion(blocks);
    if (payloads.length > 0) {
      await this.appendBlocksInBatches(pageId, payloads);
    }
  }

  /**
   * Creates a page under a parent page with the given title and content.
   *
   * The first 100 blocks go with `pages.create`; the rest are appended in
   * batches of 100.
   *
   * @param parentId - The parent page ID
   * @param title - Title of the new page
   * @param blocks - Content of the new page
   * @returns The created page ID
   */
  async createChildPage(
    parentId: string,
    title: string,
    blocks: readonly Block[]
  ): Promise<string> {
    const payloads = blocksToNotion(blocks);
    const firstBatch = payloads.slice(0, MAX_BLOCKS_PER_REQUEST);
    const remainingBlocks = payloads.slice(MAX_BLOCKS_PER_REQUEST);

    // Code languages are passed through as written in the fence
    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    const createParams: any = {
      parent: { page_id: parentId },
      properties: {
        title: { title: [{ type: "text", text: { content: title } }] },
      },
    };

    if (firstBatch.length > 0) {
      createParams.children = firstBatch;
    }

    const response = await this.client.request(() =>
      this.client.rawClient.pages.create(createParams)
    );
    const pageId = response.id;

    if (remainingBlocks.length > 0) {
      await this.appendBlocksInBatches(pageId, remainingBlocks);
    }

    return pageId;
  }

  /**
   * Appends blocks to a page in batches of MAX_BLOCKS_PER_REQUEST.
   *
   * @param pageId - The page or block ID to append to
   * @param blocks - Block payloads to append
   */
  private async appendBlocksInBatches(
    pageId: string,
    blocks: NotionBlockJson[]
  ): Promise<void> {
    for (let i = 0; i < blocks.length; i += MAX_BLOCKS_PER_REQUEST) {
      const batch = blocks.slice(i, i + MAX_BLOCKS_PER_REQUEST);

      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      const appendParams: any = { block_id: pageId, children: batch };
      await this.client.request(() =>
        this.client.rawClient.blocks.children.append(appendParams)
      );
    }
  }
}
