/**
 * Thin layer over the Notion SDK client.
 *
 * Every call goes through `request`, which spaces calls out and retries on
 * HTTP 429. Listing endpoints are read to the end through `paginate`.
 */

import {
  Client,
  isFullPage,
  isFullBlock,
  type NotionPage,
  type NotionBlock,
  type NotionBlockWithChildren,
} from "./types.js";

export interface NotionClientConfig {
  /** Integration token */
  token: string;
  /** Milliseconds to keep between two requests; defaults to 334 (about 3/s) */
  minRequestInterval?: number;
  /** Retries after a 429 before giving up; defaults to 3 */
  maxRetries?: number;
}

/** One page of a cursor-paginated list endpoint. */
interface CursorPage<T> {
  results: T[];
  has_more: boolean;
  next_cursor: string | null;
}

const INITIAL_BACKOFF_MS = 1000;

/**
 * Raised once a call is still rate limited after the last retry.
 * `retryAfter` holds the server's last hint in milliseconds, if it sent one.
 */
export class NotionRateLimitError extends Error {
  constructor(
    message: string,
    public readonly retryAfter?: number
  ) {
    super(message);
    this.name = "NotionRateLimitError";
  }
}

/**
 * @example
 * ```ts
 * const client = new NotionClientWrapper({ token: config.notionToken });
 * const markdown = notionBlocksToMarkdown(await client.getBlockTree(pageId));
 * ```
 */
export class NotionClientWrapper {
  private readonly client: Client;
  private readonly minRequestInterval: number;
  private readonly maxRetries: number;
  private lastRequestAt = 0;

  constructor(config: NotionClientConfig) {
    this.client = new Client({ auth: config.token });
    this.minRequestInterval = config.minRequestInterval ?? 334;
    this.maxRetries = config.maxRetries ?? 3;
  }

  /**
   * Direct children of a block or page. Partial block objects are dropped.
   */
  async getBlockChildren(blockId: string): Promise<NotionBlock[]> {
    const results = await this.paginate((cursor) =>
      this.client.blocks.children.list({ block_id: blockId, start_cursor: cursor })
    );
    return results.filter(isFullBlock);
  }

  /**
   * Like `getBlockChildren`, with the descendants of every block that has
   * `has_children` attached under `children`, depth first.
   */
  async getBlockTree(blockId: string): Promise<NotionBlockWithChildren[]> {
    const tree: NotionBlockWithChildren[] = [];
    for (const block of await this.getBlockChildren(blockId)) {
      tree.push(block.has_children ? { ...block, children: await this.getBlockTree(block.id) } : block);
    }
    return tree;
  }

  /**
   * Full page objects shared with the integration whose title matches `query`.
   */
  async searchPages(query: string): Promise<NotionPage[]> {
    const results = await this.paginate((cursor) =>
      this.client.search({
        query,
        filter: { property: "object", value: "page" },
        start_cursor: cursor,
      })
    );
    return results.filter(isFullPage);
  }

  /**
   * Runs `apiCall` once the request interval has passed.
   *
   * A 429 is retried up to `maxRetries` times, waiting for the `retry-after`
   * header when present and otherwise 1s, 2s, 4s, … Other errors propagate
   * unchanged.
   */
  async request<T>(apiCall: () => Promise<T>): Promise<T> {
    await this.throttle();

    let backoff = INITIAL_BACKOFF_MS;
    for (let attempt = 0; ; attempt++) {
      try {
        this.lastRequestAt = Date.now();
        return await apiCall();
      } catch (error) {
        if (!isRateLimited(error)) {
          throw error;
        }
        const retryAfter = retryAfterMs(error);
        if (attempt >= this.maxRetries) {
          throw new NotionRateLimitError(
            `Rate limit exceeded after ${this.maxRetries} retries`,
            retryAfter
          );
        }
        await sleep(retryAfter ?? backoff);
        backoff *= 2;
      }
    }
  }

  /**
   * The SDK client itself. Calls made on it skip throttling and retries
   * unless wrapped in `request`.
   */
  get rawClient(): Client {
    return this.client;
  }

  private async throttle(): Promise<void> {
    const wait = this.lastRequestAt + this.minRequestInterval - Date.now();
    if (wait > 0) {
      await sleep(wait);
    }
  }

  private async paginate<T>(
    fetchPage: (cursor: string | undefined) => Promise<CursorPage<T>>
  ): Promise<T[]> {
    const results: T[] = [];
    let cursor: string | undefined;
    do {
      const page: CursorPage<T> = await this.request(() => fetchPage(cursor));
      results.push(...page.results);
      cursor = page.has_more ? (page.next_cursor ?? undefined) : undefined;
    } while (cursor !== undefined);
    return results;
  }
}

function isRateLimited(error: unknown): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }
  // APIResponseError carries both the HTTP status and the API error code
  return (
    ("status" in error && error.status === 429) ||
    ("code" in error && error.code === "rate_limited")
  );
}

/** `retry-after` in milliseconds, from fetch `Headers` or a plain record. */
function retryAfterMs(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("headers" in error)) {
    return undefined;
  }
  const { headers } = error;
  let value: unknown;
  if (headers instanceof Headers) {
    value = headers.get("retry-after");
  } else if (typeof headers === "object" && headers !== null && "retry-after" in headers) {
    value = headers["retry-after"];
  }
  if (typeof value !== "string" || value === "") {
    return undefined;
  }
  const seconds = parseInt(value, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
