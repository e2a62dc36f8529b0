/**
 * Page ID parsing.
 *
 * Accepts any of:
 * - Full URL: https://notion.so/My-Page-0123456789abcdef0123456789abcdef
 * - UUID with dashes: 01234567-89ab-cdef-0123-456789abcdef
 * - UUID without dashes: 0123456789abcdef0123456789abcdef
 *
 * and returns the dashed, lowercase UUID the API expects.
 */

/**
 * Error thrown when a value is neither a page ID nor a page URL.
 */
export class InvalidPageIdError extends Error {
  constructor(public readonly input: string) {
    super(`Invalid page ID or URL: ${input}`);
    this.name = "InvalidPageIdError";
  }
}

const TRAILING_HEX_ID = /([a-f0-9]{32})$/i;
const HEX_ID = /^[a-f0-9]{32}$/;

/**
 * Normalizes a page ID or extracts it from a page URL.
 *
 * @returns The page ID as a dashed UUID, or null if the value holds none
 *
 * @example
 * ```ts
 * normalizePageId("https://www.notion.so/Guide-0123456789ABCDEF0123456789abcdef?pvs=4");
 * // "01234567-89ab-cdef-0123-456789abcdef"
 * ```
 */
export function normalizePageId(value: string): string | null {
  if (value.startsWith("http")) {
    const path = value.split("?")[0].split("#")[0];
    const match = TRAILING_HEX_ID.exec(path);
    return match ? formatUuid(match[1].toLowerCase()) : null;
  }

  const hex = value.replace(/-/g, "").toLowerCase();
  return HEX_ID.test(hex) ? formatUuid(hex) : null;
}

/**
 * Like `normalizePageId`, but throws InvalidPageIdError instead of returning
 * null.
 */
export function parsePageId(value: string): string {
  const pageId = normalizePageId(value);
  if (!pageId) {
    throw new InvalidPageIdError(value);
  }
  return pageId;
}

/**
 * Removes the dashes from a page ID, as used in notion.so URLs.
 */
export function compactPageId(pageId: string): string {
  return pageId.replace(/-/g, "");
}

function formatUuid(hex: string): string {
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join("-");
}
