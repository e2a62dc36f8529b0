/**
 * Unit tests for page ID parsing.
 */

import { describe, it, expect } from "vitest";
import {
  normalizePageId,
  parsePageId,
  compactPageId,
  InvalidPageIdError,
} from "../../src/notion/page-id.js";

const DASHED = "01234567-89ab-cdef-0123-456789abcdef";
const COMPACT = "0123456789abcdef0123456789abcdef";

describe("page-id", () => {
  describe("normalizePageId", () => {
    it("formats a compact ID as a dashed UUID", () => {
      expect(normalizePageId(COMPACT)).toBe(DASHED);
    });

    it("lowercases a dashed ID", () => {
      expect(normalizePageId(DASHED.toUpperCase())).toBe(DASHED);
    });

    it("extracts the ID from a page URL", () => {
      expect(normalizePageId(`https://www.notion.so/Guide-${COMPACT}`)).toBe(DASHED);
    });

    it("ignores query strings and fragments", () => {
      expect(
        normalizePageId("https://www.notion.so/Guide-0123456789ABCDEF0123456789abcdef?pvs=4")
      ).toBe(DASHED);
      expect(normalizePageId(`https://notion.so/team/Page-${COMPACT}#heading`)).toBe(DASHED);
    });

    it("reads URLs whose path is only the ID", () => {
      expect(normalizePageId(`https://notion.so/${COMPACT}`)).toBe(DASHED);
    });

    it("returns null for values without an ID", () => {
      expect(normalizePageId("not-an-id")).toBeNull();
      expect(normalizePageId("https://notion.so/My-Page")).toBeNull();
      expect(normalizePageId(COMPACT.slice(1))).toBeNull();
      expect(normalizePageId("")).toBeNull();
    });
  });

  describe("parsePageId", () => {
    it("returns the normalized ID", () => {
      expect(parsePageId(COMPACT)).toBe(DASHED);
    });

    it("throws InvalidPageIdError for invalid input", () => {
      expect(() => parsePageId("nope")).toThrow(InvalidPageIdError);
      expect(() => parsePageId("nope")).toThrow("Invalid page ID or URL: nope");
    });
  });

  describe("compactPageId", () => {
    it("removes dashes", () => {
      expect(compactPageId(DASHED)).toBe(COMPACT);
    });
  });
});
