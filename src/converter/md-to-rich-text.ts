/**
 * Markdown inline tokens to rich text runs.
 *
 * The reverse of `rich-text.ts`'s `renderRichText()`. Walks the children of a
 * markdown-it `inline` token once, threading a formatting state through the
 * open/close tokens:
 * - strong_open/close: bold
 * - em_open/close: italic
 * - s_open/close: strikethrough
 * - link_open/close: active link target (links do not nest)
 * - code_inline: a `code` run that ignores the surrounding state
 * - softbreak/hardbreak: a plain "\n" run
 *
 * Balance of the open/close tokens is the tokenizer's job; it is not checked
 * here.
 */

import type { Annotation, Annotations, Run } from "../types.js";
import type { MarkdownToken } from "../parser/markdown-parser.js";
import { lineBreakRun, textRun } from "./blocks.js";

/**
 * Formatting in effect at a point of the inline walk.
 */
interface InlineState {
  annotations: Annotations;
  link: string | null;
}

/** Open/close token pairs and the annotation each toggles. */
const TOGGLE_TOKENS: Record<string, { annotation: Annotation; on: boolean }> = {
  strong_open: { annotation: "bold", on: true },
  strong_close: { annotation: "bold", on: false },
  em_open: { annotation: "italic", on: true },
  em_close: { annotation: "italic", on: false },
  s_open: { annotation: "strikethrough", on: true },
  s_close: { annotation: "strikethrough", on: false },
};

/**
 * Converts the children of an `inline` token to runs.
 *
 * @example
 * ```ts
 * const [inline] = tokenizeMarkdown("**bold** text").filter((t) => t.type === "inline");
 * resolveInline(inline.children ?? []);
 * // [
 * //   { text: "bold", annotations: { bold: true } },
 * //   { text: " text", annotations: {} },
 * // ]
 * ```
 */
export function resolveInline(tokens: readonly MarkdownToken[]): Run[] {
  const runs: Run[] = [];
  let state: InlineState = { annotations: {}, link: null };

  for (const token of tokens) {
    state = step(state, token, runs);
  }

  return runs;
}

/**
 * Applies one token: returns the next state and appends any run it emits.
 */
function step(state: InlineState, token: MarkdownToken, runs: Run[]): InlineState {
  const toggle = TOGGLE_TOKENS[token.type];
  if (toggle) {
    return { ...state, annotations: setAnnotation(state.annotations, toggle.annotation, toggle.on) };
  }

  switch (token.type) {
    case "text":
      if (token.content) {
        runs.push(textRun(token.content, state.annotations, state.link));
      }
      return state;

    case "code_inline":
      if (token.content) {
        runs.push(textRun(token.content, { code: true }));
      }
      return state;

    case "softbreak":
    case "hardbreak":
      runs.push(lineBreakRun());
      return state;

    case "link_open":
      return { ...state, link: token.attrGet("href") };

    case "link_close":
      return { ...state, link: null };

    default:
      return state;
  }
}

function setAnnotation(
  annotations: Annotations,
  annotation: Annotation,
  on: boolean
): Annotations {
  const next: Annotations = { ...annotations };
  if (on) {
    next[annotation] = true;
  } else {
    delete next[annotation];
  }
  return next;
}
