/**
 * Rich text to Markdown converter.
 *
 * Renders runs as inline Markdown:
 * - code -> `` `text` ``
 * - bold -> `**text**`
 * - italic -> `*text*`
 * - strikethrough -> `~~text~~`
 * - links -> `[text](url)`
 *
 * Wrappers are applied in that fixed order, innermost first, whatever order
 * the formatting was nested in originally:
 * - bold + italic -> `***text***`
 * - code + bold + link -> ``[**`text`**](url)``
 */

import type { Run } from "../types.js";

/**
 * Converts runs to an inline Markdown string. Runs are concatenated with no
 * separator.
 *
 * @example
 * ```ts
 * renderRichText([textRun("Hello "), textRun("world", { bold: true })]);
 * // "Hello **world**"
 * ```
 */
export function renderRichText(runs: readonly Run[]): string {
  return runs.map(renderRun).join("");
}

/**
 * Concatenates the text of runs, ignoring formatting.
 */
export function richTextToPlainText(runs: readonly Run[]): string {
  return runs.map((run) => run.text).join("");
}

function renderRun(run: Run): string {
  let text = run.text;
  const { annotations } = run;

  if (annotations.code) {
    text = `\`${text}\``;
  }
  if (annotations.bold) {
    text = `**${text}**`;
  }
  if (annotations.italic) {
    text = `*${text}*`;
  }
  if (annotations.strikethrough) {
    text = `~~${text}~~`;
  }

  if (run.link) {
    text = `[${text}](${run.link})`;
  }

  return text;
}
