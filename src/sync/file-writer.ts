/**
 * File writer for Notion → Markdown pulls.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";

/**
 * Writes Markdown to a file.
 *
 * Creates the parent directory if it doesn't exist. The file is written
 * atomically by writing to a temporary file first, then renaming. Non-empty
 * output ends with exactly one newline.
 *
 * @param filePath - Destination file
 * @param markdown - The Markdown content
 * @returns The absolute path to the written file
 *
 * @example
 * ```ts
 * await writeMarkdownFile("./out/page.md", "# Title\n\nBody");
 * // ./out/page.md contains "# Title\n\nBody\n"
 * ```
 */
export async function writeMarkdownFile(filePath: string, markdown: string): Promise<string> {
  const absolutePath = path.resolve(filePath);
  await fs.mkdir(path.dirname(absolutePath), { recursive: true });

  const content = markdown ? markdown.replace(/\n*$/, "\n") : "";

  const tempPath = `${absolutePath}.tmp`;
  await fs.writeFile(tempPath, content, "utf-8");
  await fs.rename(tempPath, absolutePath);

  return absolutePath;
}
