/**
 * Configuration from environment variables, optionally seeded from a `.env`
 * file in the working directory.
 *
 * - NOTION_TOKEN (required): Notion integration token
 * - NOTION_MIN_REQUEST_INTERVAL (optional): ms between API requests, default 334
 * - NOTION_MAX_RETRIES (optional): retries on HTTP 429, default 3
 */

import * as fs from "node:fs/promises";
import dotenv from "dotenv";
import type { AppConfig } from "./types.js";

export const DEFAULT_MIN_REQUEST_INTERVAL = 334;
export const DEFAULT_MAX_RETRIES = 3;

/**
 * Error thrown when the environment is missing or has invalid settings.
 * Lists every problem found, not just the first.
 */
export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Configuration error:\n${problems.map((p) => `  - ${p}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/**
 * Copies the variables of a dotenv file into `env`. Variables already set in
 * `env` are left alone; a missing file is not an error.
 *
 * @returns Names of the variables taken from the file
 */
export async function loadEnvFile(
  filePath = ".env",
  env: NodeJS.ProcessEnv = process.env
): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  const loaded: string[] = [];
  for (const [name, value] of Object.entries(dotenv.parse(content))) {
    if (env[name] === undefined) {
      env[name] = value;
      loaded.push(name);
    }
  }
  return loaded;
}

/**
 * Reads and validates the configuration.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws ConfigError listing every missing or invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const problems: string[] = [];

  const token = env.NOTION_TOKEN?.trim();
  if (!token) {
    problems.push("NOTION_TOKEN environment variable is not set");
  }

  const minRequestInterval = readInteger(
    env,
    "NOTION_MIN_REQUEST_INTERVAL",
    DEFAULT_MIN_REQUEST_INTERVAL,
    problems
  );
  const maxRetries = readInteger(env, "NOTION_MAX_RETRIES", DEFAULT_MAX_RETRIES, problems);

  if (!token || problems.length > 0) {
    throw new ConfigError(problems);
  }

  return { notionToken: token, minRequestInterval, maxRetries };
}

/**
 * Reads a non-negative integer variable, recording a problem when it is set
 * to anything else.
 */
function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  problems: string[]
): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  if (!/^\d+$/.test(raw)) {
    problems.push(`${name} must be a non-negative integer (got "${raw}")`);
    return fallback;
  }

  return parseInt(raw, 10);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
