/**
 * JSON data files
 * Reads a configuration table from disk and validates it with zod
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import type { z } from "zod";
import { ConfigError, errorMessage } from "@fanout/core";

export function readJsonFile<S extends z.ZodTypeAny>(
  location: string | URL,
  schema: S
): z.infer<S> {
  const filePath = location instanceof URL ? fileURLToPath(location) : location;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot read ${filePath}: ${errorMessage(error)}`, { filePath });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid ${filePath}:\n${issues}`, { filePath });
  }

  return result.data;
}
