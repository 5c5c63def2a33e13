import fs from "node:fs/promises";
import { z } from "zod";

import type { ReviewConfig } from "./types.js";
import {
  DEFAULT_ALLOWED_EXTENSIONS,
  DEFAULT_EXCLUDED_DIRS,
  DEFAULT_IMPORTANCE_MARKERS,
  DEFAULT_MAX_FILE_CHARS,
  DEFAULT_MODEL,
  DEFAULT_OLLAMA_HOST,
  DEFAULT_REQUEST_TIMEOUT_MS,
  getConfigPath,
} from "./constants.js";
import { ConfigError } from "./errors.js";

// ============================================================
// Defaults
// ============================================================

export const DEFAULT_REVIEW_CONFIG: ReviewConfig = {
  allowed_extensions: DEFAULT_ALLOWED_EXTENSIONS,
  excluded_dirs: DEFAULT_EXCLUDED_DIRS,
  max_file_chars: DEFAULT_MAX_FILE_CHARS,
  importance_markers: DEFAULT_IMPORTANCE_MARKERS,
  model: DEFAULT_MODEL,
  host: DEFAULT_OLLAMA_HOST,
  request_timeout_ms: DEFAULT_REQUEST_TIMEOUT_MS,
};

// ============================================================
// Schema
// ============================================================

const extensionSchema = z
  .string()
  .regex(/^\.[^./\\]+$/, "extensions must look like \".py\"")
  .transform((ext) => ext.toLowerCase());

const reviewConfigFileSchema = z
  .object({
    allowed_extensions: z.array(extensionSchema).min(1),
    excluded_dirs: z.array(z.string().min(1)),
    max_file_chars: z.number().int().positive(),
    importance_markers: z.array(z.string().min(1).transform((m) => m.toLowerCase())),
  })
  .partial()
  .strict();

export type ReviewConfigOverrides = Partial<Pick<ReviewConfig, "model" | "host" | "request_timeout_ms">>;

// ============================================================
// Loader
// ============================================================

function frozenCopy(list: readonly string[]): readonly string[] {
  return Object.freeze([...list]);
}

/**
 * Load review configuration from `.project-review.json` in the project
 * directory, falling back to DEFAULT_REVIEW_CONFIG when the file does not
 * exist. Each key the file provides replaces the default entirely (no deep
 * merge). The file only shapes file selection; the chat endpoint settings
 * come from `overrides` alone, so a reviewed project cannot redirect its
 * sources elsewhere. The result and its lists are frozen.
 */
export async function loadReviewConfig(
  projectDir: string,
  overrides: ReviewConfigOverrides = {},
): Promise<Readonly<ReviewConfig>> {
  const configPath = getConfigPath(projectDir);
  let fromFile: z.infer<typeof reviewConfigFileSchema> = {};

  let raw: string | null = null;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
      throw new ConfigError(configPath, err instanceof Error ? err.message : String(err));
    }
  }

  if (raw !== null) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(configPath, `malformed JSON (${err instanceof Error ? err.message : String(err)})`);
    }
    const result = reviewConfigFileSchema.safeParse(parsed);
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(configPath, detail);
    }
    fromFile = result.data;
  }

  const merged: ReviewConfig = {
    allowed_extensions: frozenCopy(fromFile.allowed_extensions ?? DEFAULT_REVIEW_CONFIG.allowed_extensions),
    excluded_dirs: frozenCopy(fromFile.excluded_dirs ?? DEFAULT_REVIEW_CONFIG.excluded_dirs),
    max_file_chars: fromFile.max_file_chars ?? DEFAULT_REVIEW_CONFIG.max_file_chars,
    importance_markers: frozenCopy(fromFile.importance_markers ?? DEFAULT_REVIEW_CONFIG.importance_markers),
    model: overrides.model ?? DEFAULT_REVIEW_CONFIG.model,
    host: overrides.host ?? DEFAULT_REVIEW_CONFIG.host,
    request_timeout_ms: overrides.request_timeout_ms ?? DEFAULT_REVIEW_CONFIG.request_timeout_ms,
  };

  return Object.freeze(merged);
}
