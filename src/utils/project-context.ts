import fs from "node:fs/promises";

import type { ProjectContext } from "./types.js";
import { getDescriptionPath, getReadmePath, README_NOT_FOUND } from "./constants.js";
import type { Logger } from "./logger.js";

/**
 * Read an optional text file, trimmed. Returns null when it does not exist;
 * other read failures are logged and treated the same way.
 */
async function readOptionalText(filePath: string, logger?: Logger): Promise<string | null> {
  try {
    const contents = await fs.readFile(filePath, "utf-8");
    return contents.trim();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
      logger?.warn(`Could not read ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return null;
  }
}

/**
 * Build the read-only project context. A `description.txt` at the root
 * overrides the description given on the command line.
 */
export async function loadProjectContext(
  root: string,
  cliDescription: string,
  logger?: Logger,
): Promise<ProjectContext> {
  const fileDescription = await readOptionalText(getDescriptionPath(root), logger);
  const readme = await readOptionalText(getReadmePath(root), logger);

  return Object.freeze({
    root,
    description: fileDescription ?? cliDescription,
    readme: readme ?? README_NOT_FOUND,
  });
}
