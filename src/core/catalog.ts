import fs from "node:fs/promises";
import path from "node:path";

import type {
  CatalogEntry,
  DirectoryWalker,
  Outcome,
  SourceCatalog,
  WalkerEntry,
} from "../utils/types.js";
import { describeError, InvalidProjectPathError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";

const TREE_BRANCH = "├── ";
const TREE_INDENT = "│   ";

export interface CatalogOptions {
  allowedExtensions: readonly string[];
  excludedDirs: readonly string[];
  walker?: DirectoryWalker;
  logger?: Logger;
}

// ============================================================
// Filesystem walker
// ============================================================

export class NodeDirectoryWalker implements DirectoryWalker {
  async kind(target: string): Promise<"missing" | "file" | "directory"> {
    try {
      const stat = await fs.stat(target);
      return stat.isDirectory() ? "directory" : "file";
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        return "missing";
      }
      throw err;
    }
  }

  async list(dir: string): Promise<WalkerEntry[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }));
  }
}

// ============================================================
// Helpers
// ============================================================

/** Code-point order, independent of the host locale. */
function byName(a: WalkerEntry, b: WalkerEntry): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

async function listSorted(walker: DirectoryWalker, dir: string): Promise<WalkerEntry[]> {
  const entries = await walker.list(dir);
  return entries.sort(byName);
}

/**
 * List a directory below the root. An unreadable subdirectory is skipped
 * with a warning; only the root itself may fail the catalog.
 */
async function listSubdirectory(
  walker: DirectoryWalker,
  dir: string,
  logger?: Logger,
): Promise<WalkerEntry[]> {
  try {
    return await listSorted(walker, dir);
  } catch (err) {
    logger?.warn(`Skipping unreadable directory ${dir}: ${describeError(err)}`);
    return [];
  }
}

function toRelative(root: string, absolutePath: string): string {
  return path.relative(root, absolutePath).split(path.sep).join("/");
}

// ============================================================
// Tree rendering
// ============================================================

/**
 * Render every entry under `root` except excluded names, one line per entry,
 * nested entries indented beneath their directory. An unreadable
 * subdirectory renders as its own line only.
 */
export async function renderTree(
  root: string,
  excludedDirs: readonly string[],
  walker: DirectoryWalker = new NodeDirectoryWalker(),
  logger?: Logger,
): Promise<string> {
  const excluded = new Set(excludedDirs);
  const lines: string[] = [];

  const visit = async (dir: string, indent: string): Promise<void> => {
    const entries = dir === root ? await listSorted(walker, dir) : await listSubdirectory(walker, dir, logger);
    for (const entry of entries) {
      if (excluded.has(entry.name)) continue;
      lines.push(`${indent}${TREE_BRANCH}${entry.name}`);
      if (entry.isDirectory) {
        await visit(path.join(dir, entry.name), indent + TREE_INDENT);
      }
    }
  };

  await visit(root, "");
  return lines.join("\n");
}

// ============================================================
// Source file collection
// ============================================================

/**
 * Collect every file under `root` whose extension is allowed. Files of a
 * directory come before the contents of its subdirectories; excluded
 * directories are never entered.
 */
export async function collectSourceFiles(
  root: string,
  options: CatalogOptions,
): Promise<CatalogEntry[]> {
  const walker = options.walker ?? new NodeDirectoryWalker();
  const logger = options.logger;
  const allowed = new Set(options.allowedExtensions.map((ext) => ext.toLowerCase()));
  const excluded = new Set(options.excludedDirs);
  const files: CatalogEntry[] = [];

  logger?.debug(`Searching for source files in: ${root}`);
  logger?.debug(`Allowed extensions: ${[...allowed].join(", ")}`);
  logger?.debug(`Excluded directories: ${[...excluded].join(", ")}`);

  const visit = async (dir: string): Promise<void> => {
    const entries = dir === root ? await listSorted(walker, dir) : await listSubdirectory(walker, dir, logger);
    const subdirs = entries.filter((e) => e.isDirectory && !excluded.has(e.name));
    const filenames = entries.filter((e) => !e.isDirectory);

    if (filenames.length > 0) {
      logger?.debug(`Directory: ${dir} files: ${filenames.map((e) => e.name).join(", ")}`);
    }

    for (const entry of filenames) {
      const extension = path.extname(entry.name).toLowerCase();
      if (!allowed.has(extension)) continue;
      const absolutePath = path.join(dir, entry.name);
      files.push({
        absolutePath,
        relativePath: toRelative(root, absolutePath),
        extension,
      });
      logger?.debug(`  Added: ${absolutePath}`);
    }

    for (const sub of subdirs) {
      await visit(path.join(dir, sub.name));
    }
  };

  await visit(root);
  logger?.info(`Found ${files.length} source files to review`);
  return files;
}

// ============================================================
// Catalog
// ============================================================

/**
 * Check that `root` is an existing directory.
 */
export async function validateProjectRoot(
  root: string,
  walker: DirectoryWalker = new NodeDirectoryWalker(),
): Promise<Outcome<string, InvalidProjectPathError>> {
  const kind = await walker.kind(root);
  if (kind === "missing") {
    return { ok: false, error: new InvalidProjectPathError(root, "missing") };
  }
  if (kind === "file") {
    return { ok: false, error: new InvalidProjectPathError(root, "not_directory") };
  }
  return { ok: true, value: root };
}

/**
 * Validate the root, then produce the rendered tree and the flat list of
 * reviewable files.
 */
export async function buildCatalog(
  root: string,
  options: CatalogOptions,
): Promise<Outcome<SourceCatalog, InvalidProjectPathError>> {
  const walker = options.walker ?? new NodeDirectoryWalker();
  const checked = await validateProjectRoot(root, walker);
  if (!checked.ok) {
    return checked;
  }

  const tree = await renderTree(root, options.excludedDirs, walker, options.logger);
  const files = await collectSourceFiles(root, { ...options, walker });
  return { ok: true, value: { tree, files } };
}
