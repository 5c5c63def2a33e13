import path from "node:path";

import type {
  ChatCollaborator,
  DirectoryWalker,
  ProgressReporter,
  ReviewConfig,
  ReviewReport,
} from "../utils/types.js";
import type { Logger } from "../utils/logger.js";
import { loadReviewConfig, type ReviewConfigOverrides } from "../utils/review-config.js";
import { loadProjectContext } from "../utils/project-context.js";
import { buildCatalog, NodeDirectoryWalker, validateProjectRoot } from "./catalog.js";
import { budgetFiles } from "./budgeter.js";
import { OllamaChatClient } from "./ollama-client.js";
import { ReviewOrchestrator, type SourceReader } from "./orchestrator.js";

export interface ReviewProjectOptions {
  project: string;
  description: string;
  limit?: number | null;
  overrides?: ReviewConfigOverrides;
  /** Defaults to an Ollama client built from the resolved configuration. */
  collaborator?: ChatCollaborator;
  reporter?: ProgressReporter;
  logger?: Logger;
  walker?: DirectoryWalker;
  readSource?: SourceReader;
}

export function createOllamaCollaborator(config: Readonly<ReviewConfig>, logger?: Logger): ChatCollaborator {
  return new OllamaChatClient({
    model: config.model,
    host: config.host,
    timeoutMs: config.request_timeout_ms,
    logger,
  });
}

/**
 * Review a whole project. Throws InvalidProjectPathError or ConfigError
 * before any chat request is made; everything after that is reported inside
 * the returned report.
 */
export async function reviewProject(options: ReviewProjectOptions): Promise<ReviewReport> {
  const root = path.resolve(options.project);
  const logger = options.logger;
  const walker = options.walker ?? new NodeDirectoryWalker();

  logger?.info(`Analyzing project: ${root}`);

  const checked = await validateProjectRoot(root, walker);
  if (!checked.ok) {
    throw checked.error;
  }

  const config = await loadReviewConfig(root, options.overrides);
  const context = await loadProjectContext(root, options.description, logger);
  logger?.debug(`Project description: ${context.description}`);
  logger?.debug(`Project README: ${context.readme}`);

  const catalog = await buildCatalog(root, {
    allowedExtensions: config.allowed_extensions,
    excludedDirs: config.excluded_dirs,
    walker,
    logger: logger?.child("catalog"),
  });
  if (!catalog.ok) {
    throw catalog.error;
  }
  logger?.debug(`Project tree:\n${catalog.value.tree}`);

  const files = budgetFiles(catalog.value.files, options.limit, config.importance_markers);
  if (files.length < catalog.value.files.length) {
    logger?.info(`Limiting to ${files.length} files`);
  }

  const orchestrator = new ReviewOrchestrator({
    collaborator: options.collaborator ?? createOllamaCollaborator(config, logger?.child("ollama")),
    maxFileChars: config.max_file_chars,
    reporter: options.reporter,
    logger,
    readSource: options.readSource,
  });

  return orchestrator.run(context, catalog.value.tree, files);
}
