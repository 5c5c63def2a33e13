#!/usr/bin/env node

import path from "node:path";
import { Command } from "commander";
import chalk from "chalk";
import { z } from "zod";

import type { CLIOptions } from "./utils/types.js";
import { DEFAULT_DESCRIPTION, LOGGER_NAME } from "./utils/constants.js";
import { ConfigError, InvalidProjectPathError } from "./utils/errors.js";
import { Logger } from "./utils/logger.js";
import { ConsoleProgressReporter, SilentProgressReporter } from "./utils/progress.js";
import { reviewProject } from "./core/pipeline.js";

// ============================================================
// Option parsing
// ============================================================

const positiveInt = (flag: string) =>
  z.coerce.number({ invalid_type_error: `${flag} must be a number` }).int(`${flag} must be an integer`).positive(`${flag} must be positive`);

const rawOptionsSchema = z.object({
  dir: z.string().min(1),
  description: z.string().min(1),
  limit: positiveInt("--limit").optional(),
  model: z.string().min(1).optional(),
  host: z.string().url("--host must be a URL").optional(),
  timeout: positiveInt("--timeout").optional(),
  logDir: z.string().min(1).optional(),
  quiet: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

function parseOptions(raw: Record<string, unknown>): CLIOptions {
  const result = rawOptionsSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => issue.message).join("; ");
    console.error(chalk.red(`\nInvalid options: ${detail}\n`));
    process.exit(1);
  }
  const opts = result.data;

  return {
    project: path.resolve(opts.dir),
    description: opts.description,
    limit: opts.limit ?? null,
    model: opts.model ?? process.env.OLLAMA_MODEL ?? null,
    host: opts.host ?? process.env.OLLAMA_HOST ?? null,
    timeoutMs: opts.timeout ?? null,
    logDir: opts.logDir ? path.resolve(opts.logDir) : null,
    quiet: opts.quiet,
    verbose: opts.verbose,
  };
}

// ============================================================
// CLI Program
// ============================================================

const program = new Command();

program
  .name("project-review")
  .description("Conversational code review of a whole project against a local Ollama model")
  .version("0.1.0")
  .option("-d, --dir <path>", "Project directory to analyze", process.cwd())
  .option("--description <text>", "Short description of the project", DEFAULT_DESCRIPTION)
  .option("-l, --limit <n>", "Limit the number of files to review")
  .option("--model <name>", "Ollama model (default: $OLLAMA_MODEL or gemma3:1b)")
  .option("--host <url>", "Ollama base URL (default: $OLLAMA_HOST or http://127.0.0.1:11434)")
  .option("--timeout <ms>", "Per-request timeout in milliseconds")
  .option("--log-dir <path>", "Also write the log to <path>/project-review.log")
  .option("-q, --quiet", "Only print the final summary", false)
  .option("-v, --verbose", "Verbose output", false)
  .action(async (raw: Record<string, unknown>) => {
    const options = parseOptions(raw);

    if (options.verbose) {
      process.env.VERBOSE = "1";
    }

    const logger = new Logger(options.logDir, LOGGER_NAME);
    const reporter = options.quiet ? new SilentProgressReporter() : new ConsoleProgressReporter();

    try {
      const report = await reviewProject({
        project: options.project,
        description: options.description,
        limit: options.limit,
        overrides: {
          ...(options.model ? { model: options.model } : {}),
          ...(options.host ? { host: options.host } : {}),
          ...(options.timeoutMs ? { request_timeout_ms: options.timeoutMs } : {}),
        },
        reporter,
        logger,
      });

      if (options.quiet) {
        console.log(report.summary);
      }

      const failed = report.outcomes.filter((o) => o.status === "failed");
      if (failed.length > 0) {
        logger.warn(`${failed.length} of ${report.outcomes.length} file review(s) failed`);
      }
    } catch (err) {
      if (err instanceof InvalidProjectPathError || err instanceof ConfigError) {
        console.error(chalk.red(`\n[Error] ${err.message}\n`));
      } else {
        const message = err instanceof Error ? err.message : String(err);
        console.error(chalk.red(`\nReview failed: ${message}\n`));
      }
      await logger.close();
      process.exit(1);
    }

    await logger.close();
  });

// ============================================================
// Parse
// ============================================================

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(String(err)));
  process.exit(1);
});
