import fs from "node:fs/promises";

import type {
  ChatCollaborator,
  FileCandidate,
  Outcome,
  ProgressReporter,
  ProjectContext,
  ReviewOutcome,
  ReviewReport,
  StageName,
  StageOutput,
  SubmissionResult,
} from "../utils/types.js";
import { FILE_READ_PLACEHOLDER } from "../utils/constants.js";
import { describeError, FileReadError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { SilentProgressReporter } from "../utils/progress.js";
import {
  getDescriptionPrompt,
  getFileReviewPrompt,
  getStructurePrompt,
  getSummaryPrompt,
  truncateToChars,
} from "../review-prompts.js";
import { ConversationSession } from "./session.js";

export type SourceReader = (absolutePath: string) => Promise<string>;

export interface OrchestratorOptions {
  collaborator: ChatCollaborator;
  maxFileChars: number;
  reporter?: ProgressReporter;
  logger?: Logger;
  readSource?: SourceReader;
  createSession?: (collaborator: ChatCollaborator) => ConversationSession;
}

const STAGE_LABELS: Record<Exclude<StageName, "files">, string> = {
  description: "Project description",
  structure: "Project structure",
  summary: "Project summary",
};

const readUtf8: SourceReader = (absolutePath) => fs.readFile(absolutePath, "utf-8");

// ============================================================
// Review Orchestrator
// ============================================================

/**
 * Runs the four review stages, strictly in order, over one conversation:
 * description intake, structure analysis, one review per file, and a final
 * summary. Failures inside a stage become that stage's output; the session
 * is reset when the run ends, whatever happened.
 */
export class ReviewOrchestrator {
  private collaborator: ChatCollaborator;
  private maxFileChars: number;
  private reporter: ProgressReporter;
  private logger: Logger | undefined;
  private readSource: SourceReader;
  private createSession: (collaborator: ChatCollaborator) => ConversationSession;

  constructor(options: OrchestratorOptions) {
    this.collaborator = options.collaborator;
    this.maxFileChars = options.maxFileChars;
    this.reporter = options.reporter ?? new SilentProgressReporter();
    this.logger = options.logger;
    this.readSource = options.readSource ?? readUtf8;
    this.createSession = options.createSession ?? ((c) => new ConversationSession(c));
  }

  async run(context: ProjectContext, tree: string, files: readonly FileCandidate[]): Promise<ReviewReport> {
    const session = this.createSession(this.collaborator);
    const stages: StageOutput[] = [];
    const outcomes: ReviewOutcome[] = [];

    try {
      // Stage 1: description intake
      stages.push(await this.runSingleStage(session, "description", getDescriptionPrompt(context)));

      // Stage 2: structure analysis
      stages.push(await this.runSingleStage(session, "structure", getStructurePrompt(tree)));

      // Stage 3: per-file review
      this.reporter.stageStart("files", files.length);
      for (const file of files) {
        const { outcome, output } = await this.reviewFile(session, file);
        outcomes.push(outcome);
        stages.push(output);
        this.reporter.reply(output);
        this.reporter.advance(file.relativePath);
      }
      this.reporter.stageEnd("files");

      // Stage 4: summary
      const summary = await this.runSingleStage(session, "summary", getSummaryPrompt());
      stages.push(summary);

      return { stages, outcomes, summary: summary.content, turnCount: session.length };
    } finally {
      session.reset();
    }
  }

  // ----------------------------------------------------------------
  // Private: stages
  // ----------------------------------------------------------------

  private async runSingleStage(
    session: ConversationSession,
    stage: Exclude<StageName, "files">,
    prompt: string,
  ): Promise<StageOutput> {
    this.reporter.stageStart(stage);
    const result = await session.submit(prompt);
    if (result.status === "failed") {
      this.logger?.warn(`${STAGE_LABELS[stage]} request failed: ${result.error}`);
    }
    const output = this.toStageOutput(stage, STAGE_LABELS[stage], result);
    this.reporter.reply(output);
    this.reporter.stageEnd(stage);
    return output;
  }

  /**
   * Review one file. A read failure still sends a degraded request with
   * placeholder content; either failure is recorded on the outcome.
   */
  private async reviewFile(
    session: ConversationSession,
    file: FileCandidate,
  ): Promise<{ outcome: ReviewOutcome; output: StageOutput }> {
    const relativePath = file.relativePath;

    try {
      const read = await this.readFile(file);
      if (!read.ok) {
        this.logger?.warn(read.error.message);
      }
      const code = read.ok ? truncateToChars(read.value, this.maxFileChars) : FILE_READ_PLACEHOLDER;

      const result = await session.submit(getFileReviewPrompt(file, code));
      const output = this.toStageOutput("files", relativePath, result);

      if (!read.ok) {
        return { outcome: { status: "failed", relativePath, error: read.error.message }, output };
      }
      if (result.status === "failed") {
        this.logger?.warn(`Review request for ${relativePath} failed: ${result.error}`);
        return { outcome: { status: "failed", relativePath, error: result.error }, output };
      }
      return { outcome: { status: "reviewed", relativePath, reply: result.content }, output };
    } catch (err) {
      const error = describeError(err);
      this.logger?.error(`${relativePath}: ${error}`);
      return {
        outcome: { status: "failed", relativePath, error },
        output: { stage: "files", label: relativePath, content: `[ERROR] ${error}`, failed: true },
      };
    }
  }

  // ----------------------------------------------------------------
  // Private: helpers
  // ----------------------------------------------------------------

  private async readFile(file: FileCandidate): Promise<Outcome<string, FileReadError>> {
    try {
      return { ok: true, value: await this.readSource(file.absolutePath) };
    } catch (err) {
      return { ok: false, error: new FileReadError(file.relativePath, err) };
    }
  }

  private toStageOutput(stage: StageName, label: string, result: SubmissionResult): StageOutput {
    return { stage, label, content: result.content, failed: result.status === "failed" };
  }
}
