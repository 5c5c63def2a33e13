import chalk, { type ChalkInstance } from "chalk";

import type { ProgressReporter, StageName, StageOutput } from "./types.js";

const STAGE_NUMBERS: Record<StageName, number> = {
  description: 1,
  structure: 2,
  files: 3,
  summary: 4,
};

export function formatDuration(ms: number): string {
  if (ms < 60_000) {
    return `${Math.round(ms / 1000)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  if (minutes < 60) {
    return `${minutes}m ${seconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}

export interface ConsoleReporterOptions {
  write?: (line: string) => void;
  colors?: ChalkInstance;
  now?: () => number;
}

/**
 * Line-oriented reporter: a header per stage, a counter per reviewed file and
 * every reply as it arrives.
 */
export class ConsoleProgressReporter implements ProgressReporter {
  private write: (line: string) => void;
  private colors: ChalkInstance;
  private now: () => number;
  private total = 0;
  private completed = 0;
  private startedAt = 0;

  constructor(options: ConsoleReporterOptions = {}) {
    this.write = options.write ?? ((line) => console.log(line));
    this.colors = options.colors ?? chalk;
    this.now = options.now ?? Date.now;
  }

  stageStart(stage: StageName, total?: number): void {
    const step = this.colors.bold.blue(`Step ${STAGE_NUMBERS[stage]}:`);
    this.startedAt = this.now();

    switch (stage) {
      case "description":
        this.write(`\n${step} Sending project description...`);
        break;
      case "structure":
        this.write(`\n${step} Analyzing project folder structure...`);
        break;
      case "files":
        this.total = total ?? 0;
        this.completed = 0;
        this.write(`\n${step} Reviewing ${this.total} source files...`);
        break;
      case "summary":
        this.write(`\n${step} Generating project-wide summary...`);
        break;
    }
  }

  advance(label: string): void {
    this.completed++;
    const elapsed = formatDuration(this.now() - this.startedAt);
    this.write(this.colors.gray(`[${this.completed}/${this.total}] ${label} (${elapsed})`));
  }

  stageEnd(stage: StageName): void {
    if (stage !== "files") return;
    const elapsed = formatDuration(this.now() - this.startedAt);
    this.write(this.colors.blue(`Reviewed ${this.completed}/${this.total} files in ${elapsed}`));
  }

  reply(output: StageOutput): void {
    if (output.stage === "files") {
      const header = output.failed
        ? this.colors.bold.red(`ERROR: ${output.label}`)
        : this.colors.bold.green(`Review for ${output.label}:`);
      this.write(`\n${header}`);
    } else if (output.stage === "summary") {
      this.write(`\n${this.colors.bold.yellow("PROJECT SUMMARY:")}`);
    }
    this.write(output.failed ? this.colors.red(output.content) : output.content);
  }
}

export class SilentProgressReporter implements ProgressReporter {
  stageStart(): void {}
  advance(): void {}
  stageEnd(): void {}
  reply(): void {}
}
