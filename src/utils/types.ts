// ============================================================
// Conversation Types
// ============================================================

export type TurnRole = "user" | "assistant";

export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
}

export type SessionState = "active" | "cleared";

export type SubmissionResult =
  | { status: "replied"; content: string }
  | { status: "failed"; content: string; error: string };

/**
 * Stateless request/response chat service. Receives the whole transcript on
 * every call and returns the content of one assistant reply.
 */
export interface ChatCollaborator {
  complete(turns: readonly Turn[]): Promise<string>;
}

// ============================================================
// Catalog Types
// ============================================================

export interface CatalogEntry {
  absolutePath: string;
  /** Relative to the project root, always with forward slashes. */
  relativePath: string;
  /** Lower-cased, including the leading dot (e.g. ".py"). */
  extension: string;
}

export interface FileCandidate extends CatalogEntry {
  priority: boolean;
}

export interface SourceCatalog {
  tree: string;
  files: CatalogEntry[];
}

export interface WalkerEntry {
  name: string;
  isDirectory: boolean;
}

/**
 * Read-only directory traversal primitive the catalog builder runs on.
 */
export interface DirectoryWalker {
  /** Resolves to "missing", "file" or "directory" for the given path. */
  kind(target: string): Promise<"missing" | "file" | "directory">;
  list(dir: string): Promise<WalkerEntry[]>;
}

// ============================================================
// Review Types
// ============================================================

export interface ProjectContext {
  readonly root: string;
  readonly description: string;
  readonly readme: string;
}

export type ReviewOutcome =
  | { status: "reviewed"; relativePath: string; reply: string }
  | { status: "failed"; relativePath: string; error: string };

export type StageName = "description" | "structure" | "files" | "summary";

export interface StageOutput {
  stage: StageName;
  /** Stage title, or the file's relative path for per-file reviews. */
  label: string;
  content: string;
  failed: boolean;
}

export interface ReviewReport {
  stages: StageOutput[];
  outcomes: ReviewOutcome[];
  summary: string;
  /** Transcript length observed just before the session was reset. */
  turnCount: number;
}

export type Outcome<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ============================================================
// Progress Types
// ============================================================

export interface ProgressReporter {
  stageStart(stage: StageName, total?: number): void;
  advance(label: string): void;
  stageEnd(stage: StageName): void;
  reply(output: StageOutput): void;
}

// ============================================================
// Configuration Types
// ============================================================

export interface ReviewConfig {
  allowed_extensions: readonly string[];
  excluded_dirs: readonly string[];
  max_file_chars: number;
  importance_markers: readonly string[];
  model: string;
  host: string;
  /** 0 disables the per-request timeout. */
  request_timeout_ms: number;
}

// ============================================================
// CLI Types
// ============================================================

export interface CLIOptions {
  project: string;
  description: string;
  limit: number | null;
  model: string | null;
  host: string | null;
  timeoutMs: number | null;
  logDir: string | null;
  quiet: boolean;
  verbose: boolean;
}
