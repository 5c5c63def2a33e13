/**
 * Raised before any chat interaction when the project root cannot be reviewed.
 */
export class InvalidProjectPathError extends Error {
  constructor(
    public readonly projectPath: string,
    public readonly reason: "missing" | "not_directory",
  ) {
    super(
      reason === "missing"
        ? `Path does not exist: ${projectPath}`
        : `Path is not a directory: ${projectPath}`,
    );
    this.name = "InvalidProjectPathError";
  }
}

export class FileReadError extends Error {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    super(`Error reading ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "FileReadError";
  }
}

/**
 * Transport or service failure of the chat endpoint. Thrown by the client so
 * the session can tell real replies from failed exchanges.
 */
export class CollaboratorError extends Error {
  constructor(
    message: string,
    public readonly reason: "unreachable" | "http_status" | "invalid_response" | "timeout",
    public readonly status?: number,
  ) {
    super(message);
    this.name = "CollaboratorError";
  }
}

export class ConfigError extends Error {
  constructor(
    public readonly configPath: string,
    detail: string,
  ) {
    super(`Invalid configuration in ${configPath}: ${detail}`);
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
