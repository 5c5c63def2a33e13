import path from "path";

// ============================================================
// Directory & File Names
// ============================================================

export const README_FILE = "README.md";
export const DESCRIPTION_FILE = "description.txt";
export const CONFIG_FILE = ".project-review.json";
export const LOGGER_NAME = "project-review";

// ============================================================
// Default Configuration
// ============================================================

export const DEFAULT_ALLOWED_EXTENSIONS = [
  ".py",
  ".cpp",
  ".h",
  ".hpp",
  ".c",
  ".java",
  ".js",
  ".ts",
  ".cs",
  ".go",
];

export const DEFAULT_EXCLUDED_DIRS = [
  ".git",
  ".idea",
  ".vscode",
  "__pycache__",
  ".venv",
  "build",
];

export const DEFAULT_MAX_FILE_CHARS = 3000;
export const DEFAULT_IMPORTANCE_MARKERS = ["main", "app", "core", "index"];

// ============================================================
// Chat Endpoint
// ============================================================

export const DEFAULT_MODEL = "gemma3:1b";
export const DEFAULT_OLLAMA_HOST = "http://127.0.0.1:11434";
export const OLLAMA_CHAT_PATH = "api/chat";
export const DEFAULT_REQUEST_TIMEOUT_MS = 0; // no timeout

// ============================================================
// Placeholders
// ============================================================

export const README_NOT_FOUND = "README.md not found.";
export const DEFAULT_DESCRIPTION = "This is an app";
export const FILE_READ_PLACEHOLDER = "# Error reading file content";

// ============================================================
// Helpers
// ============================================================

export function getReadmePath(projectDir: string): string {
  return path.join(projectDir, README_FILE);
}

export function getDescriptionPath(projectDir: string): string {
  return path.join(projectDir, DESCRIPTION_FILE);
}

export function getConfigPath(projectDir: string): string {
  return path.join(projectDir, CONFIG_FILE);
}
