/**
 * Prompt builders for the four review stages. Every prompt is one user turn
 * in the shared conversation, so later prompts can refer back to earlier
 * replies without repeating them.
 */

import type { FileCandidate, ProjectContext } from "./utils/types.js";

/**
 * First `maxChars` characters of `content` (code points, not UTF-16 units).
 */
export function truncateToChars(content: string, maxChars: number): string {
  if (content.length <= maxChars) {
    return content;
  }
  let out = "";
  let count = 0;
  for (const char of content) {
    if (count === maxChars) break;
    out += char;
    count++;
  }
  return out;
}

export function getDescriptionPrompt(context: ProjectContext): string {
  return (
    `This is a description of the project:\n\n${context.description}\n\n` +
    `This is the provided README.md file:\n\n${context.readme}\n\n` +
    "Use this to understand its purpose, and keep it in mind as context for everything that follows."
  );
}

export function getStructurePrompt(tree: string): string {
  return (
    `Here is the project's folder structure:\n\n${tree}\n\n` +
    "Comment on any organization or architecture issues."
  );
}

export function getFileReviewPrompt(file: FileCandidate, code: string): string {
  const language = file.extension.replace(/^\./, "");
  const lines = [
    "You are a senior code reviewer. Please review the following file for:",
    "- Bugs",
    "- Security issues",
    "- Logic errors",
    "- Style issues",
    "- Maintainability",
    "",
    `File: ${file.relativePath}`,
    "Code:",
    "```" + language,
    code,
    "```",
  ];
  return lines.join("\n");
}

export function getSummaryPrompt(): string {
  return `Based on your previous reviews of each file provided in the earlier prompts, provide a detailed project-wide summary. Please include:
1. Any critical bugs
2. Potential security issues
3. Overall architectural problems
4. Logic or flow issues
5. Best practice violations
Avoid repeating raw code. Be concise and actionable.`;
}
