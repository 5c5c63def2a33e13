import { z } from "zod";

import type { ChatCollaborator, Turn } from "../utils/types.js";
import { DEFAULT_OLLAMA_HOST, OLLAMA_CHAT_PATH } from "../utils/constants.js";
import { CollaboratorError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";

export interface OllamaClientConfig {
  model: string;
  host?: string;
  /** 0 or undefined disables the timeout. */
  timeoutMs?: number;
  logger?: Logger;
}

const chatResponseSchema = z.object({
  message: z.object({
    role: z.string().optional(),
    content: z.string(),
  }),
});

const normalizeHost = (host?: string): string => {
  const root = host ?? DEFAULT_OLLAMA_HOST;
  return root.endsWith("/") ? root : `${root}/`;
};

/**
 * Non-streaming client for Ollama's `/api/chat`. Each call sends the full
 * transcript and returns the trimmed assistant content.
 */
export class OllamaChatClient implements ChatCollaborator {
  private readonly url: string;

  constructor(private readonly config: OllamaClientConfig) {
    this.url = new URL(OLLAMA_CHAT_PATH, normalizeHost(config.host)).toString();
  }

  async complete(turns: readonly Turn[]): Promise<string> {
    const body = {
      model: this.config.model,
      messages: turns.map((turn) => ({ role: turn.role, content: turn.content })),
      stream: false,
    };
    const timeoutMs = this.config.timeoutMs ?? 0;

    this.config.logger?.debug(`POST ${this.url} (${turns.length} turn(s), model ${this.config.model})`);

    let response: Response;
    try {
      response = await fetch(this.url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
        signal: timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined,
      });
    } catch (err) {
      if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
        throw new CollaboratorError(`Request to ${this.url} timed out after ${timeoutMs}ms`, "timeout");
      }
      const detail = err instanceof Error ? err.message : String(err);
      throw new CollaboratorError(`Could not reach ${this.url}: ${detail}`, "unreachable");
    }

    if (!response.ok) {
      const errorBody = await response.text();
      throw new CollaboratorError(
        `Ollama error ${response.status}: ${errorBody}`.trim(),
        "http_status",
        response.status,
      );
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new CollaboratorError(`Ollama returned a non-JSON body: ${detail}`, "invalid_response");
    }

    const parsed = chatResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CollaboratorError("Ollama response is missing message.content", "invalid_response");
    }
    return parsed.data.message.content.trim();
  }
}
