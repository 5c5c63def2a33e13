import type { ChatCollaborator, SessionState, SubmissionResult, Turn } from "../utils/types.js";

/**
 * Placeholder handed back to the caller when the chat endpoint fails.
 */
export function collaboratorFailureMessage(err: unknown): string {
  const detail = err instanceof Error ? err.message : String(err);
  return `[Error communicating with Ollama: ${detail}]`;
}

/**
 * Owns one append-only transcript for the duration of a review run.
 *
 * Every submission sends the whole transcript, so later requests see all
 * earlier turns. A failed submission keeps its user turn but appends no
 * assistant turn; the session stays active. After `reset()` the next
 * submission starts a new, empty transcript.
 */
export class ConversationSession {
  private turns: Turn[] = [];
  private status: SessionState = "active";

  constructor(private readonly collaborator: ChatCollaborator) {}

  get state(): SessionState {
    return this.status;
  }

  get length(): number {
    return this.turns.length;
  }

  /**
   * Copy of the transcript; mutating it does not affect the session.
   */
  transcript(): Turn[] {
    return [...this.turns];
  }

  async submit(userContent: string): Promise<SubmissionResult> {
    if (this.status === "cleared") {
      this.turns = [];
      this.status = "active";
    }

    const userTurn: Turn = { role: "user", content: userContent };
    this.turns.push(Object.freeze(userTurn));

    let reply: string;
    try {
      reply = await this.collaborator.complete([...this.turns]);
    } catch (err) {
      return {
        status: "failed",
        content: collaboratorFailureMessage(err),
        error: err instanceof Error ? err.message : String(err),
      };
    }

    const assistantTurn: Turn = { role: "assistant", content: reply };
    this.turns.push(Object.freeze(assistantTurn));
    return { status: "replied", content: reply };
  }

  reset(): void {
    this.turns = [];
    this.status = "cleared";
  }
}
