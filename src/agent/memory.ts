import type { ConversationTurn } from "../types";
import { truncateText } from "../utils";

export const CONTEXT_TURNS = 3;
export const MAX_TURN_CHARS = 400;

/** Append-only turn log for one conversation; only the tail is surfaced as context. */
export class ConversationMemory {
  private turns: ConversationTurn[] = [];

  get size(): number {
    return this.turns.length;
  }

  append(role: ConversationTurn["role"], content: string): void {
    this.turns.push(Object.freeze({ role, content }));
  }

  recent(count = CONTEXT_TURNS): readonly ConversationTurn[] {
    return count <= 0 ? [] : this.turns.slice(-count);
  }

  all(): readonly ConversationTurn[] {
    return [...this.turns];
  }

  clear(): void {
    this.turns = [];
  }

  /** Prefixes the query with the most recent turns, each cut to a fixed budget. */
  contextualize(query: string): string {
    const recent = this.recent();
    if (recent.length === 0) {
      return query;
    }
    const history = recent.map(
      (turn) => `${turn.role === "user" ? "User" : "Assistant"}: ${truncateText(turn.content, MAX_TURN_CHARS)}`
    );
    return ["Previous conversation:", ...history, "", `Current question: ${query}`].join("\n");
  }
}
