import { CHAT_QUIT_COMMAND, RESTAURANT_RESPONSES, type ChatKeyword } from "@textbook/config";
import { getResponse } from "./responder.js";

export type ChatTurn = {
  reply: string;
  done: boolean;
};

export type ChatSessionOptions = {
  table?: ChatKeyword[];
  quitCommand?: string;
};

/**
 * One conversation with the restaurant bot. Each handled line produces a
 * reply; the quit command ends the session.
 */
export class ChatSession {
  private readonly table: ChatKeyword[];
  private readonly quitCommand: string;
  private finished = false;
  private turns = 0;

  constructor(options: ChatSessionOptions = {}) {
    this.table = options.table ?? RESTAURANT_RESPONSES;
    this.quitCommand = (options.quitCommand ?? CHAT_QUIT_COMMAND).toLowerCase();
  }

  get greeting(): string[] {
    return [
      "Restaurant ChatBot",
      "=".repeat(20),
      `Type '${this.quitCommand}' to exit`,
      "Bot: Hi! How can I help you today?",
    ];
  }

  get done(): boolean {
    return this.finished;
  }

  /** Lines answered so far, excluding the quit command. */
  get turnCount(): number {
    return this.turns;
  }

  handle(line: string): ChatTurn {
    if (this.finished) {
      throw new Error("Chat session has already ended");
    }

    const input = line.trim();
    if (input.toLowerCase() === this.quitCommand) {
      this.finished = true;
      return { reply: "Goodbye!", done: true };
    }

    this.turns++;
    return { reply: getResponse(input, this.table), done: false };
  }

  /**
   * End the session without the quit command, e.g. when input runs out.
   */
  close(): void {
    this.finished = true;
  }
}
