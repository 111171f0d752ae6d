import readline from "readline";
import { ChatSession } from "@textbook/chatbot";
import type { DemoContext } from "../context";

/**
 * Interactive restaurant bot. Reads lines until "quit" or end of input.
 */
export async function runChatbotDemo({ print, logger, input, output }: DemoContext): Promise<void> {
  const session = new ChatSession();
  session.greeting.forEach((line) => print(line));

  const rl = readline.createInterface({ input, output, terminal: false });
  rl.setPrompt("You: ");
  rl.prompt();

  try {
    for await (const line of rl) {
      const turn = session.handle(line);
      print(`Bot: ${turn.reply}`);
      if (turn.done) break;
      rl.prompt();
    }
  } finally {
    rl.close();
  }

  if (!session.done) {
    // Input ran out before "quit"; end the pending prompt line first
    session.close();
    output.write("\n");
    print("Bot: Goodbye!");
  }
  logger.debug({ turns: session.turnCount }, "chat ended");
}
