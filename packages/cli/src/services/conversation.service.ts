import type { ConversationEndReason } from "@feature-planner/shared";
import { isTerminationKeyword } from "@feature-planner/shared";
import type { Terminal } from "../ui/terminal.js";
import { withSpinner } from "../ui/terminal.js";
import { createLogger } from "../utils/logger.js";
import type { ChatSession } from "./chat-session.js";

const log = createLogger("conversation");

export const USER_PROMPT_LABEL = "You:";
export const KEYWORD_END_MESSAGE =
  "Great. I'll synthesize our conversation and generate the artifacts...";
export const INTERRUPTED_END_MESSAGE = "Session ended. Synthesizing files...";

/**
 * Read user lines and relay them to the session until a termination keyword,
 * end of input or Ctrl+C. Blank lines are ignored; keywords are never sent.
 * A failed turn propagates to the caller.
 */
export async function runConversationLoop(
  session: ChatSession,
  terminal: Terminal
): Promise<ConversationEndReason> {
  for (;;) {
    const line = await terminal.prompt(USER_PROMPT_LABEL);
    if (line === null) {
      log.info("Input closed, ending conversation");
      terminal.heading(INTERRUPTED_END_MESSAGE);
      return "interrupted";
    }

    const input = line.trim();
    if (isTerminationKeyword(input)) {
      terminal.heading(KEYWORD_END_MESSAGE);
      return "keyword";
    }
    if (!input) continue;

    const reply = await withSpinner(terminal, "Thinking...", () => session.send(input));
    terminal.agent(reply);
  }
}
