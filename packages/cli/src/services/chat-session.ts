import type { ConversationTurn } from "@feature-planner/shared";
import { ARCHITECT_ACKNOWLEDGMENT, buildOpeningMessage } from "../prompts/index.js";
import { createLogger } from "../utils/logger.js";
import type { ModelClient } from "./model-client.js";

const log = createLogger("chat-session");

/**
 * Stateful chat over a ModelClient.
 * History starts with the system-prompt seed turn (user role) and the canned acknowledgment;
 * each send appends the user turn and the reply together, only once the reply arrives.
 */
export class ChatSession {
  private readonly turns: ConversationTurn[];

  constructor(
    private readonly client: ModelClient,
    systemPrompt: string
  ) {
    this.turns = [
      { role: "user", content: systemPrompt, seed: "system" },
      { role: "assistant", content: ARCHITECT_ACKNOWLEDGMENT, seed: "acknowledgment" },
    ];
  }

  /** Snapshot of the history, seed turns included. */
  get history(): readonly ConversationTurn[] {
    return [...this.turns];
  }

  /** Send the opening message built from the user's idea. */
  start(idea: string): Promise<string> {
    return this.send(buildOpeningMessage(idea));
  }

  async send(text: string): Promise<string> {
    const userTurn: ConversationTurn = { role: "user", content: text };
    const messages = [...this.turns, userTurn].map(({ role, content }) => ({ role, content }));
    const reply = await this.client.chat(messages);
    this.turns.push(userTurn, { role: "assistant", content: reply });
    log.debug("Turn completed", { turns: this.turns.length, replyLength: reply.length });
    return reply;
  }
}
