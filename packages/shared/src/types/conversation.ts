/** Who produced a turn */
export type ConversationRole = "user" | "assistant";

/**
 * Marks the synthetic turns a session is primed with.
 * "system" is the instructions turn (sent with the user role); "acknowledgment" is the canned reply.
 */
export type SeedMarker = "system" | "acknowledgment";

/** A single turn in the conversation history */
export interface ConversationTurn {
  readonly role: ConversationRole;
  readonly content: string;
  readonly seed?: SeedMarker;
}

/** Why the interactive loop stopped */
export type ConversationEndReason = "keyword" | "interrupted";
