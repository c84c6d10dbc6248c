/** Stable codes for every failure the planner reports. */
export const ErrorCodes = {
  CREDENTIAL_MISSING: "CREDENTIAL_MISSING",
  IDEA_MISSING: "IDEA_MISSING",
  INVALID_CONFIG: "INVALID_CONFIG",
  CONTEXT_PARSE_FAILED: "CONTEXT_PARSE_FAILED",
  CHAT_INIT_FAILED: "CHAT_INIT_FAILED",
  CONVERSATION_FAILED: "CONVERSATION_FAILED",
  SYNTHESIS_FAILED: "SYNTHESIS_FAILED",
  SPEC_EMPTY: "SPEC_EMPTY",
  ARTIFACT_WRITE_FAILED: "ARTIFACT_WRITE_FAILED",
  AGENT_INVOKE_FAILED: "AGENT_INVOKE_FAILED",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
