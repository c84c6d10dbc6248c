/** Supported hosted model providers; the first is the default */
export const AGENT_TYPES = ["openai", "claude"] as const;

export type AgentType = (typeof AGENT_TYPES)[number];

/** Which provider and model the planner talks to */
export interface AgentConfig {
  type: AgentType;
  model: string;
}

/** Display label for a provider, used in error hints */
export function getAgentDisplayName(type: AgentType): string {
  return type === "claude" ? "Claude" : "OpenAI";
}
