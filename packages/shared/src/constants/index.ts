import type { AgentType } from "../types/agent.js";

/** Files the planner reads or writes in the working directory */
export const PLANNER_PATHS = {
  projectContext: "project.context.json",
  agentInstructions: "AGENT_INSTRUCTIONS.md",
  env: ".env",
} as const;

/** Suffix of the human-readable Feature Plan */
export const PLAN_FILE_SUFFIX = ".plan.md";

/** Suffix of the machine-readable Execution Spec */
export const SPEC_FILE_SUFFIX = ".spec.md";

/** Base filename used when the feature name sanitizes to nothing */
export const FALLBACK_FEATURE_BASENAME = "feature_plan";

/** Inputs that end the interactive session (compared trimmed, lowercased) */
export const TERMINATION_KEYWORDS = ["done", "save", "finish", "exit", "quit", "q"] as const;

/** True if the raw line typed by the user should end the conversation. */
export function isTerminationKeyword(input: string): boolean {
  const normalized = input.trim().toLowerCase();
  return TERMINATION_KEYWORDS.some((keyword) => keyword === normalized);
}

/** Summary shown when no project.context.json exists */
export const GREENFIELD_CONTEXT_MESSAGE = "Starting a new greenfield plan.";

/** Defaults interpolated into the context summary when the payload omits them */
export const DEFAULT_PRODUCT_NAME = "this project";
export const DEFAULT_STACK_DESCRIPTOR = "defined";

/** Model used per provider when neither --model nor PLANNER_MODEL is set */
export const DEFAULT_MODELS: Record<AgentType, string> = {
  openai: "gpt-4o-mini",
  claude: "claude-sonnet-4-20250514",
};

/** Environment variable holding the credential for each provider */
export const API_KEY_ENV_VARS: Record<AgentType, "OPENAI_API_KEY" | "ANTHROPIC_API_KEY"> = {
  openai: "OPENAI_API_KEY",
  claude: "ANTHROPIC_API_KEY",
};

/** Upper bound on tokens requested for any single reply */
export const MAX_OUTPUT_TOKENS = 8192;
