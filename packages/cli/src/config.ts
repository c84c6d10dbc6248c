import { z } from "zod";
import type { AgentConfig } from "@feature-planner/shared";
import { AGENT_TYPES, API_KEY_ENV_VARS, DEFAULT_MODELS, PLANNER_PATHS } from "@feature-planner/shared";
import { AppError } from "./errors/error-handler.js";
import { ErrorCodes } from "./errors/error-codes.js";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS, type LogLevel } from "./utils/logger.js";

/** Unset and blank environment values are treated the same */
const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const envSchema = z.object({
  PLANNER_PROVIDER: z.preprocess(
    (value) => (typeof value === "string" ? blankToUndefined(value.trim().toLowerCase()) : value),
    z.enum(AGENT_TYPES).default(AGENT_TYPES[0])
  ),
  PLANNER_MODEL: optionalString,
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" ? blankToUndefined(value.trim().toLowerCase()) : value),
    z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL)
  ),
});

/** Resolved settings for one planner run */
export interface PlannerConfig {
  agent: AgentConfig;
  apiKey: string;
  logLevel: LogLevel;
}

/** Command-line options that take precedence over the environment */
export interface ConfigOverrides {
  provider?: string;
  model?: string;
}

/**
 * Resolve provider, model and credential from the environment (already merged with .env).
 * Throws AppError INVALID_CONFIG for malformed values and CREDENTIAL_MISSING when the
 * selected provider has no API key.
 */
export function loadConfig(env: NodeJS.ProcessEnv, overrides: ConfigOverrides = {}): PlannerConfig {
  const result = envSchema.safeParse({
    ...env,
    PLANNER_PROVIDER: overrides.provider ?? env.PLANNER_PROVIDER,
    PLANNER_MODEL: overrides.model ?? env.PLANNER_MODEL,
  });
  if (!result.success) {
    const first = result.error.issues[0];
    const field = first?.path.join(".") || "configuration";
    throw new AppError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid ${field}: ${first?.message ?? "validation failed"}`,
      { field }
    );
  }

  const data = result.data;
  const type = data.PLANNER_PROVIDER;
  const keyVar = API_KEY_ENV_VARS[type];
  const apiKey = data[keyVar];
  if (!apiKey) {
    throw new AppError(
      ErrorCodes.CREDENTIAL_MISSING,
      `\`${keyVar}\` not found.`,
      { provider: type },
      [
        `Please create a \`${PLANNER_PATHS.env}\` file and add your API key.`,
        `Example: \`${keyVar}="your_api_key_here"\``,
      ]
    );
  }

  return {
    agent: { type, model: data.PLANNER_MODEL ?? DEFAULT_MODELS[type] },
    apiKey,
    logLevel: data.LOG_LEVEL,
  };
}
