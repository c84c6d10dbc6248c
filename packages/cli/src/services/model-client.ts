import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import type { AgentConfig, AgentType, ConversationRole } from "@feature-planner/shared";
import { API_KEY_ENV_VARS, MAX_OUTPUT_TOKENS, getAgentDisplayName } from "@feature-planner/shared";
import type { PlannerConfig } from "../config.js";
import { AppError } from "../errors/error-handler.js";
import { ErrorCodes } from "../errors/error-codes.js";
import { classifyAgentApiError, getErrorMessage } from "../utils/error-utils.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("model-client");

/** Message in the provider-neutral shape every client accepts */
export interface ModelMessage {
  role: ConversationRole;
  content: string;
}

/**
 * Request/response access to a hosted chat model.
 * Constructed once per run and passed to every component that needs it.
 */
export interface ModelClient {
  readonly config: AgentConfig;
  /** Send the full message list; returns the reply to the last user message. */
  chat(messages: ModelMessage[]): Promise<string>;
  /** One-shot prompt with no history. */
  generate(prompt: string): Promise<string>;
}

/** Append a provider-specific hint to the raw API error text. */
export function formatAgentError(agentType: AgentType, raw: string, err: unknown): string {
  const name = getAgentDisplayName(agentType);
  switch (classifyAgentApiError(err)) {
    case "auth":
      return `${raw} Check that ${API_KEY_ENV_VARS[agentType]} is set in .env and valid.`;
    case "out_of_credit":
      return `${raw} Your ${name} account is out of credit; add credits and try again.`;
    case "rate_limit":
      return `${raw} ${name} rate limit reached; wait a moment and try again.`;
    default:
      return raw;
  }
}

function toInvokeError(agentType: AgentType, err: unknown): AppError {
  const raw = getErrorMessage(err);
  const kind = classifyAgentApiError(err);
  log.error("Model request failed", { agentType, raw, kind });
  return new AppError(ErrorCodes.AGENT_INVOKE_FAILED, formatAgentError(agentType, raw, err), {
    agentType,
    raw,
    kind,
  });
}

export class OpenAIModelClient implements ModelClient {
  private readonly client: OpenAI;

  constructor(
    readonly config: AgentConfig,
    apiKey: string
  ) {
    this.client = new OpenAI({ apiKey });
  }

  async chat(messages: ModelMessage[]): Promise<string> {
    const openaiMessages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    for (const m of messages) {
      openaiMessages.push({ role: m.role, content: m.content });
    }

    log.debug("OpenAI request", { model: this.config.model, messages: messages.length });
    try {
      const response = await this.client.chat.completions.create({
        model: this.config.model,
        messages: openaiMessages,
        max_tokens: MAX_OUTPUT_TOKENS,
      });
      return response.choices[0]?.message?.content ?? "";
    } catch (error: unknown) {
      throw toInvokeError("openai", error);
    }
  }

  generate(prompt: string): Promise<string> {
    return this.chat([{ role: "user", content: prompt }]);
  }
}

export class ClaudeModelClient implements ModelClient {
  private readonly client: Anthropic;

  constructor(
    readonly config: AgentConfig,
    apiKey: string
  ) {
    this.client = new Anthropic({ apiKey });
  }

  async chat(messages: ModelMessage[]): Promise<string> {
    log.debug("Claude request", { model: this.config.model, messages: messages.length });
    try {
      const response = await this.client.messages.create({
        model: this.config.model,
        max_tokens: MAX_OUTPUT_TOKENS,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
      });
      return response.content.flatMap((block) => (block.type === "text" ? [block.text] : [])).join("");
    } catch (error: unknown) {
      throw toInvokeError("claude", error);
    }
  }

  generate(prompt: string): Promise<string> {
    return this.chat([{ role: "user", content: prompt }]);
  }
}

/** Build the client for the configured provider. */
export function createModelClient(config: PlannerConfig): ModelClient {
  switch (config.agent.type) {
    case "openai":
      return new OpenAIModelClient(config.agent, config.apiKey);
    case "claude":
      return new ClaudeModelClient(config.agent, config.apiKey);
  }
}
