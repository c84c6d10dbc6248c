import type { ConversationTurn } from "@feature-planner/shared";
import { AppError } from "../errors/error-handler.js";
import { ErrorCodes } from "../errors/error-codes.js";
import {
  buildPlanPrompt,
  buildSpecPrompt,
  type SynthesisPromptInput,
} from "../prompts/index.js";
import { createLogger } from "../utils/logger.js";
import type { ModelClient } from "./model-client.js";

const log = createLogger("synthesis");

export const EMPTY_SPEC_MESSAGE = "The model did not generate any content for the spec file.";

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Render history for the synthesis prompts as `[Role]: content` lines.
 * The system-prompt seed turn is dropped by its marker; the acknowledgment stays.
 */
export function formatHistoryForPrompt(turns: readonly ConversationTurn[]): string {
  return turns
    .filter((turn) => turn.seed !== "system")
    .map((turn) => `[${capitalize(turn.role)}]: ${turn.content}`)
    .join("\n");
}

/** One-shot generation of the Feature Plan and the Execution Spec. */
export class SynthesisService {
  constructor(private readonly client: ModelClient) {}

  async generatePlan(input: SynthesisPromptInput): Promise<string> {
    const plan = await this.client.generate(buildPlanPrompt(input));
    log.info("Plan generated", { length: plan.length });
    return plan;
  }

  /** Throws AppError SPEC_EMPTY when the model returns only whitespace. */
  async generateSpec(input: SynthesisPromptInput): Promise<string> {
    const spec = await this.client.generate(buildSpecPrompt(input));
    if (!spec.trim()) {
      throw new AppError(ErrorCodes.SPEC_EMPTY, EMPTY_SPEC_MESSAGE);
    }
    log.info("Spec generated", { length: spec.length });
    return spec;
  }
}
