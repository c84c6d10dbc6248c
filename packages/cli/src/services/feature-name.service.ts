import { buildFeatureNamePrompt } from "../prompts/index.js";
import type { ModelClient } from "./model-client.js";

/** Ask the model for a short 2-3 word name for the idea (trimmed, unsanitized). */
export async function generateFeatureName(client: ModelClient, idea: string): Promise<string> {
  const response = await client.generate(buildFeatureNamePrompt(idea));
  return response.trim();
}
