export { ARCHITECT_ACKNOWLEDGMENT, buildSystemPrompt, buildOpeningMessage } from "./system-prompt.js";
export { buildFeatureNamePrompt } from "./naming-prompt.js";
export { buildPlanPrompt, buildSpecPrompt, type SynthesisPromptInput } from "./synthesis-prompts.js";
export { AGENT_INSTRUCTIONS_CONTENT } from "./agent-instructions.js";
