import { REQUIREMENT_TYPES, executionSpecToMarkdown } from "@feature-planner/shared";

export interface SynthesisPromptInput {
  /** Project context pretty-printed, "{}" when absent */
  contextJson: string;
  /** Conversation rendered as `[Role]: content` lines */
  history: string;
}

/** Example embedded in the spec prompt so the model sees the exact line format. */
const SPEC_EXAMPLE = executionSpecToMarkdown({
  featureName: "Example Feature",
  requirements: [
    { id: "REQ-001", type: "SYSTEM", text: "THE SYSTEM SHALL do something." },
    {
      id: "REQ-002",
      type: "USER_STORY",
      text: "WHEN the user does something, THE SYSTEM SHALL respond.",
    },
  ],
}).trimEnd();

function contextAndHistory({ contextJson, history }: SynthesisPromptInput): string {
  return `**Adhere to this context (if provided):**
---
${contextJson}
---

Here is our conversation history:
${history}

Generate the Markdown file now.`;
}

/** Prompt for the human-readable Feature Plan (six mandated sections). */
export function buildPlanPrompt(input: SynthesisPromptInput): string {
  return `Based on our entire conversation, write the human-readable "Feature Plan" in Markdown.
The plan MUST contain these sections:
1. **Feature Name** (e.g. "Auth: Forgot Password Flow")
2. **Problem Statement** (the why)
3. **Success Metrics** (how we know it works)
4. **User Stories / Journey** (the what)
5. **Implementation Notes** (the how: high-level API needs and UI components)
6. **Edge Cases & Security** (e.g. "User is not found", "Rate limiting")

Output ONLY the Markdown content, with no other text or formatting.

${contextAndHistory(input)}
`;
}

/** Prompt for the machine-readable Execution Spec (sequential, typed, EARS-style requirements). */
export function buildSpecPrompt(input: SynthesisPromptInput): string {
  return `Based on our entire conversation, write the machine-readable "Execution Spec" in **MARKDOWN**,
structured with Markdown headings and bullet points.

Example of the expected output:

\`\`\`markdown
${SPEC_EXAMPLE}
\`\`\`

The structure must be:

# Execution Specification

## Feature: [Feature Name]

### Requirements:
*   **[ID] [Type: ${REQUIREMENT_TYPES.join(" | ")}]** [A clear, testable, EARS-style requirement, e.g. WHEN a user clicks 'Forgot Password', THE SYSTEM SHALL navigate to the 'Password Reset' view.]

**Rules:**
* Write a requirement for EVERY actionable item, user story and system behavior we discussed.
* IDs are sequential (REQ-001, REQ-002, ...).
* The requirement text is what a coding agent will implement, so it must be an unambiguous instruction.

${contextAndHistory(input)}
`;
}
