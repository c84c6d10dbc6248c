import { PLANNER_PATHS } from "@feature-planner/shared";

/** Written once to AGENT_INSTRUCTIONS.md; describes how an executor agent consumes the artifacts. */
export const AGENT_INSTRUCTIONS_CONTENT = `# Agent Instructions: "Code Executor Agent"

This file describes the expected behavior of an AI Code Executor Agent.

An Executor Agent reads the generated \`*.spec.md\` and \`*.plan.md\` files and performs the
coding work they describe.

## 1. Load Context
The agent **must** always look for and read these two files:
1.  \`${PLANNER_PATHS.projectContext}\`: defines the tech stack (e.g. React, FastAPI) and design system. All generated code must follow it.
2.  \`*.plan.md\`: the human-readable "why" of the feature. Use it for context on the user's goals.

## 2. Receive a Work Order
The agent is started with the path of a \`*.spec.md\` file. That file is its "Work Order".

## 3. Execute the Work Order
Given a spec, the agent must:
1.  Load and parse the \`.spec.md\` file.
2.  Start a "Build Report" that tracks the status of each requirement.
3.  Go through **every single requirement** in the spec.
4.  For each requirement, write complete, production-ready code that implements it, following the stack from \`${PLANNER_PATHS.projectContext}\`.
5.  State clearly which file path each piece of code belongs in (e.g. \`src/components/ResetPasswordView.jsx\`).
6.  Once the code for a requirement is written and confirmed, mark it \`"SUCCESS"\` in the Build Report.
7.  If a problem prevents implementing a requirement, mark it \`"FAILED"\` and record the reason.

## 4. Report Build Status
After every requirement has been attempted:
1.  The agent **must** output the final "Build Report".
2.  The report **must** list:
    * **Successfully Built Requirements** (e.g. \`[SUCCESS] REQ-001: ...\`, \`[SUCCESS] REQ-002: ...\`)
    * **Failed Requirements** (e.g. \`[FAILED] REQ-003: ... (Reason: API specification was incomplete.)\`)
3.  End with a summary of the feature's status (e.g. "The feature is **partially built**. 2 of 3 requirements are complete.").
`;
