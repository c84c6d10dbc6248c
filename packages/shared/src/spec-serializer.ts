/**
 * Serialize/parse the Execution Spec (`<feature>.spec.md`).
 * The document is a flat markdown file: a title, a `## Feature:` header and a
 * `### Requirements:` bullet list of `**REQ-NNN [Type: T]** text` items.
 */

import type { ExecutionRequirement, ExecutionSpec } from "./types/spec.js";
import { isRequirementType } from "./types/spec.js";

export const EXECUTION_SPEC_TITLE = "# Execution Specification";
const FEATURE_HEADER_PREFIX = "## Feature:";
const REQUIREMENTS_HEADER = "### Requirements:";

const FEATURE_HEADER_RE = /^##\s+Feature:\s*(.+?)\s*$/m;
/** Accepts both `**REQ-001 [Type: X]**` and `**[REQ-001] [Type: X]**` */
const REQUIREMENT_LINE_RE = /^\s*[*-]\s+\*\*\[?(REQ-\d+)\]?\s*\[Type:\s*([A-Z_]+)\]\*\*\s*(.*)$/;

/** Sequential requirement ID: 1 -> "REQ-001". */
export function formatRequirementId(index: number): string {
  return `REQ-${String(index).padStart(3, "0")}`;
}

/** Serialize an ExecutionSpec to markdown. */
export function executionSpecToMarkdown(spec: ExecutionSpec): string {
  const lines: string[] = [
    EXECUTION_SPEC_TITLE,
    "",
    `${FEATURE_HEADER_PREFIX} ${spec.featureName}`,
    "",
    REQUIREMENTS_HEADER,
  ];
  for (const req of spec.requirements) {
    lines.push(`*   **${req.id} [Type: ${req.type}]** ${req.text.trim()}`);
  }
  return lines.join("\n") + "\n";
}

/**
 * Parse spec markdown into an ExecutionSpec.
 * Lenient: lines that do not look like requirements, or carry an unknown type, are skipped.
 */
export function parseExecutionSpec(markdown: string): ExecutionSpec {
  const featureMatch = FEATURE_HEADER_RE.exec(markdown);
  const requirements: ExecutionRequirement[] = [];

  for (const line of markdown.split(/\r?\n/)) {
    const match = REQUIREMENT_LINE_RE.exec(line);
    if (!match) continue;
    const [, id, type, text] = match;
    if (!id || !type || !isRequirementType(type)) continue;
    requirements.push({ id, type, text: (text ?? "").trim() });
  }

  return {
    featureName: featureMatch?.[1] ?? "",
    requirements,
  };
}
