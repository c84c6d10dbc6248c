/** Requirement categories allowed in an Execution Spec */
export const REQUIREMENT_TYPES = ["USER_STORY", "SYSTEM", "SECURITY", "ACCESSIBILITY"] as const;

export type RequirementType = (typeof REQUIREMENT_TYPES)[number];

/** One `**REQ-001 [Type: SYSTEM]** ...` line */
export interface ExecutionRequirement {
  id: string;
  type: RequirementType;
  text: string;
}

/** Structured view of a `.spec.md` document */
export interface ExecutionSpec {
  featureName: string;
  requirements: ExecutionRequirement[];
}

export function isRequirementType(value: string): value is RequirementType {
  return REQUIREMENT_TYPES.some((type) => type === value);
}
