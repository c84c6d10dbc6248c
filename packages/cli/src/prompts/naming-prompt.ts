/** One-shot prompt asking for a short name that becomes the artifact base filename. */
export function buildFeatureNamePrompt(idea: string): string {
  return `You are a naming expert. Given the following feature description, suggest a short, 2-3 word feature name that can be used as a filename.

Feature Description: "${idea}"

Suggested Name:`;
}
