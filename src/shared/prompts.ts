const AUTHORSHIP_QUESTION =
  "ignoring the changes that were computer-generated, can you estimate how long this took a human to write this code, assuming they appropriately used AI to help them? please go section by section.";

/**
 * Wrap a diff in the authorship-time question. The diff is appended as-is.
 */
export function buildAuthorshipPrompt(diffText: string): string {
  return `${AUTHORSHIP_QUESTION}

Here's the diff to analyze:
${diffText}`;
}
