/**
 * Collapse whitespace runs, non-breaking spaces included, into single spaces and trim.
 * Shared by extraction and chunking.
 */
export function normalizeText(value: string): string {
  return value.replace(/\u00a0/g, " ").replace(/\s+/g, " ").trim();
}

/**
 * Length in Unicode code points, so a character outside the BMP counts once
 */
export function codePointLength(value: string): number {
  return Array.from(value).length;
}
