/**
 * Optional free text (location, body) as compared and written: line endings
 * unified, surrounding whitespace dropped, empty treated as absent.
 */
export function normalizeOptionalText(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const text = value.replace(/\r\n?/g, "\n").trim();
  return text.length > 0 ? text : undefined;
}
