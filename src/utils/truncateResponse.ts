/**
 * Truncates an upstream diagnostic to a maximum length for logging purposes.
 *
 * @param data - Raw upstream text, or any value (JSON stringified)
 * @param maxLength - Maximum allowed length in characters (0 = no limit)
 * @returns Truncated text with size indicator if truncated
 */
export function truncateDiagnostic(data: unknown, maxLength: number): string {
  const text = typeof data === 'string' ? data : JSON.stringify(data) ?? String(data);

  // If maxLength is 0 or negative, no truncation
  if (maxLength <= 0 || text.length <= maxLength) {
    return text;
  }

  const truncated = text.substring(0, maxLength);
  const indicator = `\n[TRUNCATED - original size: ${text.length} characters]`;

  return truncated + indicator;
}
