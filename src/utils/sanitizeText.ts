// Control (Cc) and format (Cf) characters, except newline, carriage return and tab
const UNSAFE_CHARACTERS = /(?![\n\r\t])[\p{Cc}\p{Cf}]/gu;

/**
 * NFKC-normalize text and strip control and format characters
 */
export function sanitizeText(text: string): string {
  if (!text) {
    return text;
  }
  return text.normalize('NFKC').replace(UNSAFE_CHARACTERS, '');
}
