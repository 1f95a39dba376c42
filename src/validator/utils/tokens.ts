export const DEFAULT_CORRECTION_RATIO = 0.1;

const WORD = /[\p{L}\p{N}_]+/gu;

// Rough estimate: one token per word plus a share of the length for
// punctuation and formatting. Only meant for comparing against thresholds.
export function countTokens(
  text: string,
  correctionRatio = DEFAULT_CORRECTION_RATIO
): number {
  const words = text.match(WORD)?.length ?? 0;
  const codePoints = [...text].length;
  return words + Math.floor(codePoints * correctionRatio);
}

export function countExampleTokens(
  record: unknown,
  correctionRatio = DEFAULT_CORRECTION_RATIO
): number {
  if (!isObject(record) || !Array.isArray(record.messages)) return 0;

  let total = 0;
  for (const message of record.messages) {
    if (!isObject(message)) continue;
    if (typeof message.content === "string") {
      total += countTokens(message.content, correctionRatio);
    }
    if (typeof message.role === "string") {
      total += countTokens(message.role, correctionRatio);
    }
  }
  return total;
}

export function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
