/**
 * Heuristic prompt-injection detector.
 *
 * Two independent checks, OR-combined:
 * - known phrasings that try to override the system instructions
 * - flooding: one alphanumeric character or one word dominating the text
 *
 * Best-effort only. False positives and negatives are expected; callers must
 * never tell the user which rule fired.
 */

export const INJECTION_PATTERNS: readonly RegExp[] = [
  /ignore\s+(previous|above|all|prior)\s+(instructions?|prompts?|rules?)/i,
  /disregard\s+(previous|above|all|prior)\s+(instructions?|prompts?|rules?)/i,
  /forget\s+(previous|above|all|prior)\s+(instructions?|prompts?|rules?)/i,
  /you\s+are\s+(now|actually)\s+a/i,
  /new\s+instructions?:/i,
  /system\s*:\s*/i,
  /override\s+(previous|above|all|prior)/i,
  /act\s+as\s+if\s+you\s+are/i,
];

export const REPETITION_LIMITS = {
  minTextLength: 20,
  maxSameCharacter: 50,
  minWordsForRatio: 10,
  maxWordShare: 0.3,
} as const;

const ALPHANUMERIC = /[\p{L}\p{N}]/u;

export function matchesInjectionPattern(text: string): boolean {
  return INJECTION_PATTERNS.some((pattern) => pattern.test(text));
}

export function hasExcessiveRepetition(text: string): boolean {
  if (text.length < REPETITION_LIMITS.minTextLength) {
    return false;
  }

  const charCounts = new Map<string, number>();
  for (const ch of text) {
    if (!ALPHANUMERIC.test(ch)) continue;

    const count = (charCounts.get(ch) ?? 0) + 1;
    if (count > REPETITION_LIMITS.maxSameCharacter) {
      return true;
    }
    charCounts.set(ch, count);
  }

  const words = text.split(/\s+/).filter(Boolean);
  if (words.length <= REPETITION_LIMITS.minWordsForRatio) {
    return false;
  }

  const wordCounts = new Map<string, number>();
  for (const word of words) {
    const key = word.toLowerCase();
    const count = (wordCounts.get(key) ?? 0) + 1;
    if (count / words.length > REPETITION_LIMITS.maxWordShare) {
      return true;
    }
    wordCounts.set(key, count);
  }

  return false;
}

export function isSuspicious(text: string): boolean {
  return matchesInjectionPattern(text) || hasExcessiveRepetition(text);
}
