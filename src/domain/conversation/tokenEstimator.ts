import { getEncoding } from "js-tiktoken";

/**
 * Maps a text to a non-negative token cost.
 *
 * One estimator is chosen when the process starts and shared by every
 * consumer, so budget arithmetic never mixes strategies.
 */
export interface TokenEstimator {
  readonly strategy: "tiktoken" | "character-ratio";
  estimate(text: string): number;
}

export const SUPPORTED_ENCODINGS = [
  "cl100k_base",
  "o200k_base",
  "p50k_base",
  "r50k_base",
  "gpt2",
] as const;

export type SupportedEncoding = (typeof SUPPORTED_ENCODINGS)[number];

export function isSupportedEncoding(name: string): name is SupportedEncoding {
  return SUPPORTED_ENCODINGS.some((supported) => supported === name);
}

// 1 token ≈ 4 characters of English text.
export const DEFAULT_CHARS_PER_TOKEN = 4;

export class CharacterRatioEstimator implements TokenEstimator {
  readonly strategy = "character-ratio" as const;

  constructor(private readonly charsPerToken: number = DEFAULT_CHARS_PER_TOKEN) {
    if (!(charsPerToken > 0)) {
      throw new RangeError("charsPerToken must be positive");
    }
  }

  estimate(text: string): number {
    if (!text) return 0;
    return Math.ceil(text.length / this.charsPerToken);
  }
}

type Encoder = ReturnType<typeof getEncoding>;

export class TiktokenEstimator implements TokenEstimator {
  readonly strategy = "tiktoken" as const;

  constructor(private readonly encoder: Encoder) {}

  estimate(text: string): number {
    if (!text) return 0;
    // Special-token markers inside user or document text count as plain text.
    return this.encoder.encode(text, [], []).length;
  }
}

/**
 * Builds the process-wide estimator. An unknown encoding name, "none", or an
 * encoder that fails to load selects the character-ratio fallback; this never
 * throws.
 */
export function createTokenEstimator(
  encoding: string,
  onFallback?: (reason: string) => void
): TokenEstimator {
  if (encoding === "none") {
    onFallback?.("encoder disabled by configuration");
    return new CharacterRatioEstimator();
  }

  if (!isSupportedEncoding(encoding)) {
    onFallback?.(`unknown encoding "${encoding}"`);
    return new CharacterRatioEstimator();
  }

  try {
    return new TiktokenEstimator(getEncoding(encoding));
  } catch (error: unknown) {
    onFallback?.(error instanceof Error ? error.message : String(error));
    return new CharacterRatioEstimator();
  }
}
