/**
 * Recursive character splitter.
 *
 * Text is split on the first separator that occurs in it; pieces still longer
 * than the chunk size are split again with the next separator, down to a
 * plain character split. Pieces are then merged greedily up to the chunk
 * size, and each chunk starts with up to `chunkOverlap` characters taken from
 * the end of the previous one.
 */

export const DEFAULT_SEPARATORS: readonly string[] = [
  "\n\n===",
  "\n\n",
  "\n",
  ". ",
  " ",
];

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: readonly string[];
}

export class TextChunker {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly separators: readonly string[];

  constructor(options: ChunkerOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new RangeError("chunkSize must be a positive integer");
    }
    if (
      !Number.isInteger(options.chunkOverlap) ||
      options.chunkOverlap < 0 ||
      options.chunkOverlap >= options.chunkSize
    ) {
      throw new RangeError(
        "chunkOverlap must be a non-negative integer below chunkSize"
      );
    }

    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.separators = options.separators ?? DEFAULT_SEPARATORS;
  }

  split(text: string): string[] {
    const trimmed = text.trim();
    if (!trimmed) {
      return [];
    }
    if (trimmed.length <= this.chunkSize) {
      return [trimmed];
    }

    return this.splitRecursive(trimmed, this.separators)
      .map((chunk) => chunk.trim())
      .filter((chunk) => chunk.length > 0);
  }

  private splitRecursive(text: string, separators: readonly string[]): string[] {
    const index = separators.findIndex((sep) => text.includes(sep));
    if (index === -1) {
      return this.merge(this.splitByLength(text));
    }

    const separator = separators[index] ?? "";
    const remaining = separators.slice(index + 1);
    const chunks: string[] = [];
    let pending: string[] = [];

    for (const piece of splitKeepingSeparator(text, separator)) {
      if (piece.length <= this.chunkSize) {
        pending.push(piece);
        continue;
      }

      if (pending.length > 0) {
        chunks.push(...this.merge(pending));
        pending = [];
      }
      chunks.push(...this.splitRecursive(piece, remaining));
    }

    if (pending.length > 0) {
      chunks.push(...this.merge(pending));
    }

    return chunks;
  }

  private splitByLength(text: string): string[] {
    const pieces: string[] = [];
    for (let start = 0; start < text.length; start += this.chunkSize) {
      pieces.push(text.slice(start, start + this.chunkSize));
    }
    return pieces;
  }

  private merge(pieces: readonly string[]): string[] {
    const chunks: string[] = [];
    const window: string[] = [];
    let total = 0;

    for (const piece of pieces) {
      if (window.length > 0 && total + piece.length > this.chunkSize) {
        chunks.push(window.join(""));

        while (
          window.length > 0 &&
          (total > this.chunkOverlap || total + piece.length > this.chunkSize)
        ) {
          total -= window.shift()?.length ?? 0;
        }
      }

      window.push(piece);
      total += piece.length;
    }

    if (window.length > 0) {
      chunks.push(window.join(""));
    }

    return chunks;
  }
}

/** "a\n\nb" on "\n\n" gives ["a", "\n\nb"]: the separator opens the next piece. */
function splitKeepingSeparator(text: string, separator: string): string[] {
  const parts = text.split(separator);
  return parts
    .map((part, i) => (i === 0 ? part : separator + part))
    .filter((part) => part.length > 0);
}
