/**
 * pgvector text literal for a query parameter, e.g. `[0.1,0.2]`.
 * Rejects empty vectors and non-finite components.
 */
export function toPgVectorLiteral(vector: readonly number[]): string {
  if (vector.length === 0) {
    throw new RangeError("toPgVectorLiteral received an empty vector");
  }

  if (!vector.every((v) => Number.isFinite(v))) {
    throw new RangeError("toPgVectorLiteral received a non-finite value");
  }

  return `[${vector.join(",")}]`;
}
