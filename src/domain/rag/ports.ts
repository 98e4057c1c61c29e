/**
 * Domain ports for the vector store behind retrieval and ingest.
 *
 * Infrastructure adapters (infrastructure/database/PgVectorStore.ts) implement
 * these against Postgres + pgvector; tests implement them in memory.
 */

/** Payload values are plain JSON scalars so they survive any store. */
export type PayloadValue = string | number | boolean;

export type PointPayload = Record<string, PayloadValue>;

export interface VectorPoint {
  id: string;
  vector: number[];
  /** Must carry at least `content` and `source`. */
  payload: PointPayload & { content: string; source: string };
}

export interface ScoredPoint {
  id: string;
  score: number;
  payload: PointPayload;
}

export interface VectorStore {
  /** Creates the collection with a fixed dimensionality and cosine distance if absent. */
  ensureCollection(): Promise<void>;
  upsert(points: readonly VectorPoint[]): Promise<void>;
  /** Results are ranked by descending score. */
  search(
    vector: readonly number[],
    limit: number,
    scoreThreshold?: number
  ): Promise<ScoredPoint[]>;
}

export interface RetrievedPassage {
  readonly content: string;
  readonly score: number;
  readonly metadata: Readonly<Record<string, string>>;
}
