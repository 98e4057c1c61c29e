/**
 * Postgres + pgvector implementation of the VectorStore port.
 *
 * One table per collection:
 *   (id uuid primary key, content text, payload jsonb, embedding vector(N))
 * with an HNSW index on cosine distance. Scores are `1 - cosine distance`.
 */
import type {
  ScoredPoint,
  VectorPoint,
  VectorStore,
} from "@domain/rag/ports";
import type { SqlDatabase } from "@infrastructure/database/db";
import { ValidationError } from "@typesLocal/AppError";
import { toPgVectorLiteral } from "@utils/vector";
import { z } from "zod";

export interface PgVectorStoreOptions {
  collection: string;
  vectorSize: number;
}

const IDENTIFIER = /^[a-z_][a-z0-9_]{0,62}$/;

const scoredRowSchema = z.object({
  id: z.string(),
  payload: z.record(z.union([z.string(), z.number(), z.boolean()])),
  score: z.coerce.number(),
});

export class PgVectorStore implements VectorStore {
  private readonly table: string;
  private readonly index: string;
  private ready: Promise<void> | undefined;

  constructor(
    private readonly db: SqlDatabase,
    private readonly options: PgVectorStoreOptions
  ) {
    if (!IDENTIFIER.test(options.collection)) {
      throw new ValidationError(
        `invalid collection name "${options.collection}"`
      );
    }
    if (!Number.isInteger(options.vectorSize) || options.vectorSize <= 0) {
      throw new ValidationError("vectorSize must be a positive integer");
    }

    this.table = `"${options.collection}"`;
    this.index = `"${options.collection}_embedding_idx"`;
  }

  ensureCollection(): Promise<void> {
    this.ready ??= this.createCollection().catch((error: unknown) => {
      this.ready = undefined;
      throw error;
    });
    return this.ready;
  }

  async upsert(points: readonly VectorPoint[]): Promise<void> {
    if (points.length === 0) {
      return;
    }

    for (const point of points) {
      this.assertDimensions(point.vector);
    }

    await this.ensureCollection();
    await this.db.transaction(async (tx) => {
      for (const point of points) {
        await tx.query(
          `INSERT INTO ${this.table} (id, content, payload, embedding)
           VALUES ($1, $2, $3::jsonb, $4::vector)
           ON CONFLICT (id) DO UPDATE
             SET content = EXCLUDED.content,
                 payload = EXCLUDED.payload,
                 embedding = EXCLUDED.embedding`,
          [
            point.id,
            point.payload.content,
            JSON.stringify(point.payload),
            toPgVectorLiteral(point.vector),
          ]
        );
      }
    });
  }

  async search(
    vector: readonly number[],
    limit: number,
    scoreThreshold?: number
  ): Promise<ScoredPoint[]> {
    this.assertDimensions(vector);
    await this.ensureCollection();

    const values: unknown[] = [toPgVectorLiteral(vector), limit];
    let filter = "";
    if (scoreThreshold !== undefined) {
      values.push(scoreThreshold);
      filter = "WHERE 1 - (embedding <=> $1::vector) >= $3";
    }

    const result = await this.db.query(
      `SELECT id::text AS id, payload, 1 - (embedding <=> $1::vector) AS score
       FROM ${this.table}
       ${filter}
       ORDER BY embedding <=> $1::vector ASC
       LIMIT $2`,
      values
    );

    return result.rows.map((row) => scoredRowSchema.parse(row));
  }

  private async createCollection(): Promise<void> {
    await this.db.query("CREATE EXTENSION IF NOT EXISTS vector");
    await this.db.query(
      `CREATE TABLE IF NOT EXISTS ${this.table} (
         id uuid PRIMARY KEY,
         content text NOT NULL,
         payload jsonb NOT NULL DEFAULT '{}'::jsonb,
         embedding vector(${this.options.vectorSize}) NOT NULL
       )`
    );
    await this.db.query(
      `CREATE INDEX IF NOT EXISTS ${this.index}
       ON ${this.table} USING hnsw (embedding vector_cosine_ops)`
    );
  }

  private assertDimensions(vector: readonly number[]): void {
    if (vector.length !== this.options.vectorSize) {
      throw new ValidationError(
        `vector has ${vector.length} dimensions, expected ${this.options.vectorSize}`
      );
    }
  }
}
