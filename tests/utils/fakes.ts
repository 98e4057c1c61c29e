import type { PokemonSource } from "@domain/ingest/ports";
import { emptyPokemonRecord, type PokemonRecord } from "@domain/ingest/pokemon";
import type {
  CompletionOptions,
  CompletionPort,
  EmbeddingPort,
} from "@domain/llm/ports";
import type { ScoredPoint, VectorPoint, VectorStore } from "@domain/rag/ports";
import type { SqlDatabase, SqlExecutor } from "@infrastructure/database/db";

function waitForAbort(signal: AbortSignal | undefined): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal?.addEventListener("abort", () => reject(new Error("aborted")), {
      once: true,
    });
  });
}

/** Deterministic 3-dimensional vectors: [length, 1, 0]. */
export class FakeEmbedder implements EmbeddingPort {
  readonly calls: string[][] = [];
  failure: Error | undefined;
  hang = false;
  /** Overrides the output, e.g. to return too few vectors. */
  vectors: number[][] | undefined;

  async embed(
    texts: readonly string[],
    signal?: AbortSignal
  ): Promise<number[][]> {
    this.calls.push([...texts]);
    if (this.hang) {
      return waitForAbort(signal);
    }
    if (this.failure) {
      throw this.failure;
    }
    return this.vectors ?? texts.map((text) => [text.length, 1, 0]);
  }
}

export class FakeVectorStore implements VectorStore {
  readonly upserted: VectorPoint[] = [];
  readonly searches: {
    vector: readonly number[];
    limit: number;
    scoreThreshold: number | undefined;
  }[] = [];
  ensureCalls = 0;
  results: ScoredPoint[] = [];
  failure: Error | undefined;

  async ensureCollection(): Promise<void> {
    this.ensureCalls += 1;
  }

  async upsert(points: readonly VectorPoint[]): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.upserted.push(...points);
  }

  async search(
    vector: readonly number[],
    limit: number,
    scoreThreshold?: number
  ): Promise<ScoredPoint[]> {
    this.searches.push({ vector, limit, scoreThreshold });
    if (this.failure) {
      throw this.failure;
    }
    return this.results
      .filter((point) =>
        scoreThreshold === undefined ? true : point.score >= scoreThreshold
      )
      .slice(0, limit);
  }
}

export class FakeCompletion implements CompletionPort {
  readonly calls: { prompt: string; options: CompletionOptions }[] = [];
  reply = "Charizard is a Fire/Flying type Pokemon.";
  failure: Error | undefined;
  hang = false;

  async complete(
    prompt: string,
    options: CompletionOptions,
    signal?: AbortSignal
  ): Promise<string> {
    this.calls.push({ prompt, options });
    if (this.hang) {
      return waitForAbort(signal);
    }
    if (this.failure) {
      throw this.failure;
    }
    return this.reply;
  }
}

export function pokemon(overrides: Partial<PokemonRecord>): PokemonRecord {
  return { ...emptyPokemonRecord(), ...overrides };
}

export class FakePokemonSource implements PokemonSource {
  readonly listLimits: number[] = [];
  readonly fetched: string[] = [];
  readonly failing = new Set<string>();
  listFailure: Error | undefined;

  constructor(readonly records: Map<string, PokemonRecord> = new Map()) {}

  async listPokemonUrls(limit: number): Promise<string[]> {
    this.listLimits.push(limit);
    if (this.listFailure) {
      throw this.listFailure;
    }
    return [...this.records.keys()].slice(0, limit);
  }

  async fetchPokemon(url: string): Promise<PokemonRecord> {
    this.fetched.push(url);
    const record = this.records.get(url);
    if (!record || this.failing.has(url)) {
      throw new Error(`failed to extract pokemon data from ${url}`);
    }
    return record;
  }
}

export interface RecordedQuery {
  text: string;
  values: unknown[] | undefined;
  inTransaction: boolean;
}

/** SqlDatabase that records statements and answers from a queue of row sets. */
export class RecordingDatabase implements SqlDatabase {
  readonly queries: RecordedQuery[] = [];
  readonly rowQueue: unknown[][] = [];
  transactions = 0;
  closed = false;

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    return this.record(text, values, false);
  }

  async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    this.transactions += 1;
    return fn({
      query: async (text, values) => this.record(text, values, true),
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Statements with whitespace collapsed, for readable assertions. */
  statements(): string[] {
    return this.queries.map((q) => q.text.replace(/\s+/g, " ").trim());
  }

  private record(
    text: string,
    values: unknown[] | undefined,
    inTransaction: boolean
  ): { rows: unknown[] } {
    this.queries.push({ text, values, inTransaction });
    const rows = text.trimStart().startsWith("SELECT")
      ? (this.rowQueue.shift() ?? [])
      : [];
    return { rows };
  }
}
