import type { ScoredPoint } from "@domain/rag/ports";
import {
  RetrievalOrchestrator,
  dedupeSources,
  toPassage,
} from "@domain/rag/retrieval";
import { UpstreamError, ValidationError } from "@typesLocal/AppError";
import { RequestAbortedError } from "@utils/deadline";
import { beforeEach, describe, expect, it } from "vitest";

import { FakeEmbedder, FakeVectorStore } from "../utils/fakes";

const points: ScoredPoint[] = [
  {
    id: "a",
    score: 0.91,
    payload: {
      content: "Charizard is a Fire/Flying type.",
      source: "pokemondb",
      pokemon: "Charizard",
      number: "0006",
    },
  },
  {
    id: "b",
    score: 0.84,
    payload: {
      content: "Charizard evolves from Charmeleon.",
      source: "pokemondb",
      pokemon: "Charizard",
    },
  },
  {
    id: "c",
    score: 0.52,
    payload: { content: "Fire beats Grass.", source: "text", title: "Types" },
  },
  {
    id: "d",
    score: 0.12,
    payload: { content: "Unrelated.", source: "text" },
  },
];

describe("RetrievalOrchestrator", () => {
  let embedder: FakeEmbedder;
  let store: FakeVectorStore;
  let retrieval: RetrievalOrchestrator;

  beforeEach(() => {
    embedder = new FakeEmbedder();
    store = new FakeVectorStore();
    store.results = points;
    retrieval = new RetrievalOrchestrator(embedder, store, {
      timeoutMs: 1000,
      scoreThreshold: 0.3,
    });
  });

  it("embeds the query and keeps the store's ranking", async () => {
    const passages = await retrieval.retrieve("What type is Charizard?", 5);

    expect(embedder.calls).toEqual([["What type is Charizard?"]]);
    expect(store.searches).toEqual([
      { vector: [23, 1, 0], limit: 5, scoreThreshold: 0.3 },
    ]);
    expect(passages.map((p) => p.score)).toEqual([0.91, 0.84, 0.52]);
    expect(passages[0]).toEqual({
      content: "Charizard is a Fire/Flying type.",
      score: 0.91,
      metadata: { source: "pokemondb", pokemon: "Charizard", number: "0006" },
    });
  });

  it("floors topK to a positive integer", async () => {
    await retrieval.retrieve("charizard", 2.9);
    await retrieval.retrieve("charizard", 0);
    expect(store.searches.map((s) => s.limit)).toEqual([2, 1]);
  });

  it("rejects an empty query before calling anything", async () => {
    await expect(retrieval.retrieve("   ", 5)).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(embedder.calls).toEqual([]);
  });

  it("reports an embedding failure as EmbeddingError", async () => {
    embedder.failure = new Error("connection reset");

    const error = await retrieval.retrieve("charizard", 5).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({
      kind: "EmbeddingError",
      statusCode: 502,
      retryable: true,
      message: "EmbeddingError: connection reset",
    });
    expect(store.searches).toEqual([]);
  });

  it("treats a response with no vectors as EmbeddingError", async () => {
    embedder.vectors = [];
    await expect(retrieval.retrieve("charizard", 5)).rejects.toMatchObject({
      kind: "EmbeddingError",
    });
  });

  it("reports a store failure as SearchError", async () => {
    store.failure = new Error("relation does not exist");
    await expect(retrieval.retrieve("charizard", 5)).rejects.toMatchObject({
      kind: "SearchError",
      statusCode: 502,
    });
  });

  it("times out a hanging embedding call", async () => {
    embedder.hang = true;
    const slow = new RetrievalOrchestrator(embedder, store, { timeoutMs: 20 });

    await expect(slow.retrieve("charizard", 5)).rejects.toMatchObject({
      kind: "EmbeddingError",
      statusCode: 504,
      metadata: { kind: "EmbeddingError", timedOut: true },
    });
  });

  it("stops when the caller aborts", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      retrieval.retrieve("charizard", 5, { signal: controller.signal })
    ).rejects.toBeInstanceOf(RequestAbortedError);
    expect(embedder.calls).toEqual([]);
  });
});

describe("toPassage", () => {
  it("stringifies metadata and drops the content key", () => {
    expect(
      toPassage({
        id: "x",
        score: 0.5,
        payload: { content: "text", source: "text", page: 3, draft: false },
      })
    ).toEqual({
      content: "text",
      score: 0.5,
      metadata: { source: "text", page: "3", draft: "false" },
    });
  });
});

describe("dedupeSources", () => {
  it("collapses chunks of the same source in first-seen order", () => {
    expect(dedupeSources(points.map(toPassage))).toEqual([
      "Pokemon: Charizard",
      "text",
    ]);
  });
});
