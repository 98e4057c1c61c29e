import {
  CharacterRatioEstimator,
  createTokenEstimator,
  isSupportedEncoding,
} from "@domain/conversation/tokenEstimator";
import { describe, expect, it, vi } from "vitest";

describe("CharacterRatioEstimator", () => {
  const estimator = new CharacterRatioEstimator();

  it("rounds up to whole tokens of 4 characters", () => {
    expect(estimator.estimate("")).toBe(0);
    expect(estimator.estimate("abcd")).toBe(1);
    expect(estimator.estimate("abcde")).toBe(2);
    expect(estimator.estimate("What type is Charizard?")).toBe(6);
  });

  it("rejects a non-positive ratio", () => {
    expect(() => new CharacterRatioEstimator(0)).toThrow(RangeError);
  });
});

describe("createTokenEstimator", () => {
  it("uses tiktoken for a supported encoding", () => {
    const estimator = createTokenEstimator("cl100k_base");
    expect(estimator.strategy).toBe("tiktoken");
    expect(estimator.estimate("hello world")).toBe(2);
    expect(estimator.estimate("")).toBe(0);
  });

  it("counts special-token markers as plain text", () => {
    const estimator = createTokenEstimator("cl100k_base");
    expect(estimator.estimate("<|endoftext|>")).toBeGreaterThan(1);
  });

  it("falls back for an unknown encoding", () => {
    const onFallback = vi.fn();
    const estimator = createTokenEstimator("klingon", onFallback);
    expect(estimator.strategy).toBe("character-ratio");
    expect(onFallback).toHaveBeenCalledWith('unknown encoding "klingon"');
  });

  it("falls back when disabled", () => {
    const onFallback = vi.fn();
    expect(createTokenEstimator("none", onFallback).strategy).toBe(
      "character-ratio"
    );
    expect(onFallback).toHaveBeenCalledWith(
      "encoder disabled by configuration"
    );
  });

  it("knows the supported encodings", () => {
    expect(isSupportedEncoding("o200k_base")).toBe(true);
    expect(isSupportedEncoding("cl200k_base")).toBe(false);
  });
});
