import {
  CharacterRatioEstimator,
  createTokenEstimator,
} from "@domain/conversation/tokenEstimator";
import { PromptAssembler } from "@domain/prompt/promptAssembler";
import {
  CONTEXT_HEADER,
  CONTEXT_HEADER_TRUNCATED,
  CONTEXT_TRUNCATION_MARKER,
  HISTORY_HEADER,
  HISTORY_TRUNCATION_NOTE,
  INSTRUCTIONS_BLOCK,
  SYSTEM_PREAMBLE,
  renderQuestion,
} from "@domain/prompt/templates";
import type { ChatHistory } from "@typesLocal/ChatHistory";
import { describe, expect, it } from "vitest";

const estimator = new CharacterRatioEstimator();
const assembler = new PromptAssembler(estimator);

const history: ChatHistory = [
  { role: "user", content: "Tell me about Bulbasaur" },
  { role: "assistant", content: "Bulbasaur is a Grass/Poison type." },
  { role: "user", content: "And Charmander?" },
  { role: "assistant", content: "Charmander is a Fire type." },
];

function fixedCost(question: string): number {
  return (
    estimator.estimate(SYSTEM_PREAMBLE) +
    estimator.estimate(renderQuestion(question)) +
    estimator.estimate(INSTRUCTIONS_BLOCK)
  );
}

describe("PromptAssembler", () => {
  it("renders every fragment in order when the budget is ample", () => {
    const prompt = assembler.assemble({
      passages: [{ content: "Charizard is a Fire/Flying type." }],
      question: "What type is Charizard?",
      history: [],
      maxTotalTokens: 4000,
    });

    expect(prompt.text).toBe(
      SYSTEM_PREAMBLE +
        "Context Information:\n\n[1] Charizard is a Fire/Flying type.\n\n" +
        "Current Question: What type is Charizard?\n\n" +
        INSTRUCTIONS_BLOCK
    );
    expect(prompt.fragments.historyBlock).toBe("");
    expect(prompt.text).not.toContain(HISTORY_HEADER);
    expect(prompt.historyTruncated).toBe(false);
    expect(prompt.contextTruncated).toBe(false);
    expect(prompt.overBudget).toBe(false);
    expect(prompt.estimatedTokens).toBe(estimator.estimate(prompt.text));
  });

  it("numbers passages in retrieval order", () => {
    const prompt = assembler.assemble({
      passages: [{ content: "first" }, { content: "second" }],
      question: "q",
      history: [],
      maxTotalTokens: 4000,
    });
    expect(prompt.fragments.contextBlock).toBe(
      `${CONTEXT_HEADER}[1] first\n\n[2] second\n\n`
    );
  });

  it("keeps the full history with no note when it fits", () => {
    const prompt = assembler.assemble({
      passages: [],
      question: "Which one is faster?",
      history,
      maxTotalTokens: 4000,
    });

    expect(prompt.fragments.historyBlock).toBe(
      HISTORY_HEADER +
        "Human: Tell me about Bulbasaur\n" +
        "Assistant: Bulbasaur is a Grass/Poison type.\n" +
        "Human: And Charmander?\n" +
        "Assistant: Charmander is a Fire type.\n" +
        "\n"
    );
    expect(prompt.keptHistoryTurns).toBe(4);
    expect(prompt.historyTruncated).toBe(false);
  });

  it("keeps the newest turns that fit and notes the omission", () => {
    const question = "Which one is faster?";
    // Header and trailing newline, the note, then the last two turns.
    const budget = fixedCost(question) + 8 + 15 + 6 + 10;

    const prompt = assembler.assemble({
      passages: [],
      question,
      history,
      maxTotalTokens: budget,
    });

    expect(prompt.keptHistoryTurns).toBe(2);
    expect(prompt.historyTruncated).toBe(true);
    expect(prompt.fragments.historyBlock).toBe(
      HISTORY_HEADER +
        HISTORY_TRUNCATION_NOTE +
        "Human: And Charmander?\n" +
        "Assistant: Charmander is a Fire type.\n" +
        "\n"
    );
    expect(prompt.estimatedTokens).toBeLessThanOrEqual(budget);
  });

  it("keeps only the note when the newest turn alone is too large", () => {
    const question = "Which one is faster?";
    const budget = fixedCost(question) + 50;

    const prompt = assembler.assemble({
      passages: [{ content: "Pikachu is an Electric type." }],
      question,
      history: [{ role: "user", content: "y ".repeat(5000) }],
      maxTotalTokens: budget,
    });

    expect(prompt.keptHistoryTurns).toBe(0);
    expect(prompt.historyTruncated).toBe(true);
    expect(prompt.fragments.historyBlock).toBe(
      HISTORY_HEADER + HISTORY_TRUNCATION_NOTE + "\n"
    );
    expect(prompt.estimatedTokens).toBeLessThanOrEqual(budget);
    expect(prompt.overBudget).toBe(false);
  });

  it("clips the context to the longest prefix that fits", () => {
    const question = "What type is Charizard?";
    const budget = fixedCost(question) + 100;

    const prompt = assembler.assemble({
      passages: [{ content: "x".repeat(4000) }],
      question,
      history: [],
      maxTotalTokens: budget,
    });

    // 100 tokens = 400 characters, minus the truncated header and marker.
    expect(prompt.keptContextChars).toBe(336);
    expect(prompt.contextTruncated).toBe(true);
    expect(prompt.fragments.contextBlock).toBe(
      CONTEXT_HEADER_TRUNCATED +
        "[1] " +
        "x".repeat(332) +
        CONTEXT_TRUNCATION_MARKER
    );
    expect(prompt.estimatedTokens).toBeLessThanOrEqual(budget);
    expect(prompt.overBudget).toBe(false);
  });

  it("never shrinks the context when the budget grows", () => {
    const question = "What type is Charizard?";
    let previous = -1;

    for (let extra = 0; extra <= 400; extra += 25) {
      const prompt = assembler.assemble({
        passages: [{ content: "Charizard breathes fire. ".repeat(80) }],
        question,
        history: [],
        maxTotalTokens: fixedCost(question) + extra,
      });
      expect(prompt.keptContextChars).toBeGreaterThanOrEqual(previous);
      previous = prompt.keptContextChars;
    }
  });

  it("gives history priority over context", () => {
    const question = "Which one is faster?";
    const prompt = assembler.assemble({
      passages: [{ content: "y".repeat(2000) }],
      question,
      history,
      maxTotalTokens: fixedCost(question) + 8 + 8 + 12 + 6 + 10,
    });

    expect(prompt.keptHistoryTurns).toBe(4);
    expect(prompt.fragments.contextBlock).toBe("");
    expect(prompt.contextTruncated).toBe(true);
  });

  it("emits only the fixed parts and flags a budget they exceed", () => {
    const prompt = assembler.assemble({
      passages: [{ content: "Charizard is a Fire/Flying type." }],
      question: "What type is Charizard?",
      history,
      maxTotalTokens: 10,
    });

    expect(prompt.text).toBe(
      SYSTEM_PREAMBLE +
        renderQuestion("What type is Charizard?") +
        INSTRUCTIONS_BLOCK
    );
    expect(prompt.overBudget).toBe(true);
    expect(prompt.historyTruncated).toBe(true);
    expect(prompt.contextTruncated).toBe(true);
    expect(prompt.keptHistoryTurns).toBe(0);
  });

  it("treats a negative budget as zero", () => {
    const prompt = assembler.assemble({
      passages: [],
      question: "q",
      history: [],
      maxTotalTokens: -5,
    });
    expect(prompt.budget).toBe(0);
    expect(prompt.contextTruncated).toBe(false);
  });

  it("holds the budget with a sub-word tokenizer", () => {
    const tiktoken = createTokenEstimator("cl100k_base");
    const question = "How fast is Charizard compared to Blastoise?";
    const budget =
      tiktoken.estimate(SYSTEM_PREAMBLE) +
      tiktoken.estimate(renderQuestion(question)) +
      tiktoken.estimate(INSTRUCTIONS_BLOCK) +
      120;

    const prompt = new PromptAssembler(tiktoken).assemble({
      passages: [
        { content: "Charizard has a base Speed of 100. ".repeat(30) },
        { content: "Blastoise has a base Speed of 78. ".repeat(30) },
      ],
      question,
      history,
      maxTotalTokens: budget,
    });

    expect(prompt.estimatedTokens).toBeLessThanOrEqual(budget);
    expect(prompt.overBudget).toBe(false);
    expect(prompt.text.endsWith(INSTRUCTIONS_BLOCK)).toBe(true);
  });
});
