/**
 * Packs the question, conversation history and retrieved context into a
 * single prompt that fits a token budget.
 *
 * Priority, highest first: preamble, question, instructions (always kept),
 * then history (whole turns, newest first), then context (clipped by
 * character prefix). Rendering order is preamble, context, history, question,
 * instructions.
 *
 * The assembler never throws. It degrades by truncation; when the fixed parts
 * alone exceed the budget they are still emitted and `overBudget` is set.
 */
import type { TokenEstimator } from "@domain/conversation/tokenEstimator";
import {
  CONTEXT_HEADER,
  CONTEXT_HEADER_TRUNCATED,
  CONTEXT_TRUNCATION_MARKER,
  HISTORY_HEADER,
  HISTORY_TRUNCATION_NOTE,
  INSTRUCTIONS_BLOCK,
  SYSTEM_PREAMBLE,
  renderHistoryBlock,
  renderHistoryTurn,
  renderPassage,
  renderQuestion,
} from "@domain/prompt/templates";
import type { RetrievedPassage } from "@domain/rag/ports";
import type { ChatHistory, ChatMessage } from "@typesLocal/ChatHistory";

export interface PromptFragments {
  readonly systemPreamble: string;
  readonly contextBlock: string;
  readonly historyBlock: string;
  readonly currentQuestion: string;
  readonly instructionsBlock: string;
}

export interface AssembledPrompt {
  readonly text: string;
  readonly fragments: PromptFragments;
  readonly budget: number;
  readonly estimatedTokens: number;
  readonly historyTruncated: boolean;
  readonly contextTruncated: boolean;
  readonly keptHistoryTurns: number;
  /** Characters of the rendered passages that made it into the prompt. */
  readonly keptContextChars: number;
  readonly overBudget: boolean;
}

export interface AssembleInput {
  passages: readonly Pick<RetrievedPassage, "content">[];
  question: string;
  history: ChatHistory;
  maxTotalTokens: number;
}

interface HistoryPlan {
  turns: readonly ChatMessage[];
  block: string;
  truncated: boolean;
}

interface ContextPlan {
  block: string;
  truncated: boolean;
  keptChars: number;
}

const NO_CONTEXT: ContextPlan = { block: "", truncated: false, keptChars: 0 };

// Prefix of at most `length` UTF-16 units that never splits a surrogate pair.
function codePointPrefix(text: string, length: number): string {
  let end = Math.max(0, Math.min(length, text.length));
  if (end > 0 && end < text.length) {
    const last = text.charCodeAt(end - 1);
    if (last >= 0xd800 && last <= 0xdbff) {
      end -= 1;
    }
  }
  return text.slice(0, end);
}

export function renderContextBody(
  passages: readonly Pick<RetrievedPassage, "content">[]
): string {
  return passages
    .map((passage, index) => renderPassage(index, passage.content))
    .join("");
}

export class PromptAssembler {
  constructor(private readonly estimator: TokenEstimator) {}

  assemble(input: AssembleInput): AssembledPrompt {
    const budget = Math.max(0, Math.floor(input.maxTotalTokens));
    const currentQuestion = renderQuestion(input.question);
    const fixedCost =
      this.cost(SYSTEM_PREAMBLE) +
      this.cost(currentQuestion) +
      this.cost(INSTRUCTIONS_BLOCK);

    let history = this.selectHistory(input.history, budget - fixedCost);

    const body = renderContextBody(input.passages);
    let context = this.fitContext(
      body,
      budget - fixedCost - this.cost(history.block)
    );

    let text = this.compose(context.block, history.block, currentQuestion);

    // Sub-word costs are not additive across fragment boundaries; shrink
    // until the composed text itself fits.
    while (this.cost(text) > budget) {
      const overshoot = this.cost(text) - budget;

      if (context.block) {
        context = this.fitContext(
          body,
          this.cost(context.block) - Math.max(1, overshoot)
        );
      } else if (history.turns.length > 0) {
        const turns = history.turns.slice(1);
        history = {
          turns,
          block: renderHistoryBlock(turns, true),
          truncated: true,
        };
      } else if (history.block) {
        history = { turns: [], block: "", truncated: history.truncated };
      } else {
        break;
      }

      text = this.compose(context.block, history.block, currentQuestion);
    }

    const estimatedTokens = this.cost(text);

    return {
      text,
      fragments: {
        systemPreamble: SYSTEM_PREAMBLE,
        contextBlock: context.block,
        historyBlock: history.block,
        currentQuestion,
        instructionsBlock: INSTRUCTIONS_BLOCK,
      },
      budget,
      estimatedTokens,
      historyTruncated: history.truncated,
      contextTruncated: context.truncated,
      keptHistoryTurns: history.turns.length,
      keptContextChars: context.keptChars,
      overBudget: estimatedTokens > budget,
    };
  }

  private cost(text: string): number {
    return this.estimator.estimate(text);
  }

  private compose(
    contextBlock: string,
    historyBlock: string,
    currentQuestion: string
  ): string {
    return (
      SYSTEM_PREAMBLE +
      contextBlock +
      historyBlock +
      currentQuestion +
      INSTRUCTIONS_BLOCK
    );
  }

  /**
   * Keeps the newest turns whose cost, plus the block header, fits in
   * `available`. Stops at the first turn that does not fit.
   */
  private selectHistory(history: ChatHistory, available: number): HistoryPlan {
    if (history.length === 0) {
      return { turns: [], block: "", truncated: false };
    }

    const frame = this.cost(HISTORY_HEADER) + this.cost("\n");

    const pick = (overhead: number): ChatMessage[] => {
      const kept: ChatMessage[] = [];
      let running = overhead;

      for (let i = history.length - 1; i >= 0; i -= 1) {
        const turn = history[i];
        if (turn === undefined) break;

        const turnCost = this.cost(renderHistoryTurn(turn));
        if (running + turnCost > available) break;

        running += turnCost;
        kept.unshift(turn);
      }

      return kept;
    };

    let kept = pick(frame);
    if (kept.length === history.length) {
      return {
        turns: kept,
        block: renderHistoryBlock(kept, false),
        truncated: false,
      };
    }

    kept = pick(frame + this.cost(HISTORY_TRUNCATION_NOTE));
    if (kept.length === 0) {
      const noteOnly = renderHistoryBlock([], true);
      return {
        turns: [],
        block: this.cost(noteOnly) <= available ? noteOnly : "",
        truncated: true,
      };
    }

    return {
      turns: kept,
      block: renderHistoryBlock(kept, true),
      truncated: true,
    };
  }

  /**
   * Uses the whole context when it fits, otherwise the longest character
   * prefix that fits together with the truncated header and marker.
   */
  private fitContext(body: string, available: number): ContextPlan {
    if (body.length === 0) {
      return NO_CONTEXT;
    }

    if (available <= 0) {
      return { block: "", truncated: true, keptChars: 0 };
    }

    const full = CONTEXT_HEADER + body;
    if (this.cost(full) <= available) {
      return { block: full, truncated: false, keptChars: body.length };
    }

    const render = (length: number): string =>
      CONTEXT_HEADER_TRUNCATED +
      codePointPrefix(body, length) +
      CONTEXT_TRUNCATION_MARKER;
    const fits = (length: number): boolean =>
      this.cost(render(length)) <= available;

    if (!fits(0)) {
      return { block: "", truncated: true, keptChars: 0 };
    }

    // Invariant: fits(lo) holds; every length above hi does not.
    let lo = 0;
    let hi = body.length - 1;
    while (lo < hi) {
      const mid = lo + Math.ceil((hi - lo) / 2);
      if (fits(mid)) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }

    const kept = codePointPrefix(body, lo);
    if (kept.length === 0) {
      return { block: "", truncated: true, keptChars: 0 };
    }

    return {
      block: CONTEXT_HEADER_TRUNCATED + kept + CONTEXT_TRUNCATION_MARKER,
      truncated: true,
      keptChars: kept.length,
    };
  }
}
