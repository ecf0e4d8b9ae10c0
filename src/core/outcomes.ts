import { UserInputError } from "./errors.js";
import type { ComparisonWinner } from "./types.js";

export const COMPARISON_WINNERS: readonly ComparisonWinner[] = ["A", "B", "Tie"];

/**
 * Stand-in for a human judgment in a pairwise comparison. Sessions take one
 * by injection so tests and scripted runs can fix the outcome.
 */
export interface OutcomeSource {
  pick(): ComparisonWinner;
}

// mulberry32
function createSeededRandom(seed: number): () => number {
  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pickWinner(random: () => number): ComparisonWinner {
  const index = Math.min(COMPARISON_WINNERS.length - 1, Math.floor(random() * COMPARISON_WINNERS.length));
  return COMPARISON_WINNERS[index] ?? "Tie";
}

export function randomOutcomeSource(random: () => number = Math.random): OutcomeSource {
  return {
    pick: () => pickWinner(random)
  };
}

export function seededOutcomeSource(seed: number): OutcomeSource {
  return randomOutcomeSource(createSeededRandom(seed));
}

/** Replays `winners` in order, starting over after the last one. */
export function scriptedOutcomeSource(winners: readonly ComparisonWinner[]): OutcomeSource {
  if (!winners.length) {
    throw new UserInputError("A scripted outcome source needs at least one winner.");
  }
  const sequence = [...winners];
  let cursor = 0;
  return {
    pick() {
      const winner = sequence[cursor % sequence.length] ?? "Tie";
      cursor += 1;
      return winner;
    }
  };
}
