import type { ComparisonWinner } from "./common.js";

export type ComparisonResult<A = unknown, B = A> = {
  readonly item_a: A;
  readonly item_b: B;
  readonly criterion: string;
  readonly winner: ComparisonWinner;
  readonly timestamp: string;
};
