/**
 * Anything a quality check can score. Annotations qualify; so does any other
 * mapping. The criteria read `image_id` and `confidence` when present.
 */
export type QualityEntry = Readonly<Record<string, unknown>>;

export type QualityResult = {
  readonly data_entry: QualityEntry;
  readonly score: number;
  readonly max_score: number;
  readonly percentage: number;
  readonly feedback: readonly string[];
  readonly timestamp: string;
};
