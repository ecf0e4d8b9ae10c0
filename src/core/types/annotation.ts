/**
 * A single labeled-image record. Keys are the wire names used by the CSV
 * header and read back by quality criteria, in this order.
 */
export type Annotation = {
  readonly image_id: string;
  readonly category: string;
  /** Expected on the 1-5 scale; not range-checked unless the session is strict. */
  readonly confidence: number;
  readonly timestamp: string;
  readonly notes: string;
};
