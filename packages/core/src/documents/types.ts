/**
 * A validated question/answer record.
 *
 * `id` is dense (0..N-1) in input order over accepted records only, so it is
 * not stable across reloads of a changed dataset.
 */
export interface ClinicalDocument {
  readonly id: number;
  readonly prompt: string;
  readonly completion: string;
  readonly cancerTypes: ReadonlySet<string>;
  readonly genes: ReadonlySet<string>;

  /** Every other raw field (source, trial_id, ...), untouched */
  readonly metadata: Readonly<Record<string, unknown>>;
}
