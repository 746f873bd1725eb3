import type { Cursor } from "../cursor/Cursor";

/** One page of the submission list and the cursor to resume after it. */
export type InstanceIdBatch = {
  readonly instanceIds: readonly string[];
  readonly cursor: Cursor;
  count(): number;
};

export const instanceIdBatch = (instanceIds: readonly string[], cursor: Cursor): InstanceIdBatch => {
  const ids = Object.freeze([...instanceIds]);
  return Object.freeze({ instanceIds: ids, cursor, count: () => ids.length });
};

export const countInstanceIds = (batches: readonly InstanceIdBatch[]): number =>
  batches.reduce((total, batch) => total + batch.count(), 0);
