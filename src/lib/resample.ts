import type { AssembledDataset, AssembledRow, CellValue } from "../types.js";

export type ResampleFrequency = "daily" | "monthly" | "annual";

const FREQUENCIES = new Set<string>(["daily", "monthly", "annual"]);

export function isResampleFrequency(value: string): value is ResampleFrequency {
  return FREQUENCIES.has(value);
}

export function bucketStart(date: Date, frequency: ResampleFrequency): Date {
  const year = date.getUTCFullYear();
  switch (frequency) {
    case "daily":
      return new Date(Date.UTC(year, date.getUTCMonth(), date.getUTCDate()));
    case "monthly":
      return new Date(Date.UTC(year, date.getUTCMonth(), 1));
    case "annual":
      return new Date(Date.UTC(year, 0, 1));
  }
}

type Accumulator = {
  row: AssembledRow;
  sums: Record<string, number>;
  counts: Record<string, number>;
};

/**
 * Averages rows per (longitude, latitude, depth, bucket). Nulls are left out
 * of the mean; a bucket with no values stays null. Output keeps the order in
 * which each bucket was first seen.
 */
export function resample(dataset: AssembledDataset, frequency: ResampleFrequency): AssembledDataset {
  const buckets = new Map<string, Accumulator>();
  for (const row of dataset.rows) {
    const time = bucketStart(row.time, frequency);
    const key = [row.longitude, row.latitude, row.depth ?? "", time.getTime()].join("|");
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = { row: { ...row, time, values: {} }, sums: {}, counts: {} };
      buckets.set(key, bucket);
    }
    for (const name of dataset.variables) {
      const value = row.values[name];
      if (typeof value !== "number") continue;
      bucket.sums[name] = (bucket.sums[name] ?? 0) + value;
      bucket.counts[name] = (bucket.counts[name] ?? 0) + 1;
    }
  }

  const rows = [...buckets.values()].map(({ row, sums, counts }) => {
    const values: Record<string, CellValue> = {};
    for (const name of dataset.variables) {
      values[name] = counts[name] ? sums[name] / counts[name] : null;
    }
    return { ...row, values };
  });

  return { ...dataset, rows };
}
