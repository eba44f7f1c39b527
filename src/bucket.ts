import { Series } from "./util.js";
import { ViewWindow } from "./view_window.js";

export type Bucketing = "sample" | "mean";

export const BUCKETINGS: readonly Bucketing[] = ["sample", "mean"];

export type Bucket = {
  key: number;
  value: number | undefined;
};

export function isBucketing(v: unknown): v is Bucketing {
  return typeof v === "string" && (BUCKETINGS as readonly string[]).includes(v);
}

export function sampleKey(i: number, width: number, window: ViewWindow): number {
  // Multiply first: (i / width) * span can land just below an integer.
  return Math.floor((i * (window.end - window.start)) / width) + window.start;
}

export function sampleKeys(width: number, window: ViewWindow): number[] {
  const keys: number[] = [];
  for (let i = 0; i <= width; i += 1) keys.push(sampleKey(i, width, window));
  return keys;
}

/**
 * One bucket per drawn column. `sample` keeps only the record whose step equals
 * the column's key; `mean` averages every step between this key and the next.
 */
export function buildBuckets(series: Series, width: number, window: ViewWindow, policy: Bucketing = "sample"): Bucket[] {
  const keys = sampleKeys(width, window);
  if (policy === "sample") {
    const byStep = new Map<number, number>();
    for (const p of series) byStep.set(p.step, p.value);
    return keys.map((key) => ({ key, value: byStep.get(key) }));
  }
  return keys.map((key, i) => {
    const last = i === keys.length - 1;
    const upper = last ? window.end + 1 : Math.max(keys[i + 1], key + 1);
    let sum = 0;
    let count = 0;
    for (const p of series) {
      if (p.step >= key && p.step < upper) {
        sum += p.value;
        count += 1;
      }
    }
    return { key, value: count > 0 ? sum / count : undefined };
  });
}

export function valueRange(buckets: Bucket[]): { min: number; max: number } | undefined {
  let min = Infinity;
  let max = -Infinity;
  for (const b of buckets) {
    if (b.value === undefined) continue;
    min = Math.min(min, b.value);
    max = Math.max(max, b.value);
  }
  return min <= max ? { min, max } : undefined;
}
