export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function safeRate(hit: number, total: number): number {
  return total > 0 ? hit / total : 0;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

export interface SampleStats {
  n: number;
  mean: number | null;
  sd: number | null;
}

export function summarize(values: readonly number[]): SampleStats {
  const n = values.length;
  if (n === 0) {
    return { n: 0, mean: null, sd: null };
  }

  const mean = sum(values) / n;
  if (n === 1) {
    return { n, mean, sd: null };
  }

  const variance = values.reduce((acc, value) => acc + (value - mean) ** 2, 0) / (n - 1);
  return {
    n,
    mean,
    sd: Math.sqrt(variance),
  };
}
