// src/formulas.ts
// Derived statistics over the running primaries: S (sum of squared deviations), n (count), M (mean).
// Undefined results are NaN.

export function sampleVariance(S: number, n: number): number {
  return n > 1 ? S / (n - 1) : NaN;
}

export function sampleStd(S: number, n: number): number {
  return n > 1 ? Math.sqrt(S / (n - 1)) : NaN;
}

// NaN at n == 1 as well, not 0.
export function populationVariance(S: number, n: number): number {
  return n > 1 ? S / n : NaN;
}

export function populationStd(S: number, n: number): number {
  return n > 1 ? Math.sqrt(S / n) : NaN;
}

export function zScore(S: number, n: number, value: number, M: number): number {
  return S > 0 && n > 0 ? (value - M) / sampleStd(S, n) : NaN;
}

export function harmonicMean(reciprocalSum: number, n: number): number {
  if (Number.isNaN(reciprocalSum) || reciprocalSum === 0) return NaN;
  return n / reciprocalSum;
}

export function identity(x: number): number {
  return x;
}
