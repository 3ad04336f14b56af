export interface WindowSnapshot {
  windowSize: number;
  length: number;
  count: number;
  sum: number;
  mean: number;
  value: number;
  sumSquaredDeviations: number;
  reciprocalSum: number;
  derived: Record<string, number>;
}
