export type CombineFn = (...values: number[]) => number;

export type HookFn = (source: ReadonlyTrackedValue) => void;

/**
 * Read-only view of a tracked numeric cell.
 * Owners hold the mutable `TrackedValue`; everyone else gets this.
 */
export interface ReadonlyTrackedValue {
  readonly current: number;
  readonly history: readonly number[];
  readonly length: number;
  addHook(hook: HookFn): () => void;
  copy(): ReadonlyTrackedValue;
  toString(): string;
}

export type BuiltinStat = "var" | "std" | "pop_var" | "pop_std" | "zscore" | "mean" | "harmonic_mean";

export interface RollingWindowOptions {
  data?: Iterable<number>;
  windowSize?: number;        // default Infinity; <= 0 turns push into a no-op
}
