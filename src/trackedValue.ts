// src/trackedValue.ts
import { DerivationInputError, HistoryLengthMismatchError } from "./errors.js";
import type { CombineFn, HookFn, ReadonlyTrackedValue } from "./types.js";

/**
 * A number that remembers every value it was committed with.
 *
 * - `assign()` changes the current value without touching history.
 * - `commit()` appends the current value to history, then runs hooks in registration order.
 * - `record()` / `notify()` are the two halves of `commit()`, for owners that commit several values as one step.
 */
export class TrackedValue implements ReadonlyTrackedValue {
  private value: number;
  private readonly entries: number[] = [];
  private readonly hooks: HookFn[] = [];

  constructor(initial: number = NaN) {
    this.value = initial;
  }

  /**
   * Build a one-shot value from inputs that share a history length.
   * Hooks are not wired: the result does not follow later commits.
   */
  static transform(inputs: readonly ReadonlyTrackedValue[], combine: CombineFn): TrackedValue {
    if (inputs.length === 0) throw new DerivationInputError("transform needs at least one input");

    const lengths = inputs.map((input) => input.length);
    const steps = lengths[0];
    if (lengths.some((len) => len !== steps)) throw new HistoryLengthMismatchError(lengths);

    const result = new TrackedValue(combine(...inputs.map((input) => input.current)));
    for (let t = 0; t < steps; t++) {
      result.entries.push(combine(...inputs.map((input) => input.history[t])));
    }
    return result;
  }

  get current(): number {
    return this.value;
  }

  get history(): readonly number[] {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  assign(value: number): void {
    this.value = value;
  }

  record(): void {
    this.entries.push(this.value);
  }

  notify(): void {
    // Copy: a hook may attach or detach hooks while we iterate.
    for (const hook of [...this.hooks]) hook(this);
  }

  commit(): void {
    this.record();
    this.notify();
  }

  /** Returns a function that detaches the hook again. */
  addHook(hook: HookFn): () => void {
    this.hooks.push(hook);
    return () => {
      const idx = this.hooks.indexOf(hook);
      if (idx >= 0) this.hooks.splice(idx, 1);
    };
  }

  copy(): TrackedValue {
    const result = new TrackedValue(this.value);
    for (const entry of this.entries) result.entries.push(entry);
    return result;
  }

  toString(): string {
    const past = this.entries.map((v) => `'${v.toFixed(2)}'`).join(", ");
    return `TrackedValue(v=${this.value.toFixed(2)}, history=[${past}])`;
  }
}
