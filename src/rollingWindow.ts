// src/rollingWindow.ts
import { EventEmitter } from "node:events";
import { connectLink, createLink, type DerivationLink, type DerivationLinkView } from "./derivation.js";
import { InvalidSampleError, InvalidWindowSizeError, UnknownSubscriptionError } from "./errors.js";
import type { RollingWindowEventMap, SampleEvictedEvent } from "./events.js";
import {
  harmonicMean,
  identity,
  populationStd,
  populationVariance,
  sampleStd,
  sampleVariance,
  zScore,
} from "./formulas.js";
import type { WindowSnapshot } from "./snapshot.js";
import { TrackedValue } from "./trackedValue.js";
import type { BuiltinStat, CombineFn, ReadonlyTrackedValue, RollingWindowOptions } from "./types.js";
import { createLogger } from "./utils/logger.js";
import { SampleBuffer } from "./utils/sampleBuffer.js";

interface Primaries {
  value: TrackedValue;
  n: TrackedValue;
  M: TrackedValue;
  S: TrackedValue;
  sum: TrackedValue;
  reciprocalSum: TrackedValue;
}

interface Subscription {
  link: DerivationLink;
  disconnect: () => void;
}

const log = createLogger("rolling-window");

const MAX_PREALLOCATED = 1024;

function initialCapacity(windowSize: number): number {
  if (!Number.isFinite(windowSize) || windowSize <= 0) return 16;
  // +1: a new sample is appended before the oldest one is evicted
  return Math.min(Math.ceil(windowSize) + 1, MAX_PREALLOCATED);
}

/**
 * Streaming statistics over the last `windowSize` samples.
 *
 * Every push updates count, sum, mean, the sum of squared deviations (S) and the
 * sum of reciprocals incrementally, evicting the oldest sample once the window is full.
 * All primaries then commit one history step together, and subscribed values
 * recompute from them before `push` returns.
 *
 * `windowSize <= 0` makes `push` a no-op.
 */
export class RollingWindow extends EventEmitter implements Iterable<number> {
  readonly windowSize: number;

  private readonly samples: SampleBuffer;
  private readonly cells: Primaries;
  private readonly order: readonly TrackedValue[];
  private readonly links = new Map<string, Subscription>();

  constructor(opts: RollingWindowOptions = {}) {
    super();

    const windowSize = opts.windowSize ?? Infinity;
    if (typeof windowSize !== "number" || Number.isNaN(windowSize)) {
      throw new InvalidWindowSizeError(windowSize);
    }
    this.windowSize = windowSize;
    this.samples = new SampleBuffer(initialCapacity(windowSize));

    this.cells = {
      value: new TrackedValue(NaN),
      n: new TrackedValue(0),
      M: new TrackedValue(NaN),
      S: new TrackedValue(NaN),
      sum: new TrackedValue(0),
      reciprocalSum: new TrackedValue(NaN),
    };
    this.order = [this.cells.value, this.cells.n, this.cells.M, this.cells.S, this.cells.sum, this.cells.reciprocalSum];

    if (windowSize <= 0) log.log(`windowSize=${windowSize}: pushes will be ignored`);

    if (opts.data) {
      for (const sample of opts.data) this.push(sample);
    }
  }

  get value(): ReadonlyTrackedValue {
    return this.cells.value;
  }

  get count(): ReadonlyTrackedValue {
    return this.cells.n;
  }

  get mean(): ReadonlyTrackedValue {
    return this.cells.M;
  }

  get sumSquaredDeviations(): ReadonlyTrackedValue {
    return this.cells.S;
  }

  get sum(): ReadonlyTrackedValue {
    return this.cells.sum;
  }

  get reciprocalSum(): ReadonlyTrackedValue {
    return this.cells.reciprocalSum;
  }

  get length(): number {
    return this.samples.length;
  }

  push(...samples: number[]): void {
    if (this.windowSize <= 0) return;

    for (const sample of samples) {
      if (typeof sample !== "number") throw new InvalidSampleError(sample);
    }

    for (const sample of samples) this.admit(sample);
  }

  subscribe(name: string, inputs: readonly ReadonlyTrackedValue[], combine: CombineFn): ReadonlyTrackedValue {
    const link = createLink(name, inputs, new TrackedValue(NaN), combine);

    // Rebinding a name leaves the previous link connected: values chained on its output keep updating.
    this.links.set(name, { link, disconnect: connectLink(link) });

    log.log(`subscribed "${name}" to ${link.required.size} input(s)`);
    this.emitEvent("subscription:added", { name, inputs: link.inputs });
    return link.output;
  }

  unsubscribe(name: string): boolean {
    const sub = this.links.get(name);
    if (!sub) return false;

    sub.disconnect();
    this.links.delete(name);

    log.log(`unsubscribed "${name}"`);
    this.emitEvent("subscription:removed", { name });
    return true;
  }

  subscribeVar(): ReadonlyTrackedValue {
    return this.subscribeBuiltin("var", [this.cells.S, this.cells.n], sampleVariance);
  }

  subscribeStd(): ReadonlyTrackedValue {
    return this.subscribeBuiltin("std", [this.cells.S, this.cells.n], sampleStd);
  }

  subscribePopVar(): ReadonlyTrackedValue {
    return this.subscribeBuiltin("pop_var", [this.cells.S, this.cells.n], populationVariance);
  }

  subscribePopStd(): ReadonlyTrackedValue {
    return this.subscribeBuiltin("pop_std", [this.cells.S, this.cells.n], populationStd);
  }

  subscribeZScore(): ReadonlyTrackedValue {
    return this.subscribeBuiltin("zscore", [this.cells.S, this.cells.n, this.cells.value, this.cells.M], zScore);
  }

  subscribeMean(): ReadonlyTrackedValue {
    return this.subscribeBuiltin("mean", [this.cells.M], identity);
  }

  subscribeHarmonicMean(): ReadonlyTrackedValue {
    return this.subscribeBuiltin("harmonic_mean", [this.cells.reciprocalSum, this.cells.n], harmonicMean);
  }

  find(name: string): ReadonlyTrackedValue | undefined {
    return this.links.get(name)?.link.output;
  }

  stat(name: string): ReadonlyTrackedValue {
    const out = this.find(name);
    if (!out) throw new UnknownSubscriptionError(name);
    return out;
  }

  /** Barrier state of a subscription, or undefined if there is none under that name. */
  link(name: string): DerivationLinkView | undefined {
    return this.links.get(name)?.link;
  }

  subscriptions(): string[] {
    return [...this.links.keys()];
  }

  at(index: number): number | undefined {
    return this.samples.at(index);
  }

  slice(start?: number, end?: number): number[] {
    return this.samples.slice(start, end);
  }

  toArray(): number[] {
    return this.samples.toArray();
  }

  [Symbol.iterator](): Iterator<number> {
    return this.samples[Symbol.iterator]();
  }

  /** Same window size and same retained samples, in order. History is not compared. */
  equals(other: unknown): boolean {
    if (!(other instanceof RollingWindow)) return false;
    return this.windowSize === other.windowSize && this.samples.equals(other.samples);
  }

  snapshot(): WindowSnapshot {
    const derived: Record<string, number> = {};
    for (const [name, sub] of this.links.entries()) derived[name] = sub.link.output.current;

    return {
      windowSize: this.windowSize,
      length: this.samples.length,
      count: this.cells.n.current,
      sum: this.cells.sum.current,
      mean: this.cells.M.current,
      value: this.cells.value.current,
      sumSquaredDeviations: this.cells.S.current,
      reciprocalSum: this.cells.reciprocalSum.current,
      derived,
    };
  }

  private subscribeBuiltin(name: BuiltinStat, inputs: readonly TrackedValue[], combine: CombineFn): ReadonlyTrackedValue {
    return this.subscribe(name, inputs, combine);
  }

  private admit(sample: number): void {
    const { value, n, M, S, sum, reciprocalSum } = this.cells;

    this.samples.push(sample);
    value.assign(sample);

    const evicted = n.current >= this.windowSize ? this.evict() : undefined;

    const reciprocal = sample === 0 ? NaN : 1 / sample;

    n.assign(n.current + 1);
    sum.assign(sum.current + sample);

    if (n.current === 1) {
      S.assign(0);
      M.assign(sample);
      reciprocalSum.assign(reciprocal);
    } else {
      const prevM = M.current;
      const diff = sample - prevM;
      M.assign(prevM + diff / n.current);
      // second factor uses the updated mean
      S.assign(S.current + diff * (sample - M.current));
      reciprocalSum.assign(reciprocalSum.current + reciprocal);
    }

    this.commit();

    // Listeners only ever see a committed step.
    if (evicted) this.emitEvent("sample:evicted", evicted);
  }

  private evict(): SampleEvictedEvent | undefined {
    const { n, M, S, sum, reciprocalSum } = this.cells;

    const out = this.samples.shift();
    if (out === undefined) return undefined;
    const prevM = M.current;

    n.assign(n.current - 1);
    sum.assign(sum.current - out);

    if (n.current === 0) {
      S.assign(NaN);
      M.assign(NaN);
      reciprocalSum.assign(NaN);
    } else {
      const diff = out - M.current;
      M.assign(M.current - diff / n.current);
      S.assign(S.current - diff * (out - prevM));
      // a zero leaves the sum NaN until the window empties
      reciprocalSum.assign(out === 0 ? NaN : reciprocalSum.current - 1 / out);
    }

    return { sample: out, remaining: n.current };
  }

  private commit(): void {
    for (const cell of this.order) cell.record();
    for (const cell of this.order) cell.notify();

    this.emitEvent("step:committed", {
      step: this.cells.n.length,
      value: this.cells.value.current,
      count: this.cells.n.current,
    });
  }

  private emitEvent<K extends keyof RollingWindowEventMap>(name: K, payload: RollingWindowEventMap[K]): void {
    this.emit(name, payload);
  }
}
