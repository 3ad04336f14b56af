// src/errors.ts

export class InvalidSampleError extends Error {
  readonly sample: unknown;

  constructor(sample: unknown) {
    super(`sample must be a number (got ${typeof sample})`);
    this.name = "InvalidSampleError";
    this.sample = sample;
  }
}

export class InvalidWindowSizeError extends Error {
  readonly windowSize: unknown;

  constructor(windowSize: unknown) {
    super(`windowSize must be a number or Infinity (got ${String(windowSize)})`);
    this.name = "InvalidWindowSizeError";
    this.windowSize = windowSize;
  }
}

export class UnknownSubscriptionError extends Error {
  readonly subscription: string;

  constructor(subscription: string) {
    super(`no subscription named "${subscription}"`);
    this.name = "UnknownSubscriptionError";
    this.subscription = subscription;
  }
}

export class DerivationInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DerivationInputError";
  }
}

export class HistoryLengthMismatchError extends Error {
  readonly lengths: readonly number[];

  constructor(lengths: readonly number[]) {
    super(`inputs must share one history length (got ${lengths.join(", ")})`);
    this.name = "HistoryLengthMismatchError";
    this.lengths = lengths;
  }
}
