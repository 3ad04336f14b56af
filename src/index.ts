export { RollingWindow } from "./rollingWindow.js";
export { TrackedValue } from "./trackedValue.js";
export { connectLink, createLink, notifyLink } from "./derivation.js";
export type { DerivationLink, DerivationLinkView } from "./derivation.js";
export {
  harmonicMean,
  identity,
  populationStd,
  populationVariance,
  sampleStd,
  sampleVariance,
  zScore,
} from "./formulas.js";
export {
  DerivationInputError,
  HistoryLengthMismatchError,
  InvalidSampleError,
  InvalidWindowSizeError,
  UnknownSubscriptionError,
} from "./errors.js";
export type * from "./events.js";
export type { WindowSnapshot } from "./snapshot.js";
export type { BuiltinStat, CombineFn, HookFn, ReadonlyTrackedValue, RollingWindowOptions } from "./types.js";
