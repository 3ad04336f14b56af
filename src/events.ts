import type { ReadonlyTrackedValue } from "./types.js";

export type RollingWindowEventName =
  | "sample:evicted"
  | "step:committed"
  | "subscription:added"
  | "subscription:removed";

export interface SampleEvictedEvent {
  sample: number;
  remaining: number;   // retained samples right after eviction, before the new one is counted
}

export interface StepCommittedEvent {
  step: number;        // 1-based; equals the history length of every primary
  value: number;
  count: number;
}

export interface SubscriptionAddedEvent {
  name: string;
  inputs: readonly ReadonlyTrackedValue[];
}

export interface SubscriptionRemovedEvent {
  name: string;
}

export interface RollingWindowEventMap {
  "sample:evicted": SampleEvictedEvent;
  "step:committed": StepCommittedEvent;
  "subscription:added": SubscriptionAddedEvent;
  "subscription:removed": SubscriptionRemovedEvent;
}
