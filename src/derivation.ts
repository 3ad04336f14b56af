// src/derivation.ts
import { DerivationInputError } from "./errors.js";
import type { TrackedValue } from "./trackedValue.js";
import type { CombineFn, ReadonlyTrackedValue } from "./types.js";

/**
 * One N -> 1 derivation with join-barrier state.
 *
 * The link fires once every distinct input has committed since it last fired,
 * however many times each of them committed in between.
 */
export interface DerivationLink {
  readonly name: string;
  readonly inputs: readonly ReadonlyTrackedValue[];
  readonly output: TrackedValue;
  readonly combine: CombineFn;
  readonly required: ReadonlySet<ReadonlyTrackedValue>;
  readonly pending: Set<ReadonlyTrackedValue>;
  fired: number;
}

/** What callers outside the owner may see of a link: nothing here can commit or change the barrier. */
export interface DerivationLinkView {
  readonly name: string;
  readonly inputs: readonly ReadonlyTrackedValue[];
  readonly output: ReadonlyTrackedValue;
  readonly combine: CombineFn;
  readonly required: ReadonlySet<ReadonlyTrackedValue>;
  readonly pending: ReadonlySet<ReadonlyTrackedValue>;
  readonly fired: number;
}

export function createLink(
  name: string,
  inputs: readonly ReadonlyTrackedValue[],
  output: TrackedValue,
  combine: CombineFn
): DerivationLink {
  if (inputs.length === 0) throw new DerivationInputError(`subscription "${name}" needs at least one input`);
  return {
    name,
    inputs: [...inputs],
    output,
    combine,
    required: new Set(inputs),
    pending: new Set(),
    fired: 0,
  };
}

/**
 * Mark `input` as committed for the current cycle.
 * Returns true when this completed the barrier and the output was recomputed and committed.
 */
export function notifyLink(link: DerivationLink, input: ReadonlyTrackedValue): boolean {
  if (!link.required.has(input)) return false;

  link.pending.add(input);
  if (link.pending.size < link.required.size) return false;

  // Clear first: committing the output may cascade back into this link.
  link.pending.clear();
  link.output.assign(link.combine(...link.inputs.map((i) => i.current)));
  link.fired += 1;
  link.output.commit();
  return true;
}

/**
 * Attach the link's hook to each distinct input.
 * Returns a function that detaches all of them.
 */
export function connectLink(link: DerivationLink): () => void {
  const detach = [...link.required].map((input) => input.addHook((source) => notifyLink(link, source)));
  return () => {
    for (const d of detach) d();
    link.pending.clear();
  };
}
