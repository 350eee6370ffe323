/**
 * Lifecycle Controller
 *
 * Decides what to do with a review app from the PR action and the app's
 * live state. State is re-derived from flyctl on every run, so repeated or
 * out-of-order deliveries of the same event converge.
 *
 * | action                       | app exists | decision |
 * |------------------------------|------------|----------|
 * | closed                       | any        | destroy  |
 * | opened / synchronize / other | no         | create   |
 * | opened / synchronize         | yes        | update   |
 * | other                        | yes        | noop     |
 */

import type {
  AppStatusSnapshot,
  LifecycleDecision,
  LifecycleOutcome,
  PullRequestAction,
} from "./types.js";

/**
 * Whether deciding needs the existence probe at all.
 */
export function requiresStatusProbe(action: PullRequestAction): boolean {
  return action !== "closed";
}

export function decideLifecycle(
  action: PullRequestAction,
  snapshot: Pick<AppStatusSnapshot, "exists">
): LifecycleDecision {
  if (action === "closed") {
    return "destroy";
  }
  if (!snapshot.exists) {
    return "create";
  }
  return action === "other" ? "noop" : "update";
}

const OUTCOMES: Record<LifecycleDecision, LifecycleOutcome> = {
  destroy: "Destroyed",
  create: "Created",
  update: "Updated",
  noop: "NoOp",
};

export function outcomeFor(decision: LifecycleDecision): LifecycleOutcome {
  return OUTCOMES[decision];
}
