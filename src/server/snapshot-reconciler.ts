import * as config from "./config.ts";
import type { CoverSnapshot } from "./cover-backend.ts";

export type ReconcileContext = {
  sessionActive: boolean;
  // when the last timed movement finished, null if there never was one
  lastControlledAt: number | null;
};

export type ReconcileDecision =
  | { kind: "accept"; position: number; closed: boolean }
  | { kind: "unknown" }
  | { kind: "suppress"; reason: "movement" | "grace" };

export function reconcileSnapshot(
  context: ReconcileContext,
  snapshot: CoverSnapshot,
  now: number
): ReconcileDecision {
  if (context.sessionActive) {
    return { kind: "suppress", reason: "movement" };
  }
  if (
    context.lastControlledAt !== null &&
    now - context.lastControlledAt < config.SNAPSHOT_GRACE_MS
  ) {
    return { kind: "suppress", reason: "grace" };
  }
  const position = snapshot.positionPercent;
  if (position === undefined || position === null || !Number.isFinite(position)) {
    return { kind: "unknown" };
  }
  return {
    kind: "accept",
    position,
    closed: position < config.CLOSED_THRESHOLD,
  };
}
