export type MovementDirection = "opening" | "closing";

export type MovementSession = {
  startPosition: number;
  targetPosition: number;
  direction: MovementDirection;
  startedAt: number; // ms since epoch
  durationMs: number;
};

export function movementDirection(
  from: number,
  to: number
): MovementDirection {
  return to > from ? "opening" : "closing";
}

/**
 * Time for a constant-velocity move between two positions, given the time a
 * full 0-100 traversal takes in that direction.
 */
export function movementDurationMs(
  from: number,
  to: number,
  travelTimeSeconds: number
): number {
  return (Math.abs(to - from) / 100) * travelTimeSeconds * 1000;
}

export function createMovementSession(
  from: number,
  to: number,
  travelTimeSeconds: number,
  startedAt: number
): MovementSession {
  return {
    startPosition: from,
    targetPosition: to,
    direction: movementDirection(from, to),
    startedAt,
    durationMs: movementDurationMs(from, to, travelTimeSeconds),
  };
}

export function elapsedMs(session: MovementSession, now: number): number {
  return Math.max(0, now - session.startedAt);
}

export function isSessionElapsed(session: MovementSession, now: number): boolean {
  return elapsedMs(session, now) >= session.durationMs;
}

export function estimatePosition(session: MovementSession, now: number): number {
  if (isSessionElapsed(session, now)) {
    return session.targetPosition;
  }
  const progress = elapsedMs(session, now) / session.durationMs;
  return (
    session.startPosition +
    (session.targetPosition - session.startPosition) * progress
  );
}
