import { EventEmitter } from "events";
import * as config from "./config.ts";
import { type Logger } from "./logger.ts";
import {
  type CoverCalibrationStatus,
  type CoverDirection,
  type CoverState,
  toPositionState,
} from "../shared/cover-state.ts";
import type { CoverCapability, CoverSnapshot } from "./cover-backend.ts";
import {
  type CalibrationStore,
  type TravelTimes,
  isCalibrated,
  resolveTravelTimes,
  travelTimeFor,
} from "./calibration-store.ts";
import {
  type MovementSession,
  createMovementSession,
  estimatePosition,
  isSessionElapsed,
  movementDirection,
  movementDurationMs,
} from "./movement-session.ts";
import {
  type ScheduledTask,
  scheduleAfter,
  scheduleEvery,
} from "./scheduled-task.ts";
import { reconcileSnapshot } from "./snapshot-reconciler.ts";
import {
  CoverBusyError,
  CoverCommandError,
  type CoverCommand,
  InvalidRequestError,
} from "./errors.ts";

export interface CoverEvent {
  state: CoverState;
}

export type CoverControllerOptions = {
  id: string;
  name: string;
  capability: CoverCapability;
  store: CalibrationStore;
  logger: Logger;
  // asks the snapshot feed to poll again soon after a command
  requestRefresh?: () => void;
};

type ActiveMovement = {
  session: MovementSession;
  tracker: ScheduledTask;
  stopper: ScheduledTask;
  lastPublishAt: number;
};

type MotionFlags = Pick<
  CoverState,
  "currentPosition" | "closed" | "opening" | "closing"
>;

export class CoverController extends EventEmitter {
  readonly id: string;
  readonly name: string;
  readonly capability: CoverCapability;

  private state: Omit<CoverState, "positionState" | "calibration">;
  private travelTimes: TravelTimes;
  private calibrating: boolean;
  private movement: ActiveMovement | null;
  private lastControlledAt: number | null;
  private lastPublished: string | null;
  private store: CalibrationStore;
  private logger: Logger;
  private requestRefresh: () => void;

  constructor(options: CoverControllerOptions) {
    super();

    this.id = options.id;
    this.name = options.name;
    this.capability = options.capability;
    this.store = options.store;
    this.logger = options.logger;
    this.requestRefresh = options.requestRefresh ?? (() => {});
    this.state = {
      id: options.id,
      name: options.name,
      currentPosition: null,
      closed: null,
      opening: false,
      closing: false,
      available: false,
    };
    this.travelTimes = resolveTravelTimes({});
    this.calibrating = false;
    this.movement = null;
    this.lastControlledAt = null;
    this.lastPublished = null;
  }

  getState(): CoverState {
    return {
      ...this.state,
      positionState: toPositionState(this.state),
      calibration: this.calibrationStatus(),
    };
  }

  getTravelTimes(): TravelTimes {
    return { ...this.travelTimes };
  }

  getTargetPosition(): number {
    if (this.movement) {
      return this.movement.session.targetPosition;
    } else if (this.state.opening) {
      return 100;
    } else if (this.state.closing) {
      return 0;
    }
    return this.state.currentPosition ?? 0;
  }

  isMoving(): boolean {
    return this.movement !== null;
  }

  async reloadCalibration(): Promise<void> {
    const record = await this.store.load(this.id);
    this.travelTimes = resolveTravelTimes(record);
    this.logger.verbose(
      `${this.name}: travel times open=${this.travelTimes.openTime}s (${
        this.travelTimes.openCalibrated ? "calibrated" : "default"
      }), close=${this.travelTimes.closeTime}s (${
        this.travelTimes.closeCalibrated ? "calibrated" : "default"
      })`
    );
    this.publish();
  }

  async setTargetPosition(position: number): Promise<void> {
    this.logger.info(`${this.name}: set position command received: ${position}`);
    this.assertNotCalibrating();
    if (!Number.isFinite(position) || position < 0 || position > 100) {
      throw new InvalidRequestError("Position must be between 0 and 100");
    }

    const now = Date.now();
    const current = this.currentEstimate(now);
    const direction: CoverDirection =
      movementDirection(current, position) === "opening" ? "open" : "close";
    const travelTime = travelTimeFor(this.travelTimes, direction);
    if (!isCalibrated(this.travelTimes, direction)) {
      this.logger.warn(
        `${this.name}: ${direction} direction is not calibrated, position control may be inaccurate`
      );
    }

    const durationMs = movementDurationMs(current, position, travelTime);
    if (durationMs < config.MIN_MOVEMENT_SECONDS * 1000) {
      this.logger.verbose(
        `${this.name}: movement from ${current.toFixed(1)}% to ${position}% too small, not moving`
      );
      if (this.cancelMovement()) {
        // a superseded movement leaves the motor running
        this.sendStopWithoutWaiting();
        this.state.opening = false;
        this.state.closing = false;
      }
      this.state.currentPosition = position;
      this.state.closed = position <= config.CLOSED_THRESHOLD;
      this.publish();
      return;
    }

    const previous = this.motionFlags();
    this.cancelMovement();

    this.logger.verbose(
      `${this.name}: moving from ${current.toFixed(1)}% to ${position}% (${direction}: ${(
        durationMs / 1000
      ).toFixed(1)}s of ${travelTime}s)`
    );
    const command =
      direction === "open"
        ? this.capability.moveOpen()
        : this.capability.moveClose();

    const session = createMovementSession(current, position, travelTime, now);
    this.movement = {
      session,
      tracker: scheduleEvery(config.TRACKING_TICK_MS, () => this.track(session)),
      stopper: scheduleAfter(session.durationMs, () =>
        this.finishMovement(session)
      ),
      lastPublishAt: now,
    };
    this.state.opening = direction === "open";
    this.state.closing = direction === "close";
    this.state.closed = false;
    this.publish();

    try {
      await command;
    } catch (err) {
      if (this.movement?.session === session) {
        this.cancelMovement();
        Object.assign(this.state, previous);
        this.publish();
      }
      throw this.commandFailed(direction, err);
    }
  }

  async open(): Promise<void> {
    await this.moveToEnd("open");
  }

  async close(): Promise<void> {
    await this.moveToEnd("close");
  }

  async stop(): Promise<void> {
    this.logger.info(`${this.name}: stop command received`);
    this.assertNotCalibrating();
    const previous = this.motionFlags();
    this.cancelMovement();

    try {
      await this.capability.stop();
    } catch (err) {
      Object.assign(this.state, previous);
      this.publish();
      throw this.commandFailed("stop", err);
    }

    // where it stopped is only known as well as the last estimate
    this.state.opening = false;
    this.state.closing = false;
    this.publish();
    this.requestRefresh();
  }

  applySnapshot(snapshot: CoverSnapshot): void {
    const decision = reconcileSnapshot(
      {
        sessionActive: this.movement !== null,
        lastControlledAt: this.lastControlledAt,
      },
      snapshot,
      Date.now()
    );
    this.state.available = true;

    switch (decision.kind) {
      case "suppress":
        this.logger.debug(
          `${this.name}: ignoring reported position ${snapshot.positionPercent} (${
            decision.reason === "movement" ? "timed movement" : "grace period"
          }), keeping ${this.state.currentPosition}`
        );
        break;
      case "unknown":
        this.logger.warn(
          `${this.name}: no position reported, position is unknown`
        );
        this.state.currentPosition = null;
        this.state.closed = null;
        break;
      case "accept":
        this.state.currentPosition = decision.position;
        this.state.closed = decision.closed;
        break;
    }
    if (decision.kind !== "suppress" && !snapshot.isMoving) {
      this.state.opening = false;
      this.state.closing = false;
    }
    this.publish();
  }

  setAvailable(available: boolean): void {
    this.state.available = available;
    this.publish();
  }

  beginCalibration(): void {
    this.assertNotCalibrating();
    if (this.cancelMovement()) {
      this.sendStopWithoutWaiting();
      this.state.opening = false;
      this.state.closing = false;
    }
    this.calibrating = true;
    this.publish();
  }

  endCalibration(): void {
    this.calibrating = false;
    this.publish();
  }

  dispose(): void {
    this.cancelMovement();
    this.removeAllListeners();
  }

  private async moveToEnd(direction: CoverDirection): Promise<void> {
    this.logger.info(`${this.name}: ${direction} command received`);
    this.assertNotCalibrating();
    this.cancelMovement();

    try {
      if (direction === "open") {
        await this.capability.moveOpen();
      } else {
        await this.capability.moveClose();
      }
    } catch (err) {
      this.publish();
      throw this.commandFailed(direction, err);
    }

    // the final position is left to the next accepted snapshot
    this.state.opening = direction === "open";
    this.state.closing = direction === "close";
    this.state.closed = direction === "close";
    this.publish();
    this.requestRefresh();
  }

  private track(session: MovementSession): void {
    const movement = this.movement;
    if (!movement || movement.session !== session) {
      return;
    }
    const now = Date.now();

    if (isSessionElapsed(session, now)) {
      movement.tracker.cancel();
      movement.lastPublishAt = now;
      this.state.currentPosition = session.targetPosition;
      this.state.closed = session.targetPosition <= config.CLOSED_THRESHOLD;
      this.publish();
      return;
    }

    const estimate = estimatePosition(session, now);
    this.state.currentPosition = Math.round(estimate);
    this.state.closed = estimate <= config.CLOSED_THRESHOLD;
    if (now - movement.lastPublishAt >= config.TRACKING_PUBLISH_MS) {
      movement.lastPublishAt = now;
      this.publish();
    }
  }

  private finishMovement(session: MovementSession): void {
    const movement = this.movement;
    if (!movement || movement.session !== session) {
      return;
    }
    this.logger.verbose(
      `${this.name}: stopping at ${session.targetPosition}% after ${(
        session.durationMs / 1000
      ).toFixed(1)}s`
    );
    movement.tracker.cancel();
    this.movement = null;
    this.sendStopWithoutWaiting();

    this.state.opening = false;
    this.state.closing = false;
    this.state.currentPosition = session.targetPosition;
    this.state.closed = session.targetPosition <= config.CLOSED_THRESHOLD;
    this.lastControlledAt = Date.now();
    this.publish();
  }

  private sendStopWithoutWaiting(): void {
    this.capability.stop().catch((err: unknown) => {
      this.logger.error(
        `${this.name}: stop command failed: ${
          err instanceof Error ? err.message : String(err)
        }`
      );
    });
  }

  /**
   * Cancels the active movement's tracker and delayed stop. Returns whether a
   * movement was in flight.
   */
  private cancelMovement(): boolean {
    const movement = this.movement;
    if (!movement) {
      return false;
    }
    movement.tracker.cancel();
    movement.stopper.cancel();
    this.movement = null;
    this.logger.debug(`${this.name}: movement cancelled`);
    return true;
  }

  private currentEstimate(now: number): number {
    if (this.movement) {
      return estimatePosition(this.movement.session, now);
    }
    return this.state.currentPosition ?? 0;
  }

  private motionFlags(): MotionFlags {
    return {
      currentPosition: this.state.currentPosition,
      closed: this.state.closed,
      opening: this.state.opening,
      closing: this.state.closing,
    };
  }

  private assertNotCalibrating(): void {
    if (this.calibrating) {
      throw new CoverBusyError(this.id);
    }
  }

  private commandFailed(command: CoverCommand, err: unknown): CoverCommandError {
    const error = new CoverCommandError(this.id, command, err);
    this.logger.error(`${this.name}: ${error.message}`);
    return error;
  }

  private calibrationStatus(): CoverCalibrationStatus {
    const fullyCalibrated =
      this.travelTimes.openCalibrated && this.travelTimes.closeCalibrated;
    return {
      openTime: this.travelTimes.openTime,
      closeTime: this.travelTimes.closeTime,
      openCalibrated: this.travelTimes.openCalibrated,
      closeCalibrated: this.travelTimes.closeCalibrated,
      fullyCalibrated,
      calibrationNeeded: !fullyCalibrated,
      inProgress: this.calibrating,
    };
  }

  // Emits a change event when the published state actually changed
  private publish(): void {
    const state = this.getState();
    const serialized = JSON.stringify(state);
    if (serialized === this.lastPublished) {
      return;
    }
    this.lastPublished = serialized;
    this.emit("change", { state } satisfies CoverEvent);
  }
}

export default CoverController;
