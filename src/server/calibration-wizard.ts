import * as config from "./config.ts";
import { type Logger } from "./logger.ts";
import type { CoverDirection } from "../shared/cover-state.ts";
import type { CoverCapability } from "./cover-backend.ts";
import {
  type CalibrationResults,
  type CalibrationStore,
  type TravelTimes,
  isCalibrated,
  travelTimeFor,
} from "./calibration-store.ts";
import { type ScheduledTask, scheduleAfter } from "./scheduled-task.ts";
import { type CoverCommand, InvalidRequestError } from "./errors.ts";

export type CalibrationChoice = CoverDirection | "both";

export type WizardError =
  | "already-calibrated"
  | "measurement-out-of-range"
  | "command-failed";

export type WizardContext = {
  coverId: string;
  coverName: string;
  travel: TravelTimes;
  settleMs: number;
};

type Measuring = {
  context: WizardContext;
  // directions still to measure, the current one first
  plan: CoverDirection[];
  results: CalibrationResults;
  warnings: string[];
};

export type WizardState =
  | { phase: "select-cover" }
  | { phase: "select-direction"; context: WizardContext; error?: WizardError }
  | ({ phase: "instructions"; error?: WizardError } & Measuring)
  | ({ phase: "moving"; direction: CoverDirection } & Measuring)
  | ({
      phase: "awaiting-stop";
      direction: CoverDirection;
      startedAt: number;
    } & Measuring)
  | {
      phase: "complete";
      context: WizardContext;
      results: CalibrationResults;
      warnings: string[];
    }
  | { phase: "saved"; context: WizardContext; results: CalibrationResults }
  | { phase: "discarded"; context: WizardContext }
  | { phase: "cancelled"; context?: WizardContext };

export type WizardPhase = WizardState["phase"];

type MotionState = Extract<WizardState, { phase: "moving" | "awaiting-stop" }>;

export type WizardInput =
  | { type: "select-cover"; context: WizardContext }
  | { type: "select-direction"; direction: CalibrationChoice; force?: boolean }
  | { type: "begin" }
  | { type: "homed"; at: number }
  | { type: "stop-confirmed"; at: number }
  | { type: "command-failed"; message: string }
  | { type: "save" }
  | { type: "calibrate-other" }
  | { type: "recalibrate" }
  | { type: "discard" }
  | { type: "cancel" };

export type WizardEffect =
  | { type: "command"; command: CoverCommand }
  | { type: "schedule-homed"; delayMs: number }
  | { type: "cancel-timer" }
  | { type: "persist"; coverId: string; results: CalibrationResults };

export type WizardStep = {
  state: WizardState;
  effects: WizardEffect[];
};

const TERMINAL_PHASES: ReadonlySet<WizardPhase> = new Set<WizardPhase>([
  "saved",
  "discarded",
  "cancelled",
]);

export function isTerminal(state: WizardState): boolean {
  return TERMINAL_PHASES.has(state.phase);
}

function opposite(direction: CoverDirection): CoverDirection {
  return direction === "open" ? "close" : "open";
}

function rejectInput(state: WizardState, input: WizardInput): never {
  throw new InvalidRequestError(
    `Cannot handle '${input.type}' while calibration is in '${state.phase}'`
  );
}

export function homingDelayMs(
  context: WizardContext,
  homeDirection: CoverDirection
): number {
  const seconds = Math.max(
    travelTimeFor(context.travel, homeDirection) * config.HOMING_TRAVEL_FACTOR,
    config.MIN_HOMING_SECONDS
  );
  return seconds * 1000 + context.settleMs;
}

// Drive to the opposite end first so the measurement starts from a known edge
function startMeasuring(measuring: Measuring): WizardStep {
  const direction = measuring.plan[0];
  const homeDirection = opposite(direction);
  return {
    state: { phase: "moving", direction, ...measuring },
    effects: [
      { type: "command", command: homeDirection },
      {
        type: "schedule-homed",
        delayMs: homingDelayMs(measuring.context, homeDirection),
      },
    ],
  };
}

/**
 * The only way out of a state in which the cover may be moving: the stop is
 * always issued before anything the next state needs.
 */
function leaveMotion(next: WizardState, followUp: WizardEffect[] = []): WizardStep {
  return {
    state: next,
    effects: [
      { type: "cancel-timer" },
      { type: "command", command: "stop" },
      ...followUp,
    ],
  };
}

function measuringOf(state: MotionState): Measuring {
  return {
    context: state.context,
    plan: state.plan,
    results: state.results,
    warnings: state.warnings,
  };
}

function confirmStop(state: MotionState, at: number): WizardStep {
  if (state.phase !== "awaiting-stop") {
    throw new InvalidRequestError(
      "The cover has not started the measured movement yet"
    );
  }
  const measured = (at - state.startedAt) / 1000;
  if (
    !(measured >= config.MIN_MEASURED_TRAVEL_TIME) ||
    measured > config.MAX_MEASURED_TRAVEL_TIME
  ) {
    return leaveMotion({
      phase: "instructions",
      ...measuringOf(state),
      error: "measurement-out-of-range",
    });
  }

  const results: CalibrationResults = { ...state.results };
  results[state.direction] = measured;
  const warnings =
    measured < config.MIN_MANUAL_TRAVEL_TIME ||
    measured > config.MAX_MANUAL_TRAVEL_TIME
      ? [
          ...state.warnings,
          `${state.direction} travel time of ${measured.toFixed(
            1
          )}s is unusually ${
            measured < config.MIN_MANUAL_TRAVEL_TIME ? "short" : "long"
          }`,
        ]
      : state.warnings;
  const remaining = state.plan.slice(1);

  if (remaining.length > 0) {
    const next = startMeasuring({
      context: state.context,
      plan: remaining,
      results,
      warnings,
    });
    return leaveMotion(next.state, next.effects);
  }
  return leaveMotion({
    phase: "complete",
    context: state.context,
    results,
    warnings,
  });
}

export function transition(state: WizardState, input: WizardInput): WizardStep {
  if (isTerminal(state)) {
    rejectInput(state, input);
  }

  if (input.type === "cancel") {
    if (state.phase === "moving" || state.phase === "awaiting-stop") {
      return leaveMotion({ phase: "cancelled", context: state.context });
    }
    return {
      state:
        state.phase === "select-cover"
          ? { phase: "cancelled" }
          : { phase: "cancelled", context: state.context },
      effects: [],
    };
  }

  switch (state.phase) {
    case "select-cover":
      if (input.type !== "select-cover") {
        rejectInput(state, input);
      }
      return {
        state: { phase: "select-direction", context: input.context },
        effects: [],
      };

    case "select-direction": {
      if (input.type !== "select-direction") {
        rejectInput(state, input);
      }
      const { travel } = state.context;
      const plan: CoverDirection[] =
        input.direction === "both" ? ["open", "close"] : [input.direction];
      if (
        !input.force &&
        plan.every((direction) => isCalibrated(travel, direction))
      ) {
        return {
          state: { ...state, error: "already-calibrated" },
          effects: [],
        };
      }
      return {
        state: {
          phase: "instructions",
          context: state.context,
          plan,
          results: {},
          warnings: [],
        },
        effects: [],
      };
    }

    case "instructions":
      if (input.type !== "begin") {
        rejectInput(state, input);
      }
      return startMeasuring({
        context: state.context,
        plan: state.plan,
        results: state.results,
        warnings: state.warnings,
      });

    case "moving":
    case "awaiting-stop":
      switch (input.type) {
        case "homed":
          if (state.phase !== "moving") {
            rejectInput(state, input);
          }
          return {
            state: {
              ...measuringOf(state),
              phase: "awaiting-stop",
              direction: state.direction,
              startedAt: input.at,
            },
            effects: [{ type: "command", command: state.direction }],
          };
        case "stop-confirmed":
          return confirmStop(state, input.at);
        case "command-failed":
          return leaveMotion({
            phase: "instructions",
            ...measuringOf(state),
            error: "command-failed",
          });
        default:
          return rejectInput(state, input);
      }

    case "complete":
      switch (input.type) {
        case "save":
          return {
            state: {
              phase: "saved",
              context: state.context,
              results: state.results,
            },
            effects: [
              {
                type: "persist",
                coverId: state.context.coverId,
                results: state.results,
              },
            ],
          };
        case "calibrate-other": {
          const missing = (["open", "close"] as const).filter(
            (direction) => state.results[direction] === undefined
          );
          if (missing.length === 0) {
            rejectInput(state, input);
          }
          return {
            state: {
              phase: "instructions",
              context: state.context,
              plan: missing,
              results: state.results,
              warnings: state.warnings,
            },
            effects: [],
          };
        }
        case "recalibrate":
          return {
            state: { phase: "select-direction", context: state.context },
            effects: [],
          };
        case "discard":
          return {
            state: { phase: "discarded", context: state.context },
            effects: [],
          };
        default:
          return rejectInput(state, input);
      }

    default:
      return rejectInput(state, input);
  }
}

/**
 * The cover a calibration run drives. CoverController implements it.
 */
export interface CalibrationTarget {
  readonly id: string;
  readonly name: string;
  readonly capability: CoverCapability;
  getTravelTimes(): TravelTimes;
  beginCalibration(): void;
  endCalibration(): void;
  reloadCalibration(): Promise<void>;
}

// What a user may send; timestamps are taken when the input arrives
export type WizardRequest =
  | { type: "select-cover"; coverId: string }
  | { type: "select-direction"; direction: CalibrationChoice; force?: boolean }
  | { type: "begin" }
  | { type: "stop-confirmed" }
  | { type: "save" }
  | { type: "calibrate-other" }
  | { type: "recalibrate" }
  | { type: "discard" }
  | { type: "cancel" };

export type CalibrationWizardOptions = {
  id: string;
  store: CalibrationStore;
  logger: Logger;
  resolveTarget: (coverId: string) => CalibrationTarget;
  settleMs?: number;
  onFinished?: (wizard: CalibrationWizard) => void;
};

export type CalibrationWizardSummary = {
  id: string;
  state: WizardState;
};

export class CalibrationWizard {
  readonly id: string;
  private state: WizardState;
  private target: CalibrationTarget | null;
  private timer: ScheduledTask | null;
  private queue: Promise<unknown>;
  private options: CalibrationWizardOptions;
  private logger: Logger;

  constructor(options: CalibrationWizardOptions) {
    this.id = options.id;
    this.options = options;
    this.logger = options.logger;
    this.state = { phase: "select-cover" };
    this.target = null;
    this.timer = null;
    this.queue = Promise.resolve();
  }

  getState(): WizardState {
    return this.state;
  }

  get coverId(): string | null {
    return this.target?.id ?? null;
  }

  isFinished(): boolean {
    return isTerminal(this.state);
  }

  toJSON(): CalibrationWizardSummary {
    return { id: this.id, state: this.state };
  }

  /**
   * Inputs are handled one at a time, in arrival order.
   */
  send(request: WizardRequest): Promise<WizardState> {
    return this.enqueue(() => this.toInput(request));
  }

  private enqueue(next: () => WizardInput): Promise<WizardState> {
    const result = this.queue.then(() => this.dispatch(next()));
    this.queue = result.catch(() => undefined);
    return result;
  }

  private toInput(request: WizardRequest): WizardInput {
    switch (request.type) {
      case "select-cover":
        return {
          type: "select-cover",
          context: this.contextFor(request.coverId),
        };
      case "stop-confirmed":
        return { type: "stop-confirmed", at: Date.now() };
      default:
        return request;
    }
  }

  private contextFor(coverId: string): WizardContext {
    const target = this.options.resolveTarget(coverId);
    return {
      coverId: target.id,
      coverName: target.name,
      travel: target.getTravelTimes(),
      settleMs: this.options.settleMs ?? config.CALIBRATION_SETTLE_MS,
    };
  }

  private async dispatch(input: WizardInput): Promise<WizardState> {
    const previous = this.state;
    const step = transition(previous, input);

    if (input.type === "select-cover") {
      this.target = this.options.resolveTarget(input.context.coverId);
      this.target.beginCalibration();
    }
    this.state = step.state;
    this.logger.verbose(
      `Calibration ${this.id}: ${previous.phase} -> ${step.state.phase} (${input.type})`
    );

    try {
      await this.execute(step.effects);
    } catch (err) {
      if (step.state.phase === "saved") {
        this.state = previous;
      }
      throw err;
    }

    if (isTerminal(this.state)) {
      this.finish();
    }
    return this.state;
  }

  private async execute(effects: WizardEffect[]): Promise<void> {
    for (const effect of effects) {
      switch (effect.type) {
        case "command":
          if (!(await this.command(effect.command))) {
            return;
          }
          break;
        case "schedule-homed":
          this.timer?.cancel();
          this.timer = scheduleAfter(effect.delayMs, () => {
            this.timer = null;
            this.enqueue(() => ({ type: "homed", at: Date.now() })).catch(
              (err: unknown) => {
                this.logger.warn(
                  `Calibration ${this.id}: ${
                    err instanceof Error ? err.message : String(err)
                  }`
                );
              }
            );
          });
          break;
        case "cancel-timer":
          this.timer?.cancel();
          this.timer = null;
          break;
        case "persist":
          await this.options.store.save(effect.coverId, effect.results);
          await this.requireTarget().reloadCalibration();
          break;
      }
    }
  }

  /**
   * Returns false when the command failed and the run moved on to handle it.
   */
  private async command(command: CoverCommand): Promise<boolean> {
    const capability = this.requireTarget().capability;
    try {
      if (command === "open") {
        await capability.moveOpen();
      } else if (command === "close") {
        await capability.moveClose();
      } else {
        await capability.stop();
      }
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Calibration ${this.id}: ${command} failed: ${message}`);
      if (command === "stop") {
        return true;
      }
      if (this.state.phase === "moving" || this.state.phase === "awaiting-stop") {
        const step = transition(this.state, { type: "command-failed", message });
        this.state = step.state;
        await this.execute(step.effects);
      }
      return false;
    }
  }

  private requireTarget(): CalibrationTarget {
    if (!this.target) {
      throw new InvalidRequestError("No cover selected for calibration");
    }
    return this.target;
  }

  private finish(): void {
    this.timer?.cancel();
    this.timer = null;
    this.target?.endCalibration();
    this.logger.info(`Calibration ${this.id} finished: ${this.state.phase}`);
    this.options.onFinished?.(this);
  }
}
