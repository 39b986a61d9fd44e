import * as config from "./config.ts";
import { type Logger } from "./logger.ts";
import type {
  CoverBackend,
  CoverCapability,
  CoverDescriptor,
  CoverSnapshot,
} from "./cover-backend.ts";
import { type ScheduledTask, scheduleEvery } from "./scheduled-task.ts";
import { NotFoundError, type CoverCommand } from "./errors.ts";

export type SimulatedCoverDefinition = CoverDescriptor & {
  openTime: number; // seconds for a full traversal
  closeTime: number;
  initialPosition?: number;
};

type Motion = "opening" | "closing" | "stopped";

class SimulatedMotor {
  readonly definition: SimulatedCoverDefinition;
  position: number;
  motion: Motion;
  private lastUpdate: number;
  private ticker: ScheduledTask | null;

  constructor(definition: SimulatedCoverDefinition) {
    this.definition = definition;
    this.position = definition.initialPosition ?? 0;
    this.motion = "stopped";
    this.lastUpdate = Date.now();
    this.ticker = null;
  }

  drive(motion: Motion): void {
    this.advance();
    this.motion = motion;
    if (motion === "stopped") {
      this.halt();
    } else if (!this.ticker) {
      this.ticker = scheduleEvery(config.SIMULATION_TICK_MS, () =>
        this.advance()
      );
    }
  }

  // Moves the simulated cover along by the time since the last update,
  // stopping at either end as a real motor's limit switch would
  advance(): void {
    const now = Date.now();
    const elapsedSeconds = (now - this.lastUpdate) / 1000;
    this.lastUpdate = now;
    if (this.motion === "opening") {
      this.position = Math.min(
        100,
        this.position + (elapsedSeconds / this.definition.openTime) * 100
      );
      if (this.position >= 100) {
        this.halt();
      }
    } else if (this.motion === "closing") {
      this.position = Math.max(
        0,
        this.position - (elapsedSeconds / this.definition.closeTime) * 100
      );
      if (this.position <= 0) {
        this.halt();
      }
    }
  }

  dispose(): void {
    this.halt();
  }

  private halt(): void {
    this.motion = "stopped";
    this.ticker?.cancel();
    this.ticker = null;
  }
}

/**
 * In-process stand-in for the vendor service: motors with fixed travel times
 * whose reported position is as coarse as the real feed's.
 */
export class SimulatedCoverBackend implements CoverBackend {
  private motors: Map<string, SimulatedMotor>;
  private failures: Map<string, Set<CoverCommand>>;
  private logger: Logger;

  constructor(definitions: SimulatedCoverDefinition[], logger: Logger) {
    this.logger = logger;
    this.motors = new Map(
      definitions.map((definition) => [
        definition.id,
        new SimulatedMotor(definition),
      ])
    );
    this.failures = new Map();
  }

  async listCovers(): Promise<CoverDescriptor[]> {
    return [...this.motors.values()].map(({ definition }) => ({
      id: definition.id,
      name: definition.name,
    }));
  }

  async fetchSnapshots(): Promise<CoverSnapshot[]> {
    return [...this.motors.values()].map((motor) => {
      motor.advance();
      return {
        coverId: motor.definition.id,
        positionPercent:
          Math.round(motor.position / config.SIMULATION_POSITION_STEP) *
          config.SIMULATION_POSITION_STEP,
        isMoving: motor.motion !== "stopped",
      };
    });
  }

  capability(coverId: string): CoverCapability {
    const motor = this.motor(coverId);
    const run = async (command: CoverCommand, motion: Motion) => {
      const failing = this.failures.get(coverId);
      if (failing?.delete(command)) {
        throw new Error(`Simulated ${command} failure`);
      }
      this.logger.debug(`Simulated cover ${coverId}: ${command}`);
      motor.drive(motion);
    };
    return {
      moveOpen: () => run("open", "opening"),
      moveClose: () => run("close", "closing"),
      stop: () => run("stop", "stopped"),
    };
  }

  /**
   * Makes the next `command` sent to the cover fail.
   */
  failNext(coverId: string, command: CoverCommand): void {
    this.motor(coverId);
    const failing = this.failures.get(coverId) ?? new Set<CoverCommand>();
    failing.add(command);
    this.failures.set(coverId, failing);
  }

  position(coverId: string): number {
    const motor = this.motor(coverId);
    motor.advance();
    return motor.position;
  }

  dispose(): void {
    for (const motor of this.motors.values()) {
      motor.dispose();
    }
  }

  private motor(coverId: string): SimulatedMotor {
    const motor = this.motors.get(coverId);
    if (!motor) {
      throw new NotFoundError(`Unknown cover ${coverId}`);
    }
    return motor;
  }
}
