import * as config from "./config.ts";
import { type Logger } from "./logger.ts";
import { InvalidRequestError } from "./errors.ts";
import type { CoverDirection } from "../shared/cover-state.ts";

/**
 * The subset of node-persist's LocalStorage the calibration store needs.
 */
export interface KeyValueStorage {
  getItem(key: string): Promise<unknown>;
  setItem(key: string, value: unknown): Promise<unknown>;
}

// travel seconds per direction; a missing direction is uncalibrated
export type CalibrationResults = Partial<Record<CoverDirection, number>>;

export type CalibrationRecord = CalibrationResults & {
  legacy?: number;
};

export type TravelTimes = {
  openTime: number;
  closeTime: number;
  openCalibrated: boolean;
  closeCalibrated: boolean;
};

export function calibrationKey(
  coverId: string,
  direction?: CoverDirection
): string {
  return direction ? `${coverId}_${direction}` : coverId;
}

function travelSeconds(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) && value > 0
    ? value
    : undefined;
}

export function resolveTravelTimes(record: CalibrationRecord): TravelTimes {
  const times: TravelTimes = {
    openTime: record.open ?? config.DEFAULT_OPEN_TIME,
    closeTime: record.close ?? config.DEFAULT_CLOSE_TIME,
    openCalibrated: record.open !== undefined,
    closeCalibrated: record.close !== undefined,
  };
  if (
    !times.openCalibrated &&
    !times.closeCalibrated &&
    record.legacy !== undefined
  ) {
    times.openTime = record.legacy;
    times.closeTime = record.legacy * config.LEGACY_CLOSE_FACTOR;
  }
  return times;
}

export function travelTimeFor(
  times: TravelTimes,
  direction: CoverDirection
): number {
  return direction === "open" ? times.openTime : times.closeTime;
}

export function isCalibrated(
  times: TravelTimes,
  direction: CoverDirection
): boolean {
  return direction === "open" ? times.openCalibrated : times.closeCalibrated;
}

export class CalibrationStore {
  private storage: KeyValueStorage;
  private logger: Logger;

  constructor(storage: KeyValueStorage, logger: Logger) {
    this.storage = storage;
    this.logger = logger;
  }

  async load(coverId: string): Promise<CalibrationRecord> {
    const [open, close, legacy] = await Promise.all([
      this.storage.getItem(calibrationKey(coverId, "open")),
      this.storage.getItem(calibrationKey(coverId, "close")),
      this.storage.getItem(calibrationKey(coverId)),
    ]);
    const record: CalibrationRecord = {};
    const openTime = travelSeconds(open);
    const closeTime = travelSeconds(close);
    const legacyTime = travelSeconds(legacy);
    if (openTime !== undefined) {
      record.open = openTime;
    }
    if (closeTime !== undefined) {
      record.close = closeTime;
    }
    if (legacyTime !== undefined) {
      record.legacy = legacyTime;
    }
    return record;
  }

  async save(coverId: string, results: CalibrationResults): Promise<void> {
    for (const direction of ["open", "close"] as const) {
      const seconds = results[direction];
      if (seconds === undefined) {
        continue;
      }
      if (travelSeconds(seconds) === undefined) {
        throw new InvalidRequestError(
          `Travel time for ${coverId} (${direction}) must be a positive number of seconds`
        );
      }
      await this.storage.setItem(calibrationKey(coverId, direction), seconds);
      this.logger.info(
        `Saved ${direction} travel time for ${coverId}: ${seconds.toFixed(1)}s`
      );
    }
  }

  /**
   * Stores hand-entered travel times. Unlike measured values these are held
   * to the manual entry range.
   */
  async setManual(coverId: string, results: CalibrationResults): Promise<void> {
    for (const direction of ["open", "close"] as const) {
      const seconds = results[direction];
      if (
        seconds !== undefined &&
        (seconds < config.MIN_MANUAL_TRAVEL_TIME ||
          seconds > config.MAX_MANUAL_TRAVEL_TIME)
      ) {
        throw new InvalidRequestError(
          `Travel time must be between ${config.MIN_MANUAL_TRAVEL_TIME} and ${config.MAX_MANUAL_TRAVEL_TIME} seconds`
        );
      }
    }
    await this.save(coverId, results);
  }
}

export class MemoryStorage implements KeyValueStorage {
  private items = new Map<string, unknown>();

  async getItem(key: string): Promise<unknown> {
    return this.items.get(key);
  }

  async setItem(key: string, value: unknown): Promise<void> {
    this.items.set(key, value);
  }
}
