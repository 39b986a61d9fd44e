import type { CoverDirection } from "../shared/cover-state.ts";

export type CoverCommand = CoverDirection | "stop";

export class CoverCommandError extends Error {
  readonly coverId: string;
  readonly command: CoverCommand;

  constructor(coverId: string, command: CoverCommand, cause: unknown) {
    super(
      `Command '${command}' failed for cover ${coverId}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
    this.name = "CoverCommandError";
    this.coverId = coverId;
    this.command = command;
  }
}

export class CoverBusyError extends Error {
  constructor(coverId: string) {
    super(`Cover ${coverId} is being calibrated`);
    this.name = "CoverBusyError";
  }
}

export class CalibrationInProgressError extends Error {
  readonly runId: string;

  constructor(coverId: string, runId: string) {
    super(`Cover ${coverId} already has a calibration run in progress (${runId})`);
    this.name = "CalibrationInProgressError";
    this.runId = runId;
  }
}

export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}
