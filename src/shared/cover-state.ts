export const COVER_CLOSING = 0;
export const COVER_OPENING = 1;
export const COVER_STOPPED = 2;

export type PositionState =
  | typeof COVER_CLOSING
  | typeof COVER_OPENING
  | typeof COVER_STOPPED;

export type CoverDirection = "open" | "close";

export type CoverCalibrationStatus = {
  openTime: number; // seconds
  closeTime: number; // seconds
  openCalibrated: boolean;
  closeCalibrated: boolean;
  fullyCalibrated: boolean;
  calibrationNeeded: boolean;
  inProgress: boolean;
};

export type CoverState = {
  id: string;
  name: string;
  // null while the position is unknown
  currentPosition: number | null;
  closed: boolean | null;
  opening: boolean;
  closing: boolean;
  available: boolean;
  positionState: PositionState;
  calibration: CoverCalibrationStatus;
};

export function toPositionState(state: {
  opening: boolean;
  closing: boolean;
}): PositionState {
  if (state.opening) {
    return COVER_OPENING;
  }
  if (state.closing) {
    return COVER_CLOSING;
  }
  return COVER_STOPPED;
}
