/**
 * Collaborator interfaces: the vendor transport that moves covers and the
 * polled status feed. The controller only ever sees these.
 */
export interface CoverCapability {
  moveOpen(): Promise<void>;
  moveClose(): Promise<void>;
  stop(): Promise<void>;
}

export type CoverSnapshot = {
  coverId: string;
  // absent or null when the service has no position for the cover
  positionPercent?: number | null;
  isMoving: boolean;
};

export type CoverDescriptor = {
  id: string;
  name: string;
};

export interface CoverBackend {
  listCovers(): Promise<CoverDescriptor[]>;
  fetchSnapshots(): Promise<CoverSnapshot[]>;
  capability(coverId: string): CoverCapability;
}
