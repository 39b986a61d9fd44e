import * as config from "./config.ts";
import { type Logger } from "./logger.ts";
import type { CoverBackend, CoverSnapshot } from "./cover-backend.ts";
import {
  type ScheduledTask,
  scheduleAfter,
  scheduleEvery,
} from "./scheduled-task.ts";

export type SnapshotPollerOptions = {
  backend: CoverBackend;
  logger: Logger;
  onSnapshots: (snapshots: CoverSnapshot[]) => void;
  onError: (err: unknown) => void;
  intervalMs?: number;
  refreshDelayMs?: number;
};

export class SnapshotPoller {
  private options: SnapshotPollerOptions;
  private poller: ScheduledTask | null;
  private refresh: ScheduledTask | null;
  private polling: Promise<void> | null;

  constructor(options: SnapshotPollerOptions) {
    this.options = options;
    this.poller = null;
    this.refresh = null;
    this.polling = null;
  }

  start(): void {
    if (this.poller) {
      return;
    }
    this.poller = scheduleEvery(
      this.options.intervalMs ?? config.POLL_INTERVAL_MS,
      () => {
        void this.poll();
      }
    );
  }

  stop(): void {
    this.poller?.cancel();
    this.poller = null;
    this.refresh?.cancel();
    this.refresh = null;
  }

  /**
   * Polls once more shortly, coalescing requests made before it runs.
   */
  requestRefresh(): void {
    if (this.refresh?.active) {
      return;
    }
    this.refresh = scheduleAfter(
      this.options.refreshDelayMs ?? config.REFRESH_DELAY_MS,
      () => {
        this.refresh = null;
        void this.poll();
      }
    );
  }

  // Overlapping calls share the poll already in flight
  poll(): Promise<void> {
    if (!this.polling) {
      this.polling = this.fetch().finally(() => {
        this.polling = null;
      });
    }
    return this.polling;
  }

  private async fetch(): Promise<void> {
    try {
      const snapshots = await this.options.backend.fetchSnapshots();
      this.options.logger.debug(`Received ${snapshots.length} cover snapshots`);
      this.options.onSnapshots(snapshots);
    } catch (err) {
      this.options.logger.error(
        `Failed to fetch cover status: ${
          err instanceof Error ? err.message : String(err)
        }`
      );
      this.options.onError(err);
    }
  }
}
