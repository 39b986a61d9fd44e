import { type Logger } from "./logger.ts";
import type { CoverBackend, CoverSnapshot } from "./cover-backend.ts";
import { type CalibrationStore } from "./calibration-store.ts";
import { CoverController } from "./cover-controller.ts";
import { NotFoundError } from "./errors.ts";

export type CoverRegistryOptions = {
  backend: CoverBackend;
  store: CalibrationStore;
  logger: Logger;
  requestRefresh?: () => void;
};

/**
 * Owns one controller per cover the backend reports.
 */
export class CoverRegistry {
  private controllers: Map<string, CoverController>;
  private options: CoverRegistryOptions;

  constructor(options: CoverRegistryOptions) {
    this.options = options;
    this.controllers = new Map();
  }

  async load(): Promise<void> {
    const covers = await this.options.backend.listCovers();
    for (const cover of covers) {
      if (this.controllers.has(cover.id)) {
        continue;
      }
      const controller = new CoverController({
        id: cover.id,
        name: cover.name,
        capability: this.options.backend.capability(cover.id),
        store: this.options.store,
        logger: this.options.logger,
        requestRefresh: () => this.options.requestRefresh?.(),
      });
      await controller.reloadCalibration();
      this.controllers.set(cover.id, controller);
    }
    this.options.logger.info(`Managing ${this.controllers.size} covers`);
  }

  get(coverId: string): CoverController {
    const controller = this.controllers.get(coverId);
    if (!controller) {
      throw new NotFoundError(`Unknown cover ${coverId}`);
    }
    return controller;
  }

  list(): CoverController[] {
    return [...this.controllers.values()];
  }

  applySnapshots(snapshots: CoverSnapshot[]): void {
    for (const snapshot of snapshots) {
      const controller = this.controllers.get(snapshot.coverId);
      if (controller) {
        controller.applySnapshot(snapshot);
      } else {
        this.options.logger.debug(
          `Snapshot for unmanaged cover ${snapshot.coverId}`
        );
      }
    }
  }

  markUnavailable(): void {
    for (const controller of this.controllers.values()) {
      controller.setAvailable(false);
    }
  }

  dispose(): void {
    for (const controller of this.controllers.values()) {
      controller.dispose();
    }
    this.controllers.clear();
  }
}
