import { v4 } from "uuid";
import { type Logger } from "./logger.ts";
import { type CalibrationStore } from "./calibration-store.ts";
import {
  CalibrationWizard,
  type CalibrationTarget,
  type WizardRequest,
  type WizardState,
} from "./calibration-wizard.ts";
import { CalibrationInProgressError, NotFoundError } from "./errors.ts";

export type CalibrationServiceOptions = {
  store: CalibrationStore;
  logger: Logger;
  resolveTarget: (coverId: string) => CalibrationTarget;
  settleMs?: number;
};

/**
 * Keeps calibration runs by id. A cover can only be driven by one unfinished
 * run at a time; finished runs stay readable until the next run starts.
 */
export class CalibrationService {
  private runs: Map<string, CalibrationWizard>;
  private options: CalibrationServiceOptions;

  constructor(options: CalibrationServiceOptions) {
    this.options = options;
    this.runs = new Map();
  }

  async start(coverId?: string): Promise<CalibrationWizard> {
    this.prune();
    const wizard = new CalibrationWizard({
      id: v4(),
      store: this.options.store,
      logger: this.options.logger,
      resolveTarget: this.options.resolveTarget,
      settleMs: this.options.settleMs,
    });
    this.runs.set(wizard.id, wizard);
    this.options.logger.info(`Calibration ${wizard.id} started`);

    if (coverId !== undefined) {
      try {
        await this.send(wizard.id, { type: "select-cover", coverId });
      } catch (err) {
        this.runs.delete(wizard.id);
        throw err;
      }
    }
    return wizard;
  }

  get(runId: string): CalibrationWizard {
    const wizard = this.runs.get(runId);
    if (!wizard) {
      throw new NotFoundError(`Unknown calibration run ${runId}`);
    }
    return wizard;
  }

  list(): CalibrationWizard[] {
    return [...this.runs.values()];
  }

  async send(runId: string, request: WizardRequest): Promise<WizardState> {
    const wizard = this.get(runId);
    if (request.type === "select-cover") {
      const active = this.activeRunFor(request.coverId);
      if (active && active !== wizard) {
        throw new CalibrationInProgressError(request.coverId, active.id);
      }
    }
    return wizard.send(request);
  }

  cancel(runId: string): Promise<WizardState> {
    return this.send(runId, { type: "cancel" });
  }

  async dispose(): Promise<void> {
    await Promise.all(
      this.list()
        .filter((wizard) => !wizard.isFinished())
        .map((wizard) =>
          wizard.send({ type: "cancel" }).catch((err: unknown) => {
            this.options.logger.error(
              `Failed to cancel calibration ${wizard.id}: ${
                err instanceof Error ? err.message : String(err)
              }`
            );
          })
        )
    );
  }

  private activeRunFor(coverId: string): CalibrationWizard | undefined {
    return this.list().find(
      (wizard) => wizard.coverId === coverId && !wizard.isFinished()
    );
  }

  private prune(): void {
    for (const [runId, wizard] of this.runs) {
      if (wizard.isFinished()) {
        this.runs.delete(runId);
      }
    }
  }
}
