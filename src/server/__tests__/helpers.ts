import type { CoverCapability } from "../cover-backend.ts";
import type { CoverCommand } from "../errors.ts";
import { CalibrationStore, MemoryStorage } from "../calibration-store.ts";
import { CoverController } from "../cover-controller.ts";
import { createSilentLogger } from "../logger.ts";

export type FakeCapability = {
  capability: CoverCapability;
  calls: CoverCommand[];
  failNext: (command: CoverCommand) => void;
};

export function createFakeCapability(): FakeCapability {
  const calls: CoverCommand[] = [];
  const failing = new Set<CoverCommand>();
  const run = async (command: CoverCommand) => {
    calls.push(command);
    if (failing.delete(command)) {
      throw new Error(`${command} rejected`);
    }
  };
  return {
    capability: {
      moveOpen: () => run("open"),
      moveClose: () => run("close"),
      stop: () => run("stop"),
    },
    calls,
    failNext: (command) => {
      failing.add(command);
    },
  };
}

export async function createController(
  travel: { open?: number; close?: number } = {},
  requestRefresh?: () => void
) {
  const logger = createSilentLogger();
  const store = new CalibrationStore(new MemoryStorage(), logger);
  await store.save("cover-1", travel);
  const fake = createFakeCapability();
  const controller = new CoverController({
    id: "cover-1",
    name: "Test Cover",
    capability: fake.capability,
    store,
    logger,
    requestRefresh,
  });
  await controller.reloadCalibration();
  return { controller, store, logger, ...fake };
}

// lets chained promise callbacks run without moving fake time
export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 20; i++) {
    await Promise.resolve();
  }
}
