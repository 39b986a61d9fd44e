import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  homingDelayMs,
  type WizardContext,
  type WizardRequest,
  type WizardState,
  transition,
} from "../calibration-wizard.ts";
import { CalibrationService } from "../calibration-service.ts";
import { CalibrationStore, MemoryStorage } from "../calibration-store.ts";
import { CoverController } from "../cover-controller.ts";
import { SimulatedCoverBackend } from "../simulated-backend.ts";
import { createSilentLogger } from "../logger.ts";
import { CalibrationInProgressError, InvalidRequestError } from "../errors.ts";
import { createController, flushPromises } from "./helpers.ts";

const context: WizardContext = {
  coverId: "cover-1",
  coverName: "Test Cover",
  travel: {
    openTime: 30,
    closeTime: 25,
    openCalibrated: false,
    closeCalibrated: false,
  },
  settleMs: 1000,
};

const measuring = {
  context,
  plan: ["open" as const, "close" as const],
  results: {},
  warnings: [],
};

describe("transition", () => {
  test("selecting a cover moves on to choosing a direction", () => {
    expect(
      transition({ phase: "select-cover" }, { type: "select-cover", context })
    ).toEqual({
      state: { phase: "select-direction", context },
      effects: [],
    });
  });

  test("refuses to recalibrate a calibrated direction without force", () => {
    const calibrated = {
      ...context,
      travel: { ...context.travel, openCalibrated: true },
    };
    const state: WizardState = {
      phase: "select-direction",
      context: calibrated,
    };

    expect(
      transition(state, { type: "select-direction", direction: "open" }).state
    ).toEqual({ ...state, error: "already-calibrated" });
    expect(
      transition(state, {
        type: "select-direction",
        direction: "open",
        force: true,
      }).state
    ).toEqual({
      phase: "instructions",
      context: calibrated,
      plan: ["open"],
      results: {},
      warnings: [],
    });
  });

  test("homes to the opposite end before measuring", () => {
    const step = transition(
      { phase: "instructions", ...measuring },
      { type: "begin" }
    );

    expect(step.state).toMatchObject({ phase: "moving", direction: "open" });
    expect(step.effects).toEqual([
      { type: "command", command: "close" },
      { type: "schedule-homed", delayMs: 121000 },
    ]);
  });

  test("waits at least the homing floor for an uncalibrated cover", () => {
    expect(homingDelayMs(context, "close")).toBe(121000);
    expect(homingDelayMs(context, "open")).toBe(121000);
  });

  test("waits longer than the travel time of a slow calibrated cover", () => {
    expect(
      homingDelayMs(
        { ...context, travel: { ...context.travel, closeTime: 100 } },
        "close"
      )
    ).toBe(151000);
  });

  test("starts the clock once the cover is homed", () => {
    const step = transition(
      { phase: "moving", direction: "open", ...measuring },
      { type: "homed", at: 5000 }
    );

    expect(step.state).toMatchObject({
      phase: "awaiting-stop",
      direction: "open",
      startedAt: 5000,
    });
    expect(step.effects).toEqual([{ type: "command", command: "open" }]);
  });

  test("records a measurement and moves on to the next direction", () => {
    const step = transition(
      {
        phase: "awaiting-stop",
        direction: "open",
        startedAt: 5000,
        ...measuring,
      },
      { type: "stop-confirmed", at: 35000 }
    );

    expect(step.state).toMatchObject({
      phase: "moving",
      direction: "close",
      plan: ["close"],
      results: { open: 30 },
    });
    expect(step.effects).toEqual([
      { type: "cancel-timer" },
      { type: "command", command: "stop" },
      { type: "command", command: "open" },
      { type: "schedule-homed", delayMs: 121000 },
    ]);
  });

  test("completes after the last direction", () => {
    const step = transition(
      {
        phase: "awaiting-stop",
        direction: "close",
        startedAt: 0,
        ...measuring,
        plan: ["close"],
        results: { open: 30 },
      },
      { type: "stop-confirmed", at: 22500 }
    );

    expect(step.state).toEqual({
      phase: "complete",
      context,
      results: { open: 30, close: 22.5 },
      warnings: [],
    });
  });

  test("rejects implausibly short measurements", () => {
    const step = transition(
      {
        phase: "awaiting-stop",
        direction: "open",
        startedAt: 5000,
        ...measuring,
      },
      { type: "stop-confirmed", at: 6500 }
    );

    expect(step.state).toEqual({
      phase: "instructions",
      ...measuring,
      error: "measurement-out-of-range",
    });
    expect(step.effects).toEqual([
      { type: "cancel-timer" },
      { type: "command", command: "stop" },
    ]);
  });

  test("warns about measurements outside the usual range", () => {
    const step = transition(
      {
        phase: "awaiting-stop",
        direction: "open",
        startedAt: 0,
        ...measuring,
        plan: ["open"],
      },
      { type: "stop-confirmed", at: 4000 }
    );

    expect(step.state).toMatchObject({
      phase: "complete",
      results: { open: 4 },
      warnings: ["open travel time of 4.0s is unusually short"],
    });
  });

  test("stops the cover when cancelled mid-movement", () => {
    expect(
      transition(
        { phase: "moving", direction: "open", ...measuring },
        { type: "cancel" }
      )
    ).toEqual({
      state: { phase: "cancelled", context },
      effects: [
        { type: "cancel-timer" },
        { type: "command", command: "stop" },
      ],
    });
  });

  test("offers only the missing direction after a partial run", () => {
    const step = transition(
      { phase: "complete", context, results: { open: 30 }, warnings: [] },
      { type: "calibrate-other" }
    );

    expect(step.state).toMatchObject({
      phase: "instructions",
      plan: ["close"],
      results: { open: 30 },
    });
  });

  test("saving persists the results", () => {
    expect(
      transition(
        { phase: "complete", context, results: { close: 20 }, warnings: [] },
        { type: "save" }
      ).effects
    ).toEqual([
      { type: "persist", coverId: "cover-1", results: { close: 20 } },
    ]);
  });

  test("finished runs accept no further input", () => {
    expect(() =>
      transition({ phase: "discarded", context }, { type: "save" })
    ).toThrow(InvalidRequestError);
    expect(() =>
      transition({ phase: "select-cover" }, { type: "begin" })
    ).toThrow("Cannot handle 'begin' while calibration is in 'select-cover'");
  });
});

describe("CalibrationService", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-01T08:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  async function setup() {
    const cover = await createController();
    const service = new CalibrationService({
      store: cover.store,
      logger: cover.logger,
      resolveTarget: () => cover.controller,
      settleMs: 1000,
    });
    return { ...cover, service };
  }

  test("measures both directions and saves them", async () => {
    const { controller, store, service, calls } = await setup();
    const wizard = await service.start("cover-1");
    const phases: string[] = [];
    const send = async (request: WizardRequest) => {
      phases.push((await service.send(wizard.id, request)).phase);
    };

    expect(controller.getState().calibration.inProgress).toBe(true);
    await send({ type: "select-direction", direction: "both" });
    await send({ type: "begin" });
    expect(calls).toEqual(["close"]);

    await vi.advanceTimersByTimeAsync(121000);
    await flushPromises();
    expect(wizard.getState().phase).toBe("awaiting-stop");

    vi.advanceTimersByTime(30000);
    await send({ type: "stop-confirmed" });

    await vi.advanceTimersByTimeAsync(121000);
    await flushPromises();
    vi.advanceTimersByTime(20000);
    await send({ type: "stop-confirmed" });
    await send({ type: "save" });

    expect(phases).toEqual([
      "instructions",
      "moving",
      "moving",
      "complete",
      "saved",
    ]);
    expect(calls).toEqual(["close", "open", "stop", "open", "close", "stop"]);
    expect(await store.load("cover-1")).toEqual({ open: 30, close: 20 });
    expect(controller.getState().calibration).toMatchObject({
      openTime: 30,
      closeTime: 20,
      fullyCalibrated: true,
      inProgress: false,
    });
  });

  test("homes a cover slower than the default travel times", async () => {
    const logger = createSilentLogger();
    const store = new CalibrationStore(new MemoryStorage(), logger);
    const backend = new SimulatedCoverBackend(
      [
        {
          id: "office",
          name: "Office",
          openTime: 41,
          closeTime: 35,
          initialPosition: 100,
        },
      ],
      logger
    );
    const controller = new CoverController({
      id: "office",
      name: "Office",
      capability: backend.capability("office"),
      store,
      logger,
    });
    await controller.reloadCalibration();
    const service = new CalibrationService({
      store,
      logger,
      resolveTarget: () => controller,
      settleMs: 1000,
    });

    const wizard = await service.start("office");
    await service.send(wizard.id, {
      type: "select-direction",
      direction: "open",
    });
    await service.send(wizard.id, { type: "begin" });

    await vi.advanceTimersByTimeAsync(121000);
    await flushPromises();
    expect(wizard.getState().phase).toBe("awaiting-stop");
    expect(backend.position("office")).toBe(0);

    vi.advanceTimersByTime(41000);
    await service.send(wizard.id, { type: "stop-confirmed" });
    await service.send(wizard.id, { type: "save" });

    expect(await store.load("office")).toEqual({ open: 41 });
    backend.dispose();
  });

  test("cancelling stops the cover and releases it", async () => {
    const { controller, service, calls } = await setup();
    const wizard = await service.start("cover-1");
    await service.send(wizard.id, {
      type: "select-direction",
      direction: "open",
    });
    await service.send(wizard.id, { type: "begin" });

    expect((await service.cancel(wizard.id)).phase).toBe("cancelled");
    await vi.advanceTimersByTimeAsync(60000);

    expect(calls).toEqual(["close", "stop"]);
    expect(wizard.getState().phase).toBe("cancelled");
    expect(controller.getState().calibration.inProgress).toBe(false);
  });

  test("returns to the instructions when a measurement is too short", async () => {
    const { store, service, calls } = await setup();
    const wizard = await service.start("cover-1");
    await service.send(wizard.id, {
      type: "select-direction",
      direction: "open",
    });
    await service.send(wizard.id, { type: "begin" });
    await vi.advanceTimersByTimeAsync(121000);
    await flushPromises();

    vi.advanceTimersByTime(1000);
    const state = await service.send(wizard.id, { type: "stop-confirmed" });

    expect(state).toMatchObject({
      phase: "instructions",
      error: "measurement-out-of-range",
    });
    expect(calls).toEqual(["close", "open", "stop"]);
    expect(await store.load("cover-1")).toEqual({});
  });

  test("a failed motor command returns to the instructions", async () => {
    const { service, calls, failNext } = await setup();
    const wizard = await service.start("cover-1");
    await service.send(wizard.id, {
      type: "select-direction",
      direction: "close",
    });
    failNext("open");

    const state = await service.send(wizard.id, { type: "begin" });

    expect(state).toMatchObject({
      phase: "instructions",
      error: "command-failed",
    });
    expect(calls).toEqual(["open", "stop"]);
  });

  test("allows one unfinished run per cover", async () => {
    const { service } = await setup();
    const first = await service.start("cover-1");

    await expect(service.start("cover-1")).rejects.toBeInstanceOf(
      CalibrationInProgressError
    );
    expect(service.list()).toEqual([first]);

    await service.cancel(first.id);
    const second = await service.start("cover-1");
    expect(second.getState().phase).toBe("select-direction");
    expect(service.list()).toEqual([second]);
  });
});
