import { describe, expect, test } from "vitest";
import {
  CalibrationStore,
  MemoryStorage,
  calibrationKey,
  resolveTravelTimes,
} from "../calibration-store.ts";
import { InvalidRequestError } from "../errors.ts";
import { createSilentLogger } from "../logger.ts";

function createStore() {
  const storage = new MemoryStorage();
  return { storage, store: new CalibrationStore(storage, createSilentLogger()) };
}

describe("calibration keys", () => {
  test("keys each direction by cover id", () => {
    expect(calibrationKey("bedroom", "open")).toBe("bedroom_open");
    expect(calibrationKey("bedroom", "close")).toBe("bedroom_close");
    expect(calibrationKey("bedroom")).toBe("bedroom");
  });
});

describe("resolveTravelTimes", () => {
  test("falls back to defaults when nothing is stored", () => {
    expect(resolveTravelTimes({})).toEqual({
      openTime: 30,
      closeTime: 25,
      openCalibrated: false,
      closeCalibrated: false,
    });
  });

  test("derives both directions from a single legacy value", () => {
    expect(resolveTravelTimes({ legacy: 40 })).toEqual({
      openTime: 40,
      closeTime: 34,
      openCalibrated: false,
      closeCalibrated: false,
    });
  });

  test("ignores the legacy value once any direction is calibrated", () => {
    expect(resolveTravelTimes({ open: 20, legacy: 40 })).toEqual({
      openTime: 20,
      closeTime: 25,
      openCalibrated: true,
      closeCalibrated: false,
    });
  });
});

describe("CalibrationStore", () => {
  test("saves only the directions that were measured", async () => {
    const { storage, store } = createStore();

    await store.save("office", { close: 18.5 });

    expect(await storage.getItem("office_close")).toBe(18.5);
    expect(await storage.getItem("office_open")).toBeUndefined();
    expect(await store.load("office")).toEqual({ close: 18.5 });
  });

  test("loads the legacy key alongside per-direction keys", async () => {
    const { storage, store } = createStore();
    await storage.setItem("office", 36);

    expect(await store.load("office")).toEqual({ legacy: 36 });
  });

  test("ignores stored values that are not positive numbers", async () => {
    const { storage, store } = createStore();
    await storage.setItem("office_open", "fast");
    await storage.setItem("office_close", -4);

    expect(await store.load("office")).toEqual({});
  });

  test("rejects non-positive measurements", async () => {
    const { store } = createStore();

    await expect(store.save("office", { open: 0 })).rejects.toBeInstanceOf(
      InvalidRequestError
    );
  });

  test("holds manual entries to the allowed range", async () => {
    const { store } = createStore();

    await expect(
      store.setManual("office", { open: 4 })
    ).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(
      store.setManual("office", { close: 301 })
    ).rejects.toBeInstanceOf(InvalidRequestError);

    await store.setManual("office", { open: 5, close: 300 });
    expect(await store.load("office")).toEqual({ open: 5, close: 300 });
  });
});
