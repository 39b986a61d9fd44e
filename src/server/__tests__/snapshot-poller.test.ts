import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { CoverBackend, CoverSnapshot } from "../cover-backend.ts";
import { SnapshotPoller } from "../snapshot-poller.ts";
import { createSilentLogger } from "../logger.ts";
import { createFakeCapability } from "./helpers.ts";

const snapshots: CoverSnapshot[] = [
  { coverId: "cover-1", positionPercent: 30, isMoving: false },
];

function setup() {
  const fetchSnapshots = vi.fn(async () => snapshots);
  const backend: CoverBackend = {
    listCovers: async () => [{ id: "cover-1", name: "Test Cover" }],
    fetchSnapshots,
    capability: () => createFakeCapability().capability,
  };
  const onSnapshots = vi.fn();
  const onError = vi.fn();
  const poller = new SnapshotPoller({
    backend,
    logger: createSilentLogger(),
    onSnapshots,
    onError,
    intervalMs: 60000,
    refreshDelayMs: 1000,
  });
  return { poller, fetchSnapshots, onSnapshots, onError };
}

describe("SnapshotPoller", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("polls on the configured interval", async () => {
    const { poller, fetchSnapshots, onSnapshots } = setup();
    poller.start();

    await vi.advanceTimersByTimeAsync(59999);
    expect(fetchSnapshots).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(fetchSnapshots).toHaveBeenCalledTimes(1);
    expect(onSnapshots).toHaveBeenCalledWith(snapshots);

    poller.stop();
    await vi.advanceTimersByTimeAsync(120000);
    expect(fetchSnapshots).toHaveBeenCalledTimes(1);
  });

  test("reports fetch failures", async () => {
    const { poller, fetchSnapshots, onSnapshots, onError } = setup();
    const failure = new Error("service unreachable");
    fetchSnapshots.mockRejectedValueOnce(failure);

    await poller.poll();

    expect(onError).toHaveBeenCalledWith(failure);
    expect(onSnapshots).not.toHaveBeenCalled();
  });

  test("coalesces refresh requests", async () => {
    const { poller, fetchSnapshots } = setup();

    poller.requestRefresh();
    await vi.advanceTimersByTimeAsync(500);
    poller.requestRefresh();
    await vi.advanceTimersByTimeAsync(500);

    expect(fetchSnapshots).toHaveBeenCalledTimes(1);
  });

  test("overlapping polls share one fetch", async () => {
    const { poller, fetchSnapshots } = setup();

    await Promise.all([poller.poll(), poller.poll()]);

    expect(fetchSnapshots).toHaveBeenCalledTimes(1);
  });
});
