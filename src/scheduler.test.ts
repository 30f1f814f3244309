import { describe, it, expect, beforeEach, vi } from "vitest";
import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { createMockLogger } from "./test-utils/fixtures";
import { createDigestScheduler } from "./scheduler";

vi.mock("node-cron");

describe("createDigestScheduler", () => {
  let tick: (() => Promise<void>) | undefined;
  let taskStop: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.clearAllMocks();
    tick = undefined;
    taskStop = vi.fn();

    vi.mocked(cron.schedule).mockImplementation((_expression, func) => {
      if (typeof func === "function") {
        tick = async () => {
          await func(new Date());
        };
      }
      return { stop: taskStop } as unknown as ScheduledTask;
    });
  });

  it("should register the cron expression", () => {
    createDigestScheduler("0 7 * * *", vi.fn(), createMockLogger());

    expect(vi.mocked(cron.schedule)).toHaveBeenCalledWith("0 7 * * *", expect.any(Function));
  });

  it("should run the digest on each tick", async () => {
    const runOnce = vi.fn().mockResolvedValue(undefined);
    const logger = createMockLogger();
    createDigestScheduler("0 7 * * *", runOnce, logger);

    await tick?.();
    await tick?.();

    expect(runOnce).toHaveBeenCalledTimes(2);
    expect(logger.info).toHaveBeenCalledWith("digest run complete");
  });

  it("should log a failed run and keep scheduling", async () => {
    const runOnce = vi
      .fn()
      .mockRejectedValueOnce(new Error("arxiv request failed: timeout"))
      .mockResolvedValueOnce(undefined);
    const logger = createMockLogger();
    createDigestScheduler("0 7 * * *", runOnce, logger);

    await tick?.();
    await tick?.();

    expect(logger.error).toHaveBeenCalledWith(
      { error: "arxiv request failed: timeout", errorName: "Error" },
      "digest run failed",
    );
    expect(runOnce).toHaveBeenCalledTimes(2);
  });

  it("should skip a tick while the previous run is still in flight", async () => {
    let finish: () => void = () => {};
    const runOnce = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    );
    const logger = createMockLogger();
    createDigestScheduler("0 7 * * *", runOnce, logger);

    const first = tick?.();
    await tick?.();
    finish();
    await first;

    expect(runOnce).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "previous digest run still in progress, skipping tick",
    );
  });

  it("should report idle only once the in-flight run finishes", async () => {
    let finish: () => void = () => {};
    const runOnce = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    );
    const scheduler = createDigestScheduler("0 7 * * *", runOnce, createMockLogger());
    await expect(scheduler.whenIdle()).resolves.toBeUndefined();

    const first = tick?.();
    let idle = false;
    const waiting = scheduler.whenIdle().then(() => {
      idle = true;
    });
    await Promise.resolve();
    expect(idle).toBe(false);

    finish();
    await first;
    await waiting;
    expect(idle).toBe(true);
  });

  it("should stop the cron task", () => {
    const scheduler = createDigestScheduler("0 7 * * *", vi.fn(), createMockLogger());

    scheduler.stop();

    expect(taskStop).toHaveBeenCalledTimes(1);
  });
});
