import { describe, it, expect, beforeEach, vi } from "vitest";
import type { Logger } from "../src/types.js";

const { scheduleMock } = vi.hoisted(() => ({ scheduleMock: vi.fn() }));

vi.mock("node-cron", () => ({
  default: { schedule: scheduleMock, validate: () => true },
}));

const { startScheduler } = await import("../src/scheduler.js");

function logger(): Logger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function scheduledTick(): () => void {
  const [, callback] = scheduleMock.mock.calls[0];
  return callback;
}

describe("startScheduler", () => {
  beforeEach(() => {
    scheduleMock.mockReset();
    scheduleMock.mockReturnValue({ stop: vi.fn() });
  });

  it("runs immediately and registers the cron expression", async () => {
    const run = vi.fn(async () => {});
    startScheduler(run, "*/5 * * * *", logger());

    await vi.waitFor(() => expect(run).toHaveBeenCalledTimes(1));
    expect(scheduleMock).toHaveBeenCalledWith("*/5 * * * *", expect.any(Function));

    scheduledTick()();
    await vi.waitFor(() => expect(run).toHaveBeenCalledTimes(2));
  });

  it("skips a tick while the previous run is still going", async () => {
    let finish: () => void = () => {};
    const run = vi.fn(
      () => new Promise<void>((resolve) => {
        finish = resolve;
      }),
    );
    const log = logger();
    startScheduler(run, "* * * * *", log);

    scheduledTick()();
    expect(run).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledTimes(1);

    finish();
    await vi.waitFor(() => {
      scheduledTick()();
      expect(run).toHaveBeenCalledTimes(2);
    });
  });

  it("logs a failed run instead of throwing", async () => {
    const run = vi.fn(async () => {
      throw new Error("all tickers failed");
    });
    const log = logger();
    startScheduler(run, "* * * * *", log);

    await vi.waitFor(() => expect(log.error).toHaveBeenCalledTimes(1));
    expect(vi.mocked(log.error).mock.calls[0][0]).toMatch(/Check failed: all tickers failed$/);
  });
});
