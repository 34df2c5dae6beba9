import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync, readFileSync, existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { StateStore, alertKey } from "../src/state-store.js";
import { StateCorruptError, StateSaveError } from "../src/errors.js";

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;
const NOW = new Date("2025-06-10T12:00:00.000Z");

function ago(ms: number): Date {
  return new Date(NOW.getTime() - ms);
}

describe("StateStore — load", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "state-store-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns an empty store when the file does not exist", async () => {
    const store = await StateStore.load(join(dir, "missing.json"));
    expect(store.tickers()).toEqual([]);
    expect(store.isTriggered("BTC-USD:above:100.00")).toBe(false);
  });

  it("returns an empty store when the file is empty", async () => {
    const path = join(dir, "state.json");
    writeFileSync(path, "");
    const store = await StateStore.load(path);
    expect(store.tickers()).toEqual([]);
  });

  it("rejects unparsable JSON with StateCorruptError", async () => {
    const path = join(dir, "state.json");
    writeFileSync(path, "{ not json");
    await expect(StateStore.load(path)).rejects.toBeInstanceOf(StateCorruptError);
  });

  it("rejects a document with the wrong shape", async () => {
    const path = join(dir, "state.json");
    writeFileSync(path, JSON.stringify({ triggered_alerts: { "X:above:1.00": "yes" } }));
    await expect(StateStore.load(path)).rejects.toThrow(/unexpected shape at triggered_alerts\.X:above:1\.00/);
  });

  it("reads null history lists as empty", async () => {
    const path = join(dir, "state.json");
    writeFileSync(path, JSON.stringify({
      prices: { AAPL: { price: 190, timestamp: "2025-06-09T12:00:00Z" } },
      triggered_alerts: null,
      price_history: { AAPL: null },
    }));
    const store = await StateStore.load(path);
    expect(store.lastPrice("AAPL")?.price).toBe(190);
    expect(store.history("AAPL")).toEqual([]);
    expect(store.priceAt("AAPL", HOUR, NOW)).toBeUndefined();
  });

  it("round-trips prices, history and flags through save", async () => {
    const path = join(dir, "nested", "state.json");
    const store = new StateStore();
    store.recordPrice("AAPL", 190, ago(2 * HOUR));
    store.recordPrice("AAPL", 195, NOW);
    store.setTriggered("AAPL:above:190.00", true);
    await store.save(path);

    const reloaded = await StateStore.load(path);
    expect(reloaded.lastPrice("AAPL")).toEqual({ price: 195, timestamp: NOW });
    expect(reloaded.history("AAPL").map((r) => r.price)).toEqual([190, 195]);
    expect(reloaded.isTriggered("AAPL:above:190.00")).toBe(true);
    expect(existsSync(`${path}.${process.pid}.tmp`)).toBe(false);
  });

  it("keeps tickers and flags that were not touched in this run", async () => {
    const path = join(dir, "state.json");
    writeFileSync(path, JSON.stringify({
      prices: { OLD: { price: 5, timestamp: "2025-06-01T00:00:00.000Z" } },
      triggered_alerts: { "OLD:below:6.00": true },
      price_history: { OLD: [{ price: 5, timestamp: "2025-06-01T00:00:00.000Z" }] },
    }));

    const store = await StateStore.load(path);
    store.recordPrice("NEW", 10, NOW);
    await store.save(path);

    const doc = JSON.parse(readFileSync(path, "utf8"));
    expect(doc.prices.OLD).toEqual({ price: 5, timestamp: "2025-06-01T00:00:00.000Z" });
    expect(doc.triggered_alerts).toEqual({ "OLD:below:6.00": true });
    expect(doc.price_history.OLD).toHaveLength(1);
    expect(doc.prices.NEW).toEqual({ price: 10, timestamp: "2025-06-10T12:00:00.000Z" });
  });

  it("wraps write failures in StateSaveError", async () => {
    const blocker = join(dir, "file");
    writeFileSync(blocker, "x");
    const store = new StateStore();
    await expect(store.save(join(blocker, "state.json"))).rejects.toBeInstanceOf(StateSaveError);
  });
});

describe("StateStore — prices", () => {
  it("recordPrice sets the last price and appends to history", () => {
    const store = new StateStore();
    store.recordPrice("ETH-USD", 3000, ago(HOUR));
    store.recordPrice("ETH-USD", 3100, NOW);
    expect(store.lastPrice("ETH-USD")?.price).toBe(3100);
    expect(store.history("ETH-USD").map((r) => r.price)).toEqual([3000, 3100]);
  });

  it("prunes history older than the retention window", () => {
    const store = new StateStore();
    store.recordPrice("ETH-USD", 2500, ago(8 * DAY));
    store.recordPrice("ETH-USD", 2900, ago(6 * DAY));
    store.recordPrice("ETH-USD", 3100, NOW);
    expect(store.history("ETH-USD").map((r) => r.price)).toEqual([2900, 3100]);
  });

  it("keeps an entry exactly at the retention boundary", () => {
    const store = new StateStore({ retentionMs: DAY });
    store.recordPrice("X", 1, ago(DAY));
    store.recordPrice("X", 2, NOW);
    expect(store.history("X").map((r) => r.price)).toEqual([1, 2]);
  });

  it("priceAt falls back to the oldest remaining entry after pruning", () => {
    const store = new StateStore();
    store.recordPrice("BTC-USD", 80000, ago(8 * DAY));
    store.recordPrice("BTC-USD", 90000, NOW);
    expect(store.priceAt("BTC-USD", 10 * DAY, NOW)).toBe(90000);
  });

  it("priceAt returns the newest entry at or before the target time", () => {
    const store = new StateStore();
    store.recordPrice("AAPL", 100, ago(30 * HOUR));
    store.recordPrice("AAPL", 110, ago(24 * HOUR));
    store.recordPrice("AAPL", 120, ago(2 * HOUR));
    expect(store.priceAt("AAPL", 24 * HOUR, NOW)).toBe(110);
    expect(store.priceAt("AAPL", 3 * HOUR, NOW)).toBe(110);
    expect(store.priceAt("AAPL", HOUR, NOW)).toBe(120);
  });

  it("priceAt falls back to the oldest entry when all are newer than the target", () => {
    const store = new StateStore();
    store.recordPrice("AAPL", 100, ago(2 * HOUR));
    store.recordPrice("AAPL", 105, ago(HOUR));
    expect(store.priceAt("AAPL", 24 * HOUR, NOW)).toBe(100);
  });

  it("priceAt is undefined for a ticker with no history", () => {
    expect(new StateStore().priceAt("NONE", HOUR, NOW)).toBeUndefined();
  });
});

describe("StateStore — trigger flags", () => {
  it("defaults absent keys to false", () => {
    const store = new StateStore();
    expect(store.isTriggered("AAPL:above:200.00")).toBe(false);
  });

  it("sets and clears flags", () => {
    const store = new StateStore();
    store.setTriggered("AAPL:above:200.00", true);
    expect(store.isTriggered("AAPL:above:200.00")).toBe(true);
    expect(store.triggeredKeys()).toEqual(["AAPL:above:200.00"]);
    store.setTriggered("AAPL:above:200.00", false);
    expect(store.isTriggered("AAPL:above:200.00")).toBe(false);
    expect(store.triggeredKeys()).toEqual([]);
  });
});

describe("alertKey", () => {
  it("formats the threshold to two decimals", () => {
    expect(alertKey("BTC-USD", "above", 100000)).toBe("BTC-USD:above:100000.00");
    expect(alertKey("ETH-USD", "percent_change", 5)).toBe("ETH-USD:percent_change:5.00");
  });

  it("collapses thresholds that round to the same two decimals", () => {
    expect(alertKey("AAPL", "above", 100.001)).toBe("AAPL:above:100.00");
    expect(alertKey("AAPL", "above", 100.004)).toBe("AAPL:above:100.00");
  });
});
