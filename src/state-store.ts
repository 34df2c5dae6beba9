import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { StateCorruptError, StateSaveError, errorMessage } from "./errors.js";
import type { ConditionKind, PriceRecord, TickerState } from "./types.js";

export const DEFAULT_RETENTION_MS = 7 * 24 * 60 * 60 * 1000;

// ── Persisted document ──────────────────────────────────────────────────

const PriceRecordSchema = z.object({
  price: z.number(),
  timestamp: z.string().refine((s) => !Number.isNaN(Date.parse(s)), "invalid timestamp"),
});

const StateDocumentSchema = z.object({
  prices: z.record(z.string(), PriceRecordSchema).nullish(),
  triggered_alerts: z.record(z.string(), z.boolean()).nullish(),
  price_history: z.record(z.string(), z.array(PriceRecordSchema).nullable()).nullish(),
});

type StoredPriceRecord = z.infer<typeof PriceRecordSchema>;

export interface StateDocument {
  prices: Record<string, StoredPriceRecord>;
  triggered_alerts: Record<string, boolean>;
  price_history: Record<string, StoredPriceRecord[]>;
}

export interface StateStoreOptions {
  retentionMs?: number;
}

function toRecord(stored: StoredPriceRecord): PriceRecord {
  return { price: stored.price, timestamp: new Date(stored.timestamp) };
}

function toStored(record: PriceRecord): StoredPriceRecord {
  return { price: record.price, timestamp: record.timestamp.toISOString() };
}

// ── Keys ────────────────────────────────────────────────────────────────

/**
 * Trigger-flag key for one condition. Thresholds are rendered with two
 * decimals, so thresholds that round to the same value share a flag.
 */
export function alertKey(ticker: string, kind: ConditionKind, threshold: number): string {
  return `${ticker}:${kind}:${threshold.toFixed(2)}`;
}

// ── Store ───────────────────────────────────────────────────────────────

export class StateStore {
  private readonly lastPrices = new Map<string, PriceRecord>();
  private readonly priceHistory = new Map<string, PriceRecord[]>();
  private readonly triggered = new Map<string, boolean>();
  readonly retentionMs: number;

  constructor(options: StateStoreOptions = {}, doc?: StateDocument) {
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    if (!doc) return;

    for (const [ticker, record] of Object.entries(doc.prices)) {
      this.lastPrices.set(ticker, toRecord(record));
    }
    for (const [ticker, records] of Object.entries(doc.price_history)) {
      this.priceHistory.set(ticker, records.map(toRecord));
    }
    for (const [key, value] of Object.entries(doc.triggered_alerts)) {
      this.triggered.set(key, value);
    }
  }

  /**
   * Reads the state document at `path`. A missing or empty file is a first
   * run and yields an empty store.
   */
  static async load(path: string, options: StateStoreOptions = {}): Promise<StateStore> {
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (err) {
      if (isNotFound(err)) return new StateStore(options);
      throw new StateCorruptError(`Cannot read state file ${path}: ${errorMessage(err)}`, { cause: err });
    }

    if (raw.trim() === "") return new StateStore(options);

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StateCorruptError(`State file ${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = StateDocumentSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new StateCorruptError(
        `State file ${path} has an unexpected shape at ${issue.path.join(".") || "<root>"}: ${issue.message}`,
      );
    }

    const history: Record<string, StoredPriceRecord[]> = {};
    for (const [ticker, records] of Object.entries(parsed.data.price_history ?? {})) {
      history[ticker] = records ?? [];
    }

    return new StateStore(options, {
      prices: parsed.data.prices ?? {},
      triggered_alerts: parsed.data.triggered_alerts ?? {},
      price_history: history,
    });
  }

  /**
   * Records this run's price for a ticker and prunes history older than the
   * retention window. Call once per ticker, after evaluation.
   */
  recordPrice(ticker: string, price: number, now: Date): void {
    const record: PriceRecord = { price, timestamp: now };
    this.lastPrices.set(ticker, record);

    const cutoff = now.getTime() - this.retentionMs;
    const history = [...(this.priceHistory.get(ticker) ?? []), record];
    this.priceHistory.set(
      ticker,
      history.filter((r) => r.timestamp.getTime() >= cutoff),
    );
  }

  lastPrice(ticker: string): PriceRecord | undefined {
    return this.lastPrices.get(ticker);
  }

  /**
   * Price from roughly `agoMs` before `now`: the newest entry at or before
   * the target time, else the oldest entry available. Undefined only when
   * the ticker has no history.
   */
  priceAt(ticker: string, agoMs: number, now: Date): number | undefined {
    const history = this.priceHistory.get(ticker);
    if (!history || history.length === 0) return undefined;

    const target = now.getTime() - agoMs;
    let closest: PriceRecord | undefined;
    for (const record of history) {
      const ts = record.timestamp.getTime();
      if (ts <= target && (!closest || ts > closest.timestamp.getTime())) {
        closest = record;
      }
    }

    return (closest ?? history[0]).price;
  }

  history(ticker: string): readonly PriceRecord[] {
    return this.priceHistory.get(ticker) ?? [];
  }

  tickerState(ticker: string): TickerState | undefined {
    const lastPrice = this.lastPrices.get(ticker);
    if (!lastPrice) return undefined;
    return { lastPrice, history: [...this.history(ticker)] };
  }

  tickers(): string[] {
    return [...new Set([...this.lastPrices.keys(), ...this.priceHistory.keys()])].sort();
  }

  isTriggered(key: string): boolean {
    return this.triggered.get(key) ?? false;
  }

  setTriggered(key: string, value: boolean): void {
    this.triggered.set(key, value);
  }

  triggeredKeys(): string[] {
    return [...this.triggered].filter(([, value]) => value).map(([key]) => key);
  }

  toDocument(): StateDocument {
    const doc: StateDocument = { prices: {}, triggered_alerts: {}, price_history: {} };
    for (const [ticker, record] of this.lastPrices) {
      doc.prices[ticker] = toStored(record);
    }
    for (const [key, value] of this.triggered) {
      doc.triggered_alerts[key] = value;
    }
    for (const [ticker, records] of this.priceHistory) {
      doc.price_history[ticker] = records.map(toStored);
    }
    return doc;
  }

  /** Writes the whole document through a temp file and rename. */
  async save(path: string): Promise<void> {
    const tmpPath = `${path}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(this.toDocument(), null, 2) + "\n", "utf8");
      await rename(tmpPath, path);
    } catch (err) {
      throw new StateSaveError(`Failed to save state to ${path}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
