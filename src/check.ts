import { uniqueTickers } from "./config.js";
import { evaluateAlerts } from "./services/alert-evaluator.js";
import { notify } from "./services/notifier.js";
import { StateStore } from "./state-store.js";
import type { AlertConfig, AlertSink, Logger, Quote, TriggeredAlert } from "./types.js";

export interface CheckOptions {
  statePath: string;
  dryRun?: boolean;
  verbose?: boolean;
  now?: () => Date;
  logger?: Logger;
}

export interface CheckDeps {
  fetchQuotes: (tickers: string[]) => Promise<Map<string, Quote>>;
  sink: AlertSink;
}

export interface CheckResult {
  triggered: TriggeredAlert[];
  quotes: Map<string, Quote>;
  sent: number;
  failed: number;
}

function timestamp(date: Date): string {
  return date.toLocaleTimeString();
}

/**
 * One load → fetch → evaluate → notify → record → save cycle. Fatal errors
 * (corrupt state, every quote failing, save failure) reject; failed sends
 * are counted and the state is still saved.
 */
export async function runCheck(alertConfig: AlertConfig, options: CheckOptions, deps: CheckDeps): Promise<CheckResult> {
  const { statePath, dryRun = false, verbose = false, logger = console } = options;
  const now = (options.now ?? (() => new Date()))();
  const debug = (msg: string) => {
    if (verbose) logger.log(msg);
  };

  const store = await StateStore.load(statePath, { retentionMs: alertConfig.retentionMs });
  debug(`Loaded state from ${statePath}`);

  const tickers = uniqueTickers(alertConfig);
  logger.log(`[${timestamp(now)}] Checking ${tickers.length} ticker(s): ${tickers.join(", ")}`);

  const quotes = await deps.fetchQuotes(tickers);
  for (const q of quotes.values()) {
    debug(`  ${q.ticker}: $${q.price.toFixed(2)}`);
  }

  const triggered = evaluateAlerts(alertConfig.alerts, quotes, store, now);
  debug(`Triggered ${triggered.length} alert(s)`);

  let sent = 0;
  let failed = 0;
  if (triggered.length === 0) {
    debug("  No alerts triggered.");
  } else if (dryRun) {
    logger.log("Dry run - would send the following alerts:");
    for (const t of triggered) {
      logger.log(`  • ${t.name}: ${t.message} (price: $${t.price.toFixed(2)})`);
    }
  } else {
    ({ sent, failed } = await notify(triggered, deps.sink, logger));
  }

  for (const q of quotes.values()) {
    store.recordPrice(q.ticker, q.price, now);
  }

  await store.save(statePath);
  debug(`State saved to ${statePath}`);

  return { triggered, quotes, sent, failed };
}
