#!/usr/bin/env node
import { Command } from "commander";
import { dirname, join } from "node:path";
import { runCheck } from "./check.js";
import { loadAlertConfig, uniqueTickers } from "./config.js";
import { errorMessage } from "./errors.js";
import { startScheduler } from "./scheduler.js";
import { alertKey, StateStore } from "./state-store.js";
import { configuredChannels, createNotifier } from "./services/notifier.js";
import { fetchQuotes } from "./services/price-fetcher.js";
import type { AlertConfig } from "./types.js";

type GlobalOptions = {
  config: string;
  state?: string;
  verbose: boolean;
  dryRun: boolean;
};

const program = new Command();

program
  .name("asset-alerts")
  .description("Check asset prices and send a notification once per threshold crossing")
  .option("-c, --config <path>", "Path to the alert configuration file", "config.yaml")
  .option("-s, --state <path>", "Path to the state file (default: state.json beside the config)")
  .option("-v, --verbose", "Verbose output", false)
  .option("--dry-run", "Check prices but don't send notifications", false);

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function statePath(opts: GlobalOptions): string {
  return opts.state ?? join(dirname(opts.config), "state.json");
}

function fail(err: unknown): never {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
}

async function loadConfigOrExit(opts: GlobalOptions): Promise<AlertConfig> {
  try {
    const alertConfig = await loadAlertConfig(opts.config);
    if (opts.verbose) console.log(`Loaded config with ${alertConfig.alerts.length} alert group(s)`);
    return alertConfig;
  } catch (err) {
    fail(err);
  }
}

function checkRunner(alertConfig: AlertConfig, opts: GlobalOptions): () => Promise<void> {
  const channels = configuredChannels(alertConfig);
  if (channels.length === 0 && !opts.dryRun) {
    fail("no notification channel configured (set ntfy in the config file, or SMTP/Twilio in the environment)");
  }
  const sink = createNotifier(channels);

  return async () => {
    const result = await runCheck(
      alertConfig,
      { statePath: statePath(opts), dryRun: opts.dryRun, verbose: opts.verbose },
      { fetchQuotes: (tickers) => fetchQuotes(tickers), sink },
    );
    if (!opts.dryRun && result.triggered.length > 0) {
      console.log(`Sent ${result.sent} alert(s), ${result.failed} failed.`);
    }
  };
}

program
  .command("check", { isDefault: true })
  .description("Run one check: fetch prices, send triggered alerts, save state")
  .action(async () => {
    const opts = globalOptions();
    const alertConfig = await loadConfigOrExit(opts);
    const run = checkRunner(alertConfig, opts);
    try {
      await run();
    } catch (err) {
      fail(err);
    }
  });

program
  .command("watch")
  .description("Run checks on the configured cron schedule")
  .action(async () => {
    const opts = globalOptions();
    const alertConfig = await loadConfigOrExit(opts);
    const run = checkRunner(alertConfig, opts);

    console.log("Asset Price Alert Scheduler");
    console.log("===========================");
    console.log(`Schedule: ${alertConfig.checkInterval}`);
    console.log(`Tickers:  ${uniqueTickers(alertConfig).join(", ")}`);
    console.log(`State:    ${statePath(opts)}`);
    console.log();

    startScheduler(run, alertConfig.checkInterval);
  });

program
  .command("status")
  .description("Show last prices and triggered conditions from the state file")
  .action(async () => {
    const opts = globalOptions();
    const alertConfig = await loadConfigOrExit(opts);

    let store: StateStore;
    try {
      store = await StateStore.load(statePath(opts), { retentionMs: alertConfig.retentionMs });
    } catch (err) {
      fail(err);
    }

    console.log(`\n${"Ticker".padEnd(12)} ${"Last Price".padEnd(14)} ${"History".padEnd(8)} Last Updated`);
    console.log("-".repeat(60));
    for (const ticker of uniqueTickers(alertConfig)) {
      const state = store.tickerState(ticker);
      const price = state ? `$${state.lastPrice.price.toFixed(2)}` : "-";
      const updated = state ? state.lastPrice.timestamp.toLocaleString() : "Never";
      console.log(`${ticker.padEnd(12)} ${price.padEnd(14)} ${String(state?.history.length ?? 0).padEnd(8)} ${updated}`);
    }

    console.log(`\nConditions:`);
    for (const alert of alertConfig.alerts) {
      for (const c of alert.conditions) {
        const key = alertKey(alert.ticker, c.kind, c.threshold);
        console.log(`  ${key.padEnd(40)} ${store.isTriggered(key) ? "TRIGGERED" : "armed"}`);
      }
    }
    console.log();
  });

program
  .command("validate")
  .description("Validate the configuration file and exit")
  .action(async () => {
    const opts = globalOptions();
    const alertConfig = await loadConfigOrExit(opts);
    const conditions = alertConfig.alerts.reduce((n, a) => n + a.conditions.length, 0);
    console.log(`Config OK: ${alertConfig.alerts.length} alert group(s), ${conditions} condition(s).`);
  });

await program.parseAsync();
