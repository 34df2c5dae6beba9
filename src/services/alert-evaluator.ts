import { alertKey, type StateStore } from "../state-store.js";
import { evaluateCondition } from "./condition-evaluator.js";
import type { AlertCondition, AssetAlert, Quote, TriggeredAlert } from "../types.js";

/**
 * Runs every configured condition against this run's quotes and returns
 * the alerts that fired, in configuration order. Trigger flags are updated
 * in `store`; prices are not recorded here.
 */
export function evaluateAlerts(
  alerts: AssetAlert[],
  quotes: Map<string, Quote>,
  store: StateStore,
  now: Date,
): TriggeredAlert[] {
  const triggered: TriggeredAlert[] = [];

  for (const alert of alerts) {
    const quote = quotes.get(alert.ticker);
    if (!quote) continue;

    const displayName = alert.name || alert.ticker;
    const lastPrice = store.lastPrice(alert.ticker)?.price;

    for (const condition of alert.conditions) {
      const key = alertKey(alert.ticker, condition.kind, condition.threshold);
      const wasTriggered = store.isTriggered(key);
      const outcome = evaluateCondition(condition, {
        ticker: alert.ticker,
        displayName,
        price: quote.price,
        lastPrice,
        referencePrice: referencePrice(store, alert.ticker, condition, now),
        triggered: wasTriggered,
      });

      if (outcome.triggered !== wasTriggered) {
        store.setTriggered(key, outcome.triggered);
      }

      if (outcome.fires && outcome.message !== undefined) {
        triggered.push({
          ticker: alert.ticker,
          name: displayName,
          condition,
          price: quote.price,
          message: outcome.message,
        });
      }
    }
  }

  return triggered;
}

function referencePrice(store: StateStore, ticker: string, condition: AlertCondition, now: Date): number | undefined {
  switch (condition.kind) {
    case "percent_change":
    case "absolute_change":
      return store.priceAt(ticker, condition.period.ms, now);
    default:
      return undefined;
  }
}
