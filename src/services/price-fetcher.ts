import YahooFinance from "yahoo-finance2";
import { AllQuotesFailedError, QuoteFetchError, errorMessage } from "../errors.js";
import type { Logger, Quote } from "../types.js";

const yf = new YahooFinance({
  queue: { concurrency: 1, timeout: 60 },
});

export interface FetchOptions {
  retries?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

async function fetchWithRetry(ticker: string, retries: number, retryDelayMs: number, logger: Logger): Promise<Quote> {
  for (let attempt = 0; ; attempt++) {
    try {
      const q = await yf.quote(ticker);
      if (!q || q.regularMarketPrice == null) {
        throw new QuoteFetchError(ticker, `no price returned for ${ticker}`);
      }
      return {
        ticker,
        price: q.regularMarketPrice,
        fetchedAt: new Date(),
      };
    } catch (err) {
      const msg = errorMessage(err);
      if (msg.includes("429") && attempt < retries) {
        const delay = (attempt + 1) * retryDelayMs;
        logger.warn(`  Yahoo Finance 429 for ${ticker}, retrying in ${delay / 1000}s (attempt ${attempt + 1}/${retries})`);
        await new Promise((r) => setTimeout(r, delay));
        continue;
      }
      if (err instanceof QuoteFetchError) throw err;
      throw new QuoteFetchError(ticker, `fetching ${ticker}: ${msg}`, { cause: err });
    }
  }
}

/**
 * Fetches one quote per ticker. Tickers that fail are logged and left out
 * of the result; the call only rejects when every ticker failed.
 */
export async function fetchQuotes(tickers: string[], options: FetchOptions = {}): Promise<Map<string, Quote>> {
  const { retries = 2, retryDelayMs = 2000, logger = console } = options;
  const quotes = new Map<string, Quote>();
  let lastError: QuoteFetchError | undefined;

  for (const ticker of tickers) {
    try {
      quotes.set(ticker, await fetchWithRetry(ticker, retries, retryDelayMs, logger));
    } catch (err) {
      lastError = err instanceof QuoteFetchError ? err : new QuoteFetchError(ticker, errorMessage(err), { cause: err });
      logger.warn(`Warning: failed to fetch ${ticker}: ${lastError.message}`);
    }
  }

  if (quotes.size === 0 && lastError) {
    throw new AllQuotesFailedError(`all tickers failed, last error: ${lastError.message}`, { cause: lastError });
  }

  return quotes;
}
