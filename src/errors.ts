export type AlertsErrorCode =
  | "CONFIG_INVALID"
  | "STATE_CORRUPT"
  | "QUOTE_FETCH_FAILED"
  | "ALL_QUOTES_FAILED"
  | "NOTIFICATION_SEND_FAILED"
  | "STATE_SAVE_FAILED";

export class AlertsError extends Error {
  readonly code: AlertsErrorCode;

  constructor(code: AlertsErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends AlertsError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIG_INVALID", message, options);
  }
}

export class StateCorruptError extends AlertsError {
  constructor(message: string, options?: ErrorOptions) {
    super("STATE_CORRUPT", message, options);
  }
}

export class QuoteFetchError extends AlertsError {
  readonly ticker: string;

  constructor(ticker: string, message: string, options?: ErrorOptions) {
    super("QUOTE_FETCH_FAILED", message, options);
    this.ticker = ticker;
  }
}

export class AllQuotesFailedError extends AlertsError {
  constructor(message: string, options?: ErrorOptions) {
    super("ALL_QUOTES_FAILED", message, options);
  }
}

export class NotificationSendError extends AlertsError {
  constructor(message: string, options?: ErrorOptions) {
    super("NOTIFICATION_SEND_FAILED", message, options);
  }
}

export class StateSaveError extends AlertsError {
  constructor(message: string, options?: ErrorOptions) {
    super("STATE_SAVE_FAILED", message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
