export interface PriceRecord {
  readonly price: number;
  readonly timestamp: Date;
}

export interface TickerState {
  lastPrice: PriceRecord;
  history: PriceRecord[];
}

export interface Period {
  /** As written in the config file, e.g. "24h" or "7d". */
  label: string;
  ms: number;
}

interface ConditionBase {
  threshold: number;
  message?: string;
}

export type AlertCondition =
  | (ConditionBase & { kind: "above" })
  | (ConditionBase & { kind: "below" })
  | (ConditionBase & { kind: "percent_change"; period: Period })
  | (ConditionBase & { kind: "absolute_change"; period: Period });

export type ConditionKind = AlertCondition["kind"];

export interface AssetAlert {
  ticker: string;
  name?: string;
  conditions: AlertCondition[];
}

export interface NtfySettings {
  server: string;
  topic: string;
  username?: string;
  password?: string;
  token?: string;
  priority: number;
}

export interface AlertConfig {
  ntfy?: NtfySettings;
  checkInterval: string;
  retentionMs: number;
  alerts: AssetAlert[];
}

export interface Quote {
  ticker: string;
  price: number;
  fetchedAt: Date;
}

export interface TriggeredAlert {
  ticker: string;
  name: string;
  condition: AlertCondition;
  price: number;
  message: string;
}

export interface AlertSink {
  send(ticker: string, displayName: string, message: string, price: number): Promise<void>;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;
