import "dotenv/config";
import { readFile } from "node:fs/promises";
import cron from "node-cron";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { parsePeriod } from "./period.js";
import { DEFAULT_RETENTION_MS } from "./state-store.js";
import type { AlertCondition, AlertConfig, Period } from "./types.js";

export const config = {
  smtp: {
    host: process.env.SMTP_HOST,
    port: Number(process.env.SMTP_PORT || 587),
    user: process.env.SMTP_USER,
    pass: process.env.SMTP_PASS,
  },
  twilio: {
    accountSid: process.env.TWILIO_ACCOUNT_SID,
    authToken: process.env.TWILIO_AUTH_TOKEN,
    fromNumber: process.env.TWILIO_FROM_NUMBER,
  },
  notifyEmail: process.env.NOTIFY_EMAIL,
  notifySms: process.env.NOTIFY_SMS,
  checkIntervalCron: process.env.CHECK_INTERVAL_CRON || "*/5 * * * *",
};

export function isEmailConfigured(): boolean {
  return !!(config.smtp.host && config.smtp.user && config.smtp.pass && config.notifyEmail);
}

export function isSmsConfigured(): boolean {
  return !!(config.twilio.accountSid && config.twilio.authToken && config.twilio.fromNumber && config.notifySms);
}

// ── Alert file ──────────────────────────────────────────────────────────

const PeriodSchema = z.string().transform((label, ctx): Period => {
  const ms = parsePeriod(label);
  if (ms === undefined || ms <= 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid period "${label}" (use e.g. 30m, 24h, 7d)` });
    return z.NEVER;
  }
  return { label, ms };
});

const value = z.number({ invalid_type_error: "value must be a number" }).positive("value must be positive");
const message = z.string().optional();

const ConditionSchema = z
  .discriminatedUnion("type", [
    z.object({ type: z.literal("above"), value, message }),
    z.object({ type: z.literal("below"), value, message }),
    z.object({ type: z.literal("percent_change"), value, period: PeriodSchema, message }),
    z.object({ type: z.literal("absolute_change"), value, period: PeriodSchema, message }),
  ], {
    errorMap: (issue, ctx) =>
      issue.code === z.ZodIssueCode.invalid_union_discriminator
        ? { message: "type must be above, below, percent_change or absolute_change" }
        : { message: ctx.defaultError },
  })
  .transform((c): AlertCondition => {
    const base = { threshold: c.value, message: c.message || undefined };
    switch (c.type) {
      case "above":
        return { ...base, kind: "above" };
      case "below":
        return { ...base, kind: "below" };
      case "percent_change":
        return { ...base, kind: "percent_change", period: c.period };
      case "absolute_change":
        return { ...base, kind: "absolute_change", period: c.period };
    }
  });

const AlertSchema = z.object({
  ticker: z.string().trim().min(1, "ticker is required").transform((t) => t.toUpperCase()),
  name: z.string().optional(),
  conditions: z.array(ConditionSchema).min(1, "conditions is required"),
});

const NtfySchema = z.object({
  server: z.string().url("server must be a URL"),
  topic: z.string().min(1, "topic is required"),
  username: z.string().optional(),
  password: z.string().optional(),
  token: z.string().optional(),
  priority: z.number().int().min(1).max(5, "priority must be between 1 and 5").default(3),
});

const AlertFileSchema = z.object({
  ntfy: NtfySchema.optional(),
  check_interval: z
    .string()
    .refine((expr) => cron.validate(expr), "check_interval must be a cron expression")
    .optional(),
  history_retention: PeriodSchema.optional(),
  alerts: z.array(AlertSchema).min(1, "at least one alert is required"),
});

/** Replaces `${VAR}` with the variable's value; unset variables stay as written. */
export function expandEnvVars(content: string, env: NodeJS.ProcessEnv = process.env): string {
  return content.replace(/\$\{([^}]+)\}/g, (match, name: string) => env[name] || match);
}

function formatPath(path: (string | number)[]): string {
  return path.reduce<string>(
    (acc, part) => (typeof part === "number" ? `${acc}[${part}]` : acc ? `${acc}.${part}` : part),
    "",
  );
}

export function parseAlertConfig(content: string, env: NodeJS.ProcessEnv = process.env): AlertConfig {
  let raw: unknown;
  try {
    raw = parseYaml(expandEnvVars(content, env));
  } catch (err) {
    throw new ConfigError(`Invalid YAML: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = AlertFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = formatPath(issue.path);
    throw new ConfigError(where ? `${where}: ${issue.message}` : issue.message);
  }

  const file = parsed.data;
  return {
    ntfy: file.ntfy,
    checkInterval: file.check_interval ?? config.checkIntervalCron,
    retentionMs: file.history_retention?.ms ?? DEFAULT_RETENTION_MS,
    alerts: file.alerts,
  };
}

export async function loadAlertConfig(path: string): Promise<AlertConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return parseAlertConfig(content);
}

export function uniqueTickers(alertConfig: AlertConfig): string[] {
  return [...new Set(alertConfig.alerts.map((a) => a.ticker))];
}
