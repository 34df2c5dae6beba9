import { isEmailConfigured, isSmsConfigured } from "../config.js";
import { NotificationSendError, errorMessage } from "../errors.js";
import { EmailSender } from "./email-sender.js";
import { NtfySender } from "./ntfy-sender.js";
import { SmsSender } from "./sms-sender.js";
import type { AlertConfig, AlertSink, Logger, TriggeredAlert } from "../types.js";

export interface NotificationChannel extends AlertSink {
  readonly channel: string;
}

export function configuredChannels(alertConfig: AlertConfig): NotificationChannel[] {
  const channels: NotificationChannel[] = [];
  if (alertConfig.ntfy) channels.push(new NtfySender(alertConfig.ntfy));
  if (isEmailConfigured()) channels.push(new EmailSender());
  if (isSmsConfigured()) channels.push(new SmsSender());
  return channels;
}

/**
 * Sends each alert to every channel. The returned sink rejects only when
 * all channels failed for that alert.
 */
export function createNotifier(channels: NotificationChannel[], logger: Logger = console): AlertSink {
  return {
    async send(ticker, displayName, message, price) {
      if (channels.length === 0) {
        throw new NotificationSendError("no notification channel configured");
      }

      const failures: string[] = [];
      for (const channel of channels) {
        try {
          await channel.send(ticker, displayName, message, price);
          logger.log(`  -> ${channel.channel} sent`);
        } catch (err) {
          logger.error(`  -> ${channel.channel} failed: ${errorMessage(err)}`);
          failures.push(`${channel.channel}: ${errorMessage(err)}`);
        }
      }

      if (failures.length === channels.length) {
        throw new NotificationSendError(`all channels failed (${failures.join("; ")})`);
      }
    },
  };
}

export interface NotifyResult {
  sent: number;
  failed: number;
}

export async function notify(triggered: TriggeredAlert[], sink: AlertSink, logger: Logger = console): Promise<NotifyResult> {
  const result: NotifyResult = { sent: 0, failed: 0 };

  for (const t of triggered) {
    logger.log(`[ALERT] ${t.ticker} ($${t.price.toFixed(2)}) ${t.message}`);

    try {
      await sink.send(t.ticker, t.name, t.message, t.price);
      result.sent++;
    } catch (err) {
      logger.error(`Failed to send alert for ${t.ticker}: ${errorMessage(err)}`);
      result.failed++;
    }
  }

  return result;
}
