import twilio from "twilio";
import { config } from "../config.js";
import { NotificationSendError } from "../errors.js";
import type { AlertSink } from "../types.js";

export class SmsSender implements AlertSink {
  readonly channel = "sms";
  private client: ReturnType<typeof twilio> | null = null;

  private getClient(): ReturnType<typeof twilio> {
    if (!this.client) {
      this.client = twilio(config.twilio.accountSid, config.twilio.authToken);
    }
    return this.client;
  }

  async send(ticker: string, _displayName: string, message: string, price: number): Promise<void> {
    const { fromNumber } = config.twilio;
    const to = config.notifySms;
    if (!fromNumber || !to) {
      throw new NotificationSendError("SMS is not configured");
    }

    await this.getClient().messages.create({
      body: `Price Alert: ${ticker} ($${price.toFixed(2)}) ${message}`,
      from: fromNumber,
      to,
    });
  }
}
