import { NotificationSendError } from "../errors.js";
import type { AlertSink, NtfySettings } from "../types.js";

const TIMEOUT_MS = 10_000;

interface NtfyMessage {
  topic: string;
  message: string;
  title?: string;
  priority?: number;
  tags?: string[];
}

export class NtfySender implements AlertSink {
  readonly channel = "ntfy";

  constructor(private readonly settings: NtfySettings) {}

  async publish(notification: NtfyMessage): Promise<void> {
    const response = await fetch(this.settings.server, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.authHeaders() },
      body: JSON.stringify(notification),
      signal: AbortSignal.timeout(TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new NotificationSendError(`ntfy returned status ${response.status}`);
    }
  }

  async send(ticker: string, displayName: string, message: string, price: number): Promise<void> {
    await this.publish({
      topic: this.settings.topic,
      title: `💰 ${displayName || ticker} Alert`,
      message: `${message}\n\nCurrent price: $${price.toFixed(2)}`,
      priority: this.settings.priority,
      tags: ["chart_with_upwards_trend", ticker],
    });
  }

  private authHeaders(): Record<string, string> {
    const { token, username, password } = this.settings;
    if (token) return { Authorization: `Bearer ${token}` };
    if (username && password) {
      return { Authorization: `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}` };
    }
    return {};
  }
}
