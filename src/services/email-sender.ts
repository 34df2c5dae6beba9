import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import { config } from "../config.js";
import type { AlertSink } from "../types.js";

export class EmailSender implements AlertSink {
  readonly channel = "email";
  private transporter: Transporter | null = null;

  private getTransporter(): Transporter {
    if (!this.transporter) {
      this.transporter = nodemailer.createTransport({
        host: config.smtp.host,
        port: config.smtp.port,
        secure: config.smtp.port === 465,
        auth: {
          user: config.smtp.user,
          pass: config.smtp.pass,
        },
      });
    }
    return this.transporter;
  }

  async send(ticker: string, displayName: string, message: string, price: number): Promise<void> {
    const name = displayName || ticker;
    const text = [
      `${name} (${ticker})`,
      `Current price: $${price.toFixed(2)}`,
      ``,
      message,
    ].join("\n");

    await this.getTransporter().sendMail({
      from: config.smtp.user,
      to: config.notifyEmail,
      subject: `Price Alert: ${name}`,
      text,
    });
  }
}
