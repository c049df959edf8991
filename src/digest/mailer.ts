import nodemailer, { type Transporter } from "nodemailer";
import type { MailSettings } from "../config/index.js";
import { MailError, describeError } from "../errors.js";
import type { Digest } from "./generator.js";

export function createSmtpTransport(settings: MailSettings): Transporter {
  return nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    // Implicit TLS from the first byte (SMTPS), not STARTTLS.
    secure: true,
    auth: {
      user: settings.user,
      pass: settings.password,
    },
    connectionTimeout: settings.timeoutMs,
    greetingTimeout: settings.timeoutMs,
    socketTimeout: settings.timeoutMs,
  });
}

export class DigestMailer {
  private readonly transport: Transporter;

  constructor(
    private readonly settings: MailSettings,
    transport?: Transporter
  ) {
    this.transport = transport ?? createSmtpTransport(settings);
  }

  async send(digest: Digest): Promise<string> {
    try {
      const info = await this.transport.sendMail({
        from: this.settings.from,
        to: this.settings.to,
        subject: digest.subject,
        html: digest.htmlBody,
        text: digest.textBody,
      });
      const messageId = typeof info.messageId === "string" ? info.messageId : "";
      console.log(
        `Digest sent to ${this.settings.to} with ${digest.articles.length} articles${messageId ? ` (${messageId})` : ""}`
      );
      return messageId;
    } catch (error) {
      throw new MailError(
        `Could not send digest via ${this.settings.host}:${this.settings.port}: ${describeError(error)}`,
        { cause: error }
      );
    } finally {
      this.transport.close();
    }
  }
}
