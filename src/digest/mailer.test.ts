import nodemailer from "nodemailer";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MailSettings } from "../config/index.js";
import { MailError } from "../errors.js";
import { DigestGenerator } from "./generator.js";
import { DigestMailer } from "./mailer.js";

const settings: MailSettings = {
  host: "smtp.example.com",
  port: 465,
  user: "digest-user",
  password: "test-password",
  from: "digest@example.com",
  to: "reader@example.com",
  timeoutMs: 1000,
};

const digest = new DigestGenerator({ feedUrl: "https://news.example.com/feed.xml" }).generate(
  [
    {
      status: "summarized",
      summary: {
        title: "Alpha",
        published: "Mon, 09 Mar 2026 08:00:00 GMT",
        link: "https://news.example.com/alpha",
        summary: "First.",
      },
    },
  ],
  "2026-03-09"
);

describe("DigestMailer", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends one message with both bodies from sender to recipient", async () => {
    const transport = nodemailer.createTransport({ jsonTransport: true });
    const sendMail = vi.spyOn(transport, "sendMail");

    await new DigestMailer(settings, transport).send(digest);

    expect(sendMail).toHaveBeenCalledTimes(1);
    expect(sendMail).toHaveBeenCalledWith(
      expect.objectContaining({
        from: "digest@example.com",
        to: "reader@example.com",
        subject: "Summary of RSS Feed Articles",
        html: digest.htmlBody,
        text: digest.textBody,
      })
    );
  });

  it("wraps transport failures in a MailError", async () => {
    const transport = nodemailer.createTransport({ jsonTransport: true });
    vi.spyOn(transport, "sendMail").mockRejectedValue(new Error("535 Authentication failed"));

    const result = new DigestMailer(settings, transport).send(digest);

    await expect(result).rejects.toBeInstanceOf(MailError);
    await expect(result).rejects.toThrow(
      "Could not send digest via smtp.example.com:465: 535 Authentication failed"
    );
  });

  it("uses implicit TLS with the configured credentials", () => {
    const createTransport = vi.spyOn(nodemailer, "createTransport");

    new DigestMailer(settings);

    expect(createTransport).toHaveBeenCalledWith({
      host: "smtp.example.com",
      port: 465,
      secure: true,
      auth: { user: "digest-user", pass: "test-password" },
      connectionTimeout: 1000,
      greetingTimeout: 1000,
      socketTimeout: 1000,
    });
  });
});
