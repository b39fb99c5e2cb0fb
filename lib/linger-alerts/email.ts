/**
 * Email alert: one SMTP message per linger alert, snapshot attached as PNG.
 *
 * Env: LINGER_SMTP_PASSWORD overrides alerting.email.sender_password.
 */

import path from "path";
import { createTransport, type SendMailOptions } from "nodemailer";
import type { Notifier } from "../camera-pipeline/collaborators";
import { NotificationError, errorMessage } from "../camera-pipeline/errors";
import type { AlertEvent } from "../camera-pipeline/types";

export interface EmailSettings {
  smtpServer: string;
  smtpPort: number;
  /** Implicit TLS; otherwise STARTTLS is negotiated when offered. */
  secure: boolean;
  senderEmail: string;
  senderPassword: string;
  recipientEmail: string;
}

/** The part of a nodemailer transporter the notifier uses. */
export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

export function createSmtpTransport(settings: EmailSettings): MailTransport {
  const pass = process.env.LINGER_SMTP_PASSWORD || settings.senderPassword;
  return createTransport({
    host: settings.smtpServer,
    port: settings.smtpPort,
    secure: settings.secure,
    requireTLS: !settings.secure,
    auth: pass ? { user: settings.senderEmail, pass } : undefined,
  });
}

export function buildAlertEmail(event: AlertEvent, settings: EmailSettings): SendMailOptions {
  const seconds = Math.round(event.dwellSeconds);
  const message: SendMailOptions = {
    from: settings.senderEmail,
    to: settings.recipientEmail,
    subject: `${event.camera} linger alert: ${event.label} for ${seconds}s`,
    text: [
      `Camera: ${event.camera}`,
      `Alert: ${event.label} (track ${event.trackId}) stayed ${event.dwellSeconds.toFixed(1)}s in the watched region`,
      `Box: [${event.box.x1}, ${event.box.y1}, ${event.box.x2}, ${event.box.y2}]`,
      `Time: ${new Date(event.timestamp).toISOString()}`,
    ].join("\n"),
  };
  if (event.snapshotPath) {
    message.attachments = [
      { filename: path.basename(event.snapshotPath), path: event.snapshotPath, contentType: "image/png" },
    ];
  }
  return message;
}

export class EmailNotifier implements Notifier {
  readonly name = "email";
  private readonly transport: MailTransport;

  constructor(
    private readonly settings: EmailSettings,
    transport?: MailTransport
  ) {
    this.transport = transport ?? createSmtpTransport(settings);
  }

  async notify(event: AlertEvent): Promise<boolean> {
    try {
      await this.transport.sendMail(buildAlertEmail(event, this.settings));
    } catch (e) {
      throw new NotificationError(this.name, `send to ${this.settings.recipientEmail} failed: ${errorMessage(e)}`, {
        cause: e,
      });
    }
    console.log(`[LingerEmail] sent alert ${event.id} to ${this.settings.recipientEmail}`);
    return true;
  }
}
