/**
 * SMTP channel
 *
 * Serves both the email and the QQ channel; they differ only in the
 * template the router renders and in the name reported on outcomes.
 */

import nodemailer from 'nodemailer';
import { SmtpSettings } from '../../types';
import { NotificationError, NotificationErrorKind } from '../../utils/errors';
import { ChannelSender, RenderedMessage } from './channel';

export interface MailOptions {
  from: string;
  to: string;
  subject: string;
  text: string;
}

export interface MailTransport {
  sendMail(mail: MailOptions): Promise<unknown>;
}

const UNAVAILABLE_CODES = new Set(['ECONNECTION', 'ETIMEDOUT', 'ESOCKET', 'EDNS', 'ETLS']);

export class EmailChannelSender implements ChannelSender {
  readonly name: string;
  private readonly smtp: SmtpSettings;
  private transport: MailTransport | null;

  constructor(smtp: SmtpSettings, name = 'email', transport?: MailTransport) {
    this.smtp = smtp;
    this.name = name;
    this.transport = transport || null;
  }

  async send(recipient: string, message: RenderedMessage): Promise<void> {
    try {
      await this.getTransport().sendMail({
        from: this.smtp.sender,
        to: recipient,
        subject: message.subject,
        text: message.body
      });
    } catch (error) {
      throw classifySmtpError(error, this.name, recipient);
    }
  }

  private getTransport(): MailTransport {
    if (!this.transport) {
      this.transport = nodemailer.createTransport({
        host: this.smtp.smtpServer,
        port: this.smtp.smtpPort,
        secure: this.smtp.secure ?? this.smtp.smtpPort === 465,
        auth: {
          user: this.smtp.sender,
          pass: this.smtp.password
        }
      });
    }
    return this.transport;
  }
}

/**
 * Map nodemailer failures onto the notification error kinds
 */
export function classifySmtpError(error: unknown, channel: string, recipient: string): NotificationError {
  if (error instanceof NotificationError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = readStringField(error, 'code');
  const responseCode = readNumberField(error, 'responseCode');

  let kind = NotificationErrorKind.UNKNOWN;
  if (code === 'EAUTH' || responseCode === 535) {
    kind = NotificationErrorKind.AUTH_FAILURE;
  } else if (code === 'EENVELOPE' || (responseCode !== undefined && responseCode >= 550 && responseCode <= 553)) {
    kind = NotificationErrorKind.RECIPIENT_REJECTED;
  } else if ((code !== undefined && UNAVAILABLE_CODES.has(code)) || responseCode === 421 || responseCode === 452) {
    kind = NotificationErrorKind.CHANNEL_UNAVAILABLE;
  }

  return new NotificationError(message, kind, channel, recipient, { code, responseCode });
}

function readStringField(source: unknown, field: string): string | undefined {
  if (typeof source === 'object' && source !== null && field in source) {
    const value: unknown = Reflect.get(source, field);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

function readNumberField(source: unknown, field: string): number | undefined {
  if (typeof source === 'object' && source !== null && field in source) {
    const value: unknown = Reflect.get(source, field);
    return typeof value === 'number' ? value : undefined;
  }
  return undefined;
}
