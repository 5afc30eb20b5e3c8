/**
 * Report delivery over SMTP (nodemailer).
 *
 * The relay is expected to accept unauthenticated submission from the
 * reporting host, as internal mail relays usually do; credentials can be
 * supplied through SmtpOptions when it does not.
 */

import nodemailer, { type SendMailOptions } from 'nodemailer';
import { TransportError, errorMessage } from '../errors';
import type { Logger, MailMessage } from '../types';

export interface MailSender {
  send(message: MailMessage, bodyHtml: string): Promise<SendResult>;
}

export interface SendResult {
  messageId: string;
  timestamp: string;
}

/** The part of a nodemailer Transporter we use */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<{ messageId: string }>;
  close(): void;
}

export interface SmtpOptions {
  /** Default 25 */
  port?: number;
  secure?: boolean;
  auth?: { user: string; pass: string };
  logger?: Logger;
  /** Builds the transport for a host/port; tests inject a fake here */
  createTransport?: (host: string, port: number) => MailTransport;
}

function defaultTransport(options: SmtpOptions) {
  return (host: string, port: number): MailTransport =>
    nodemailer.createTransport({
      host,
      port,
      secure: options.secure ?? port === 465,
      auth: options.auth,
    });
}

export class SmtpMailSender implements MailSender {
  private readonly options: SmtpOptions;
  private readonly createTransport: (host: string, port: number) => MailTransport;
  private readonly log: Logger;

  constructor(options: SmtpOptions = {}) {
    this.options = options;
    this.createTransport = options.createTransport ?? defaultTransport(options);
    this.log = options.logger ?? console;
  }

  /**
   * Send the report. Throws TransportError when the relay refuses it.
   */
  async send(message: MailMessage, bodyHtml: string): Promise<SendResult> {
    if (message.to.length === 0) {
      throw new TransportError('No recipients given', message.smtpHost);
    }

    const port = message.smtpPort ?? this.options.port ?? 25;
    this.log.log(
      `[Mailer] Sending "${message.subject}" from ${message.from} to ${message.to.join(', ')} via ${message.smtpHost}:${port}`
    );

    const transport = this.createTransport(message.smtpHost, port);

    try {
      const info = await transport.sendMail({
        from: message.from,
        to: message.to,
        subject: message.subject,
        html: bodyHtml,
      });

      this.log.log(`[Mailer] Report sent: ${info.messageId}`);
      return { messageId: info.messageId, timestamp: new Date().toISOString() };
    } catch (error) {
      this.log.error('[Mailer] Send error:', errorMessage(error));
      throw new TransportError(
        `Failed to send report via ${message.smtpHost}:${port}: ${errorMessage(error)}`,
        message.smtpHost,
        error
      );
    } finally {
      transport.close();
    }
  }
}
