import nodemailer from 'nodemailer';
import MimeNode from 'nodemailer/lib/mime-node';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type { ListingMatch } from '../types/listing';
import type { Config } from '../config';
import { formatLocalDateTime } from '../utils/time';
import { truncateChars } from '../utils/text';
import { logger } from '../utils/logger';

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/**
 * A prebuilt RFC 822 message plus the SMTP envelope it is sent with
 */
export interface RawMailMessage {
  envelope: { from: string; to: string[] };
  raw: Buffer;
}

/**
 * The part of a nodemailer transporter the notifier uses
 */
export interface MailTransport {
  sendMail(message: RawMailMessage): Promise<{ messageId: string }>;
}

export type MailTransportFactory = (options: SMTPTransport.Options) => MailTransport;

const createSmtpTransport: MailTransportFactory = (options) => nodemailer.createTransport(options);

/**
 * Builds a multipart/mixed message whose only part is the plain-text body
 */
export function buildMultipartMessage(message: MailMessage): Promise<RawMailMessage> {
  const root = new MimeNode('multipart/mixed');
  root.setHeader('From', message.from);
  root.setHeader('To', message.to);
  root.setHeader('Subject', message.subject);
  root.createChild('text/plain; charset=utf-8').setContent(message.text);

  return new Promise((resolve, reject) => {
    root.build((error, raw) => {
      if (error) {
        reject(error);
        return;
      }
      resolve({ envelope: { from: message.from, to: [message.to] }, raw });
    });
  });
}

/**
 * Sends availability alerts over authenticated SMTP with STARTTLS
 */
export class EmailNotifier {
  constructor(
    private config: Config,
    private createTransport: MailTransportFactory = createSmtpTransport,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Returns true when the message was handed to the mail server
   */
  async send(matches: ListingMatch[]): Promise<boolean> {
    const { address, password, recipient, smtpHost, smtpPort } = this.config.email;

    if (!address || !password || !recipient) {
      logger.warn('Email configuration incomplete. Skipping email notification.');
      return false;
    }

    try {
      const transport = this.createTransport({
        host: smtpHost,
        port: smtpPort,
        secure: false,
        requireTLS: true,
        auth: { user: address, pass: password },
      });

      const message = await buildMultipartMessage(this.composeMessage(matches, address, recipient));
      const info = await transport.sendMail(message);

      logger.info(`Email notification sent to ${recipient}`, { messageId: info.messageId });
      return true;
    } catch (error) {
      logger.error('Error sending email notification', error, { recipient });
      return false;
    }
  }

  composeMessage(matches: ListingMatch[], from: string, to: string): MailMessage {
    const { propertyName, targetUrl } = this.config.monitor;
    const now = this.clock();

    const lines = [
      `Good news! ARO one-bedroom units are available at ${propertyName}:`,
      '',
      ...matches.map(match => `• ${match.category}: ${truncateChars(match.excerpt, 100)}...`),
      '',
      `Check the website: ${targetUrl}`,
      '',
      `Time checked: ${formatLocalDateTime(now, true)}`,
      '',
      `This is an automated message from ${propertyName} ARO Monitor.`,
    ];

    return {
      from,
      to,
      subject: `🏠 ARO Units Available at ${propertyName} - ${formatLocalDateTime(now)}`,
      text: lines.join('\n'),
    };
  }
}
