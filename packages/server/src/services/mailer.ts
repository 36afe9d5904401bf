/**
 * Outgoing email
 *
 * Uses SMTP when SMTP_URL is configured. Without it, messages go through
 * nodemailer's JSON transport and are only logged.
 */

import nodemailer, { type Transporter } from 'nodemailer';
import type { FastifyBaseLogger } from 'fastify';
import { config } from '../config.js';

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
}

export interface Mailer {
  send(message: MailMessage): Promise<void>;
}

export function createMailer(logger: FastifyBaseLogger): Mailer {
  const transport: Transporter = config.mail.smtpUrl
    ? nodemailer.createTransport(config.mail.smtpUrl)
    : nodemailer.createTransport({ jsonTransport: true });

  return {
    async send(message) {
      const info = await transport.sendMail({ from: config.mail.from, ...message });
      logger.info(
        { to: message.to, subject: message.subject, messageId: String(info.messageId) },
        config.mail.smtpUrl ? 'Email sent' : 'Email logged (SMTP not configured)'
      );
    },
  };
}
