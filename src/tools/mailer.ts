/**
 * @fileoverview Outbound mail for the email tool.
 *
 * @module sql-audit-agent/tools/mailer
 * @version 0.1.0
 */

import nodemailer from 'nodemailer';

export interface MailMessage {
  readonly from: string;
  readonly to: string;
  readonly subject: string;
  readonly text: string;
  readonly html?: string | undefined;
}

export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export interface SmtpSettings {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
}

const LOCAL_HOSTS = new Set(['localhost', '127.0.0.1']);

/**
 * Builds a nodemailer SMTP transport.
 *
 * Port 465 uses implicit TLS. Elsewhere, a non-local host with a password
 * gets STARTTLS and authentication; local relays get neither.
 */
export function createSmtpTransport(settings: SmtpSettings): MailTransport {
  const implicitTls = settings.port === 465;
  const authenticate =
    settings.password.length > 0 && (implicitTls || !LOCAL_HOSTS.has(settings.host));

  return nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: implicitTls,
    requireTLS: !implicitTls && authenticate,
    auth: authenticate ? { user: settings.user, pass: settings.password } : undefined,
  });
}
