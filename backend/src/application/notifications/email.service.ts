/**
 * Email Service
 * Verification and password-reset mails over SMTP (nodemailer)
 */

import nodemailer, { type Transporter } from 'nodemailer';
import type { MailConfig } from '../../config/index.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { callExternal } from '../resilience/retry.utils.js';

const logger = createLogger('email-service');

export interface EmailSender {
  sendVerificationEmail(to: string, username: string, token: string): Promise<void>;
  sendPasswordResetEmail(to: string, username: string, token: string): Promise<void>;
}

export interface EmailMessage {
  subject: string;
  text: string;
  html: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function buildVerificationMessage(baseUrl: string, username: string, token: string): EmailMessage {
  const link = `${baseUrl}/api/auth/confirm/${encodeURIComponent(token)}`;
  return {
    subject: 'Confirm your email',
    text: `Hi ${username},\n\nConfirm your email address by opening:\n${link}\n`,
    html: `<p>Hi ${escapeHtml(username)},</p>`
      + `<p>Confirm your email address by following <a href="${escapeHtml(link)}">this link</a>.</p>`,
  };
}

export function buildPasswordResetMessage(baseUrl: string, username: string, token: string): EmailMessage {
  const link = `${baseUrl}/reset-password?token=${encodeURIComponent(token)}`;
  return {
    subject: 'Password reset request',
    text: `Hi ${username},\n\nReset your password here:\n${link}\n\nIf you did not ask for a reset, ignore this email.\n`,
    html: `<p>Hi ${escapeHtml(username)},</p>`
      + `<p>Reset your password by following <a href="${escapeHtml(link)}">this link</a>.</p>`
      + '<p>If you did not ask for a reset, ignore this email.</p>',
  };
}

export class SmtpEmailSender implements EmailSender {
  private readonly transporter: Transporter;

  constructor(
    private readonly config: MailConfig,
    private readonly baseUrl: string
  ) {
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure,
      ...(config.username ? { auth: { user: config.username, pass: config.password ?? '' } } : {}),
      connectionTimeout: config.timeoutMs,
      greetingTimeout: config.timeoutMs,
      socketTimeout: config.timeoutMs,
    });
  }

  private async send(to: string, message: EmailMessage): Promise<void> {
    await callExternal('smtp', async () => {
      await this.transporter.sendMail({
        from: { name: this.config.fromName, address: this.config.from },
        to,
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
    }, { timeoutMs: this.config.timeoutMs });

    logger.info({ to, subject: message.subject }, 'Email sent');
  }

  sendVerificationEmail(to: string, username: string, token: string): Promise<void> {
    return this.send(to, buildVerificationMessage(this.baseUrl, username, token));
  }

  sendPasswordResetEmail(to: string, username: string, token: string): Promise<void> {
    return this.send(to, buildPasswordResetMessage(this.baseUrl, username, token));
  }
}
