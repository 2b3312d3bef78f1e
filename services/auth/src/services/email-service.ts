import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { BaseLogger } from 'pino';

import type { Env } from '../env';

export type SecurityNoticeEvent = 'password_changed' | 'backup_codes_low' | 'account_locked';

export interface EmailRecipient {
  email: string;
  displayName: string | null;
}

export interface EmailMfaCodeMessage {
  to: EmailRecipient;
  code: string;
  expiresAt: Date;
}

export interface VerificationEmailMessage {
  to: EmailRecipient;
  verificationToken: string;
  expiresAt: Date;
}

export interface SecurityNoticeMessage {
  to: EmailRecipient;
  event: SecurityNoticeEvent;
  detail?: Record<string, string | number>;
}

export interface EmailDelivery {
  sent: boolean;
  messageId: string | null;
}

export interface EmailService {
  sendEmailMfaCode(message: EmailMfaCodeMessage): Promise<EmailDelivery>;
  sendVerificationEmail(message: VerificationEmailMessage): Promise<EmailDelivery>;
  sendSecurityNotice(message: SecurityNoticeMessage): Promise<EmailDelivery>;
}

interface OutgoingMail {
  to: EmailRecipient;
  subject: string;
  text: string;
  kind: string;
}

export type MailSettings = Pick<
  Env,
  'MAIL_FROM' | 'APP_BASE_URL' | 'SMTP_HOST' | 'SMTP_PORT' | 'SMTP_USER' | 'SMTP_PASSWORD'
>;

export function createMailTransport(settings: MailSettings): Transporter {
  if (!settings.SMTP_HOST) {
    return nodemailer.createTransport({ jsonTransport: true });
  }

  return nodemailer.createTransport({
    host: settings.SMTP_HOST,
    port: settings.SMTP_PORT,
    secure: settings.SMTP_PORT === 465,
    auth:
      settings.SMTP_USER && settings.SMTP_PASSWORD
        ? { user: settings.SMTP_USER, pass: settings.SMTP_PASSWORD }
        : undefined,
  });
}

const NOTICE_SUBJECTS: Record<SecurityNoticeEvent, string> = {
  password_changed: 'Your password was changed',
  backup_codes_low: 'You are running low on backup codes',
  account_locked: 'Sign-in temporarily locked',
};

function greeting(to: EmailRecipient) {
  return to.displayName ? `Hi ${to.displayName},` : 'Hi,';
}

/**
 * Delivers mail through nodemailer. Failures are logged and reported as
 * `sent: false`; nothing is retried.
 */
export class SmtpEmailService implements EmailService {
  private readonly transport: Transporter;

  constructor(
    private readonly settings: MailSettings,
    private readonly logger: BaseLogger,
    transport?: Transporter,
  ) {
    this.transport = transport ?? createMailTransport(settings);
  }

  sendEmailMfaCode(message: EmailMfaCodeMessage) {
    return this.deliver({
      to: message.to,
      kind: 'mfa_code',
      subject: 'Your sign-in code',
      text: [
        greeting(message.to),
        '',
        `Your sign-in code is ${message.code}.`,
        `It expires at ${message.expiresAt.toISOString()}.`,
        '',
        'If you did not try to sign in, change your password.',
      ].join('\n'),
    });
  }

  sendVerificationEmail(message: VerificationEmailMessage) {
    const link = new URL('/verify-email', this.settings.APP_BASE_URL);
    link.searchParams.set('token', message.verificationToken);

    return this.deliver({
      to: message.to,
      kind: 'email_verification',
      subject: 'Confirm your email address',
      text: [
        greeting(message.to),
        '',
        `Confirm your email address: ${link.toString()}`,
        `This link expires at ${message.expiresAt.toISOString()}.`,
      ].join('\n'),
    });
  }

  sendSecurityNotice(message: SecurityNoticeMessage) {
    const details = Object.entries(message.detail ?? {}).map(
      ([key, value]) => `${key}: ${value}`,
    );

    return this.deliver({
      to: message.to,
      kind: `security_notice:${message.event}`,
      subject: NOTICE_SUBJECTS[message.event],
      text: [greeting(message.to), '', NOTICE_SUBJECTS[message.event] + '.', ...details].join(
        '\n',
      ),
    });
  }

  private async deliver(mail: OutgoingMail): Promise<EmailDelivery> {
    try {
      const info = await this.transport.sendMail({
        from: this.settings.MAIL_FROM,
        to: mail.to.email,
        subject: mail.subject,
        text: mail.text,
      });
      const messageId = typeof info.messageId === 'string' ? info.messageId : null;

      this.logger.info({ kind: mail.kind, messageId }, 'email dispatched');
      return { sent: true, messageId };
    } catch (error) {
      this.logger.error({ err: error, kind: mail.kind }, 'email delivery failed');
      return { sent: false, messageId: null };
    }
  }
}
