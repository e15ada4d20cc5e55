import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { I18nService } from 'nestjs-i18n';
import * as nodemailer from 'nodemailer';
import { Transporter } from 'nodemailer';

/**
 * Outbound SMTP mail. With no `mail.host` configured the transporter stays
 * null and every send is skipped with a warning.
 *
 * Send methods reject on SMTP failure; callers detach them from the request.
 */
@Injectable()
export class MailService implements OnModuleInit {
  private readonly logger = new Logger(MailService.name);
  private transporter: Transporter | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly i18n: I18nService,
  ) {}

  onModuleInit(): void {
    const host = this.configService.get<string>('mail.host');
    const port = this.configService.get<number>('mail.port', 587);
    const user = this.configService.get<string>('mail.user');
    const password = this.configService.get<string>('mail.password');

    if (!host) {
      this.logger.warn(
        'Email configuration is incomplete. Email service will be disabled.',
      );
      return;
    }

    this.transporter = nodemailer.createTransport({
      host,
      port,
      secure: port === 465,
      auth: user ? { user, pass: password } : undefined,
    });

    this.logger.log('Email service initialized');
  }

  async sendVerificationEmail(email: string, verifyUrl: string): Promise<void> {
    const hours = Math.round(
      this.configService.get<number>('jwt.verificationExpiresIn', 86400) / 3600,
    );

    await this.send(email, 'verification', {
      subject: this.i18n.translate('mail.verification.subject'),
      html: `
          <h1>${this.i18n.translate('mail.verification.title')}</h1>
          <p>${this.i18n.translate('mail.verification.body')}</p>
          <a href="${verifyUrl}">${this.i18n.translate('mail.verification.action')}</a>
          <p>${this.i18n.translate('mail.verification.expiry', { args: { hours } })}</p>
        `,
    });
  }

  async sendPasswordResetEmail(email: string, resetUrl: string): Promise<void> {
    const minutes = Math.round(
      this.configService.get<number>('passwordReset.expiresIn', 1800) / 60,
    );

    await this.send(email, 'password reset', {
      subject: this.i18n.translate('mail.passwordReset.subject'),
      html: `
          <h1>${this.i18n.translate('mail.passwordReset.title')}</h1>
          <p>${this.i18n.translate('mail.passwordReset.body')}</p>
          <a href="${resetUrl}">${this.i18n.translate('mail.passwordReset.action')}</a>
          <p>${this.i18n.translate('mail.passwordReset.expiry', { args: { minutes } })}</p>
          <p>${this.i18n.translate('mail.passwordReset.ignore')}</p>
        `,
    });
  }

  private async send(
    to: string,
    kind: string,
    message: { subject: string; html: string },
  ): Promise<void> {
    if (!this.transporter) {
      this.logger.warn(`Email transporter not initialized; ${kind} email to ${to} skipped`);
      return;
    }

    const from =
      this.configService.get<string>('mail.from') ?? 'noreply@example.com';

    try {
      await this.transporter.sendMail({ from, to, ...message });
      this.logger.log(`${kind} email sent to ${to}`);
    } catch (error) {
      this.logger.error(
        `Failed to send ${kind} email to ${to}: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }
  }
}
