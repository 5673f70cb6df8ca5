import winston from 'winston';

export interface OutgoingEmail {
  from: string;
  to: string;
  subject: string;
  body: string;
}

export interface EmailSettings {
  from: string;
  publicBaseUrl: string;
}

/**
 * Renders account emails and hands them to the log transport. Swap
 * `deliver` for an SMTP client to send for real.
 */
export class EmailService {
  private settings: EmailSettings;
  private logger: winston.Logger;

  constructor(settings: EmailSettings, loggerInstance: winston.Logger) {
    this.settings = settings;
    this.logger = loggerInstance;
  }

  async sendVerificationEmail(to: string, username: string, token: string, correlationId?: string): Promise<OutgoingEmail> {
    const link = `${this.settings.publicBaseUrl}/api/auth/verify-email?token=${encodeURIComponent(token)}`;
    return this.deliver({
      from: this.settings.from,
      to,
      subject: 'Verify your email address',
      body: `Hi ${username},\n\nConfirm your email address by opening ${link}\n\nThe link expires in 24 hours.`,
    }, correlationId);
  }

  async sendPasswordResetEmail(to: string, username: string, token: string, correlationId?: string): Promise<OutgoingEmail> {
    const link = `${this.settings.publicBaseUrl}/api/auth/password/reset/confirm?token=${encodeURIComponent(token)}`;
    return this.deliver({
      from: this.settings.from,
      to,
      subject: 'Reset your password',
      body: `Hi ${username},\n\nReset your password by opening ${link}\n\nThe link expires in 1 hour. Ignore this email if you did not ask for it.`,
    }, correlationId);
  }

  protected async deliver(email: OutgoingEmail, correlationId?: string): Promise<OutgoingEmail> {
    this.logger.info(`EmailService: ${email.subject}`, { correlationId, to: email.to, body: email.body, type: 'EmailLog.Outgoing' });
    return email;
  }
}
