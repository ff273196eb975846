import nodemailer, { Transporter } from 'nodemailer';

export interface Notifier {
  /** Resolves false on any failure; never rejects. */
  sendConfirmation(email: string, name: string, docName: string): Promise<boolean>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  user?: string;
  password?: string;
  from?: string;
}

export type TransportFactory = (settings: SmtpSettings & { user: string; password: string }) => Transporter;

// STARTTLS on the submission port.
const smtpTransport: TransportFactory = (settings) =>
  nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: false,
    requireTLS: true,
    auth: { user: settings.user, pass: settings.password },
  });

export function confirmationText(name: string, docName: string): string {
  return [
    `Dear ${name},`,
    '',
    `We have received your request for: ${docName}.`,
    'Our team will search the registry records and contact you within 24-48 hours.',
    '',
    'Thank you,',
    'Deed Gap Report',
  ].join('\n');
}

export class SmtpNotifier implements Notifier {
  private transporter: Transporter | null = null;

  constructor(
    private settings: SmtpSettings,
    private createTransport: TransportFactory = smtpTransport,
  ) {}

  get configured(): boolean {
    return Boolean(this.settings.user && this.settings.password);
  }

  async sendConfirmation(email: string, name: string, docName: string): Promise<boolean> {
    const { user, password } = this.settings;
    if (!user || !password) {
      console.warn('Email not configured; skipping confirmation');
      return false;
    }

    try {
      if (!this.transporter) {
        this.transporter = this.createTransport({ ...this.settings, user, password });
      }
      await this.transporter.sendMail({
        from: this.settings.from ?? user,
        to: email,
        subject: `Request received: ${docName}`,
        text: confirmationText(name, docName),
      });
      return true;
    } catch (error) {
      console.error('Confirmation email failed:', error);
      return false;
    }
  }
}
