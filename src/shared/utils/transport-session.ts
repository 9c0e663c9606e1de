// One authenticated, encrypted SMTP connection per campaign
import type Mail from 'nodemailer/lib/mailer';
import type { OutboundMessage } from '../models';
import {
  SendError,
  TransportSetupError,
  TransportStateError,
  categorizeSendError,
  categorizeSetupFailure,
  getErrorMessage
} from './error-handling';
import type { Logger } from './logger';
import { toMailOptions } from './message-builder';
import type { SMTPConfig } from './smtp-config';
import { type RelayOptions, SmtpRelayConnection } from './smtp-relay';

export interface SendReceipt {
  messageId: string;
  rejected?: Array<string | Mail.Address>;
}

/** One relay connection: verify() connects and authenticates it, sendMail() reuses it */
export interface MailTransporter {
  verify(): Promise<true>;
  sendMail(options: Mail.Options): Promise<SendReceipt>;
  close(): void;
}

export type TransportFactory = (options: RelayOptions) => MailTransporter;

export const createSmtpTransport: TransportFactory = options => new SmtpRelayConnection(options);

export class TransportSession {
  private transporter: MailTransporter | null = null;

  constructor(
    private readonly smtpConfig: SMTPConfig,
    private readonly logger: Logger,
    private readonly createTransport: TransportFactory = createSmtpTransport
  ) {}

  get isOpen(): boolean {
    return this.transporter !== null;
  }

  /**
   * Connects, upgrades to TLS and authenticates. Any failure is fatal for the campaign.
   */
  async open(): Promise<void> {
    if (this.transporter) {
      throw new TransportStateError('Transport session is already open');
    }

    const { host, port, secure, useStartTLS, auth } = this.smtpConfig;
    this.logger.debug('Setting up SMTP connection', { host, port });

    let transporter: MailTransporter;
    try {
      transporter = this.createTransport({
        host,
        port,
        secure,
        requireTLS: useStartTLS,
        auth: { user: auth.user, pass: auth.pass }
      });
    } catch (error) {
      this.logger.error(`SMTP setup failed: ${getErrorMessage(error)}`);
      throw new TransportSetupError('connection', `SMTP setup failed: ${getErrorMessage(error)}`, { cause: error });
    }

    try {
      await transporter.verify();
    } catch (error) {
      transporter.close();
      const stage = categorizeSetupFailure(error);
      this.logger.error(`SMTP setup failed: ${getErrorMessage(error)}`, { stage });
      throw new TransportSetupError(stage, `SMTP setup failed during ${stage}: ${getErrorMessage(error)}`, { cause: error });
    }

    this.transporter = transporter;
    this.logger.info('SMTP connection established successfully', { host, port });
  }

  /**
   * Hands one message to the relay. Does not retry.
   */
  async send(message: OutboundMessage): Promise<SendReceipt> {
    if (!this.transporter) {
      throw new TransportStateError('Transport session is not open');
    }

    let receipt: SendReceipt;
    try {
      receipt = await this.transporter.sendMail(toMailOptions(message));
    } catch (error) {
      throw new SendError(getErrorMessage(error), categorizeSendError(error), { cause: error });
    }

    if (receipt.rejected && receipt.rejected.length > 0) {
      throw new SendError(`Relay rejected recipient ${message.to}`, 'rejection');
    }

    return receipt;
  }

  /**
   * Releases the connection. A no-op when the session never opened or is already closed.
   */
  close(): void {
    if (!this.transporter) {
      return;
    }
    this.transporter.close();
    this.transporter = null;
    this.logger.debug('SMTP connection closed');
  }
}
