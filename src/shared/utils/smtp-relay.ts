// A single SMTP connection kept open across every message of a campaign
import MailComposer from 'nodemailer/lib/mail-composer';
import type Mail from 'nodemailer/lib/mailer';
import SMTPConnection from 'nodemailer/lib/smtp-connection';
import type { MailTransporter, SendReceipt } from './transport-session';

export interface RelayOptions {
  host: string;
  port: number;
  secure: boolean;
  requireTLS: boolean;
  auth: { user: string; pass: string };
}

/**
 * verify() connects, upgrades to TLS and logs in once; sendMail() reuses that
 * connection; close() sends QUIT.
 */
export class SmtpRelayConnection implements MailTransporter {
  private readonly connection: SMTPConnection;
  private authenticated = false;
  private ended = false;
  // Set when the relay drops an idle connection; reported by the next send
  private failure: Error | null = null;

  constructor(private readonly options: RelayOptions) {
    this.connection = new SMTPConnection({
      host: options.host,
      port: options.port,
      secure: options.secure,
      requireTLS: options.requireTLS
    });
    this.connection.on('error', (error: Error) => {
      this.failure = error;
    });
    this.connection.on('end', () => {
      this.ended = true;
    });
  }

  async verify(): Promise<true> {
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.connection.once('error', onError);
      this.connection.connect(error => {
        this.connection.removeListener('error', onError);
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });

    await new Promise<void>((resolve, reject) => {
      this.connection.login(this.options.auth, error => (error ? reject(error) : resolve()));
    });

    this.authenticated = true;
    return true;
  }

  async sendMail(mail: Mail.Options): Promise<SendReceipt> {
    if (this.failure) {
      throw this.failure;
    }

    const mime = new MailComposer(mail).compile();
    const messageId = mime.messageId();
    const envelope = mime.getEnvelope();
    const raw = await new Promise<Buffer>((resolve, reject) => {
      mime.build((error, message) => (error ? reject(error) : resolve(message)));
    });

    try {
      const info = await new Promise<SMTPConnection.SentMessageInfo>((resolve, reject) => {
        this.connection.send(envelope, raw, (error, sent) => (error ? reject(error) : resolve(sent)));
      });
      return { messageId, rejected: info.rejected };
    } catch (error) {
      await this.resetTransaction();
      throw error;
    }
  }

  close(): void {
    if (this.ended) {
      return;
    }
    if (this.authenticated) {
      this.connection.quit();
    } else {
      this.connection.close();
    }
  }

  /** RSET after a failed transaction so the next message starts clean */
  private resetTransaction(): Promise<void> {
    if (this.ended) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      const onEnd = () => resolve();
      this.connection.once('end', onEnd);
      this.connection.reset(error => {
        this.connection.removeListener('end', onEnd);
        if (error) {
          this.failure = error;
        }
        resolve();
      });
    });
  }
}
