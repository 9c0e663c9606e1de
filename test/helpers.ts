// Shared test doubles: silent logger, in-process transporter, instant sleep
import { vi } from 'vitest';
import type Mail from 'nodemailer/lib/mailer';
import type { CampaignContent, RecipientAddress, SMTPCredentials } from '../src/shared/models';
import type { LogContext, Logger } from '../src/shared/utils/logger';
import type { CredentialsProvider, SMTPConfig } from '../src/shared/utils/smtp-config';
import type { SendReceipt } from '../src/shared/utils/transport-session';
import { toRecipientAddress } from '../src/shared/utils/validation';

export function createTestLogger() {
  const logger = {
    debug: vi.fn<(message: string, context?: LogContext) => void>(),
    info: vi.fn<(message: string, context?: LogContext) => void>(),
    warn: vi.fn<(message: string, context?: LogContext) => void>(),
    error: vi.fn<(message: string, context?: LogContext) => void>(),
    child: vi.fn<(context: LogContext) => Logger>()
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export function createFakeTransporter() {
  return {
    verify: vi.fn<() => Promise<true>>().mockResolvedValue(true),
    sendMail: vi.fn<(options: Mail.Options) => Promise<SendReceipt>>(async options => ({
      messageId: `<${String(options.to)}>`
    })),
    close: vi.fn<() => void>()
  };
}

export type FakeTransporter = ReturnType<typeof createFakeTransporter>;

export function createInstantSleep() {
  return vi.fn<(ms: number) => Promise<void>>(async () => undefined);
}

export function addresses(...values: string[]): RecipientAddress[] {
  return values.map(value => {
    const address = toRecipientAddress(value);
    if (!address) {
      throw new Error(`Test address is not valid: ${value}`);
    }
    return address;
  });
}

export function smtpError(message: string, code: string, responseCode?: number): Error {
  return Object.assign(new Error(message), { code, responseCode });
}

export const TEST_CREDENTIALS: SMTPCredentials = {
  username: 'sender@example.com',
  password: 'test-secret',
  fromAddress: 'sender@example.com',
  fromName: 'Campaigns'
};

export const testCredentialsProvider: CredentialsProvider = {
  getCredentials: async () => TEST_CREDENTIALS
};

export const TEST_SMTP_CONFIG: SMTPConfig = {
  host: 'smtp.test.local',
  port: 587,
  secure: false,
  useStartTLS: true,
  auth: { user: 'sender@example.com', pass: 'test-secret' },
  from: { address: 'sender@example.com', name: '' }
};

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);
export const PDF_BYTES = Buffer.from('%PDF-1.4\n%test document\n');

export function campaignContent(overrides: Partial<CampaignContent> = {}): CampaignContent {
  return {
    sender: 'sender@example.com',
    subject: 'Quarterly update',
    htmlBody: '<p>Hello</p>',
    attachments: [],
    ...overrides
  };
}
