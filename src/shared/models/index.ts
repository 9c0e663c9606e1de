// Shared data models

/**
 * An email address that has passed the address grammar check.
 * Only `toRecipientAddress` produces one.
 */
export type RecipientAddress = string & { readonly __brand: 'RecipientAddress' };

/** One CSV record keyed by header name */
export type RawRow = Record<string, string>;

export interface AttachmentBlob {
  readonly fileName: string;
  readonly bytes: Buffer;
}

export interface AttachmentPart {
  filename: string;
  content: Buffer; // same reference as AttachmentBlob.bytes
  contentType: string;
  contentDisposition: 'attachment';
}

/** Subject, body and attachments shared by every message of a campaign */
export interface CampaignContent {
  sender: string;
  subject: string;
  htmlBody: string;
  attachments: readonly AttachmentBlob[];
}

export interface OutboundMessage {
  from: string;
  to: RecipientAddress;
  subject: string;
  html: string;
  attachments: readonly AttachmentPart[];
}

export type SendErrorCategory =
  | 'authentication'
  | 'connection'
  | 'timeout'
  | 'rejection'
  | 'attachment'
  | 'sending';

export type DispatchOutcome =
  | { status: 'sent'; attempts: number; messageId?: string }
  | { status: 'failed'; afterAttempts: number; lastError: string; category: SendErrorCategory };

export interface RecipientOutcome {
  recipient: RecipientAddress;
  outcome: DispatchOutcome;
}

/** Result of one build+send attempt */
export type AttemptResult =
  | { kind: 'sent'; messageId?: string }
  | { kind: 'retryable'; error: Error; category: SendErrorCategory }
  | { kind: 'fatal'; error: unknown };

export interface CampaignState {
  recipients: readonly RecipientAddress[];
  currentIndex: number;
  sentCount: number;
  failedCount: number;
}

export interface SMTPCredentials {
  username: string;
  password: string;
  fromAddress: string;
  fromName: string;
}

export interface CampaignReport {
  campaignId: string;
  recipients: RecipientAddress[];
  outcomes: RecipientOutcome[];
  warnings: string[];
  startedAt: Date;
  completedAt: Date;
}
