// Error taxonomy and retry policy for campaign dispatch
import type { SendErrorCategory } from '../models';

export type SetupStage = 'credentials' | 'connection' | 'encryption' | 'authentication';

export abstract class DispatchError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The CSV has no column whose header mentions "email" */
export class SchemaError extends DispatchError {
  readonly code = 'SCHEMA_ERROR';
}

export class EmptyRecipientListError extends DispatchError {
  readonly code = 'EMPTY_RECIPIENT_LIST';

  constructor() {
    super('No valid email addresses found in CSV');
  }
}

export class CampaignInputError extends DispatchError {
  readonly code = 'CAMPAIGN_INPUT_ERROR';
}

export class ConfigurationError extends DispatchError {
  readonly code = 'CONFIGURATION_ERROR';
}

export class TransportSetupError extends DispatchError {
  readonly code = 'TRANSPORT_SETUP_ERROR';

  constructor(readonly stage: SetupStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Using a session that is not open. Always a programming error. */
export class TransportStateError extends DispatchError {
  readonly code = 'TRANSPORT_STATE_ERROR';
}

/**
 * Per-recipient failure while building or sending one message.
 * Consumed by the retry budget; never escapes the engine.
 */
export abstract class BuildOrSendError extends DispatchError {
  abstract readonly category: SendErrorCategory;
}

export class AttachmentError extends BuildOrSendError {
  readonly code = 'ATTACHMENT_ERROR';
  readonly category = 'attachment';

  constructor(readonly fileName: string, reason: string) {
    super(`Error attaching file ${fileName}: ${reason}`);
  }
}

export class SendError extends BuildOrSendError {
  readonly code = 'SEND_ERROR';

  constructor(
    message: string,
    readonly category: SendErrorCategory,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number; // flat, no growth
  pacingMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: 2000,
  pacingMs: 1000
};

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function getResponseCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'responseCode' in error && typeof error.responseCode === 'number') {
    return error.responseCode;
  }
  return undefined;
}

/**
 * Categorizes SMTP transport errors for logging
 */
export function categorizeSendError(error: unknown): SendErrorCategory {
  if (error instanceof BuildOrSendError) {
    return error.category;
  }

  const code = getErrorCode(error)?.toUpperCase() ?? '';
  const responseCode = getResponseCode(error);
  const message = getErrorMessage(error).toLowerCase();

  if (code === 'EAUTH' || responseCode === 535 || message.includes('auth')) {
    return 'authentication';
  }

  if (code === 'ETIMEDOUT' || message.includes('timeout') || message.includes('timed out')) {
    return 'timeout';
  }

  if (code === 'EENVELOPE' || (responseCode !== undefined && responseCode >= 500) || message.includes('reject')) {
    return 'rejection';
  }

  if (['ECONNECTION', 'ESOCKET', 'EDNS', 'ECONNRESET', 'ECONNREFUSED'].includes(code) || message.includes('connection')) {
    return 'connection';
  }

  return 'sending';
}

/**
 * Maps a failed verify() to the setup step that broke
 */
export function categorizeSetupFailure(error: unknown): SetupStage {
  const code = getErrorCode(error)?.toUpperCase() ?? '';
  const message = getErrorMessage(error).toLowerCase();

  if (code === 'EAUTH' || getResponseCode(error) === 535) {
    return 'authentication';
  }

  if (code === 'ETLS' || message.includes('starttls') || message.includes('tls')) {
    return 'encryption';
  }

  return 'connection';
}
