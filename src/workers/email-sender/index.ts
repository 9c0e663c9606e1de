// Sequential dispatch with bounded per-recipient retries
import type {
  AttemptResult,
  CampaignContent,
  CampaignState,
  DispatchOutcome,
  RecipientAddress,
  RecipientOutcome,
  SendErrorCategory
} from '../../shared/models';
import {
  BuildOrSendError,
  ConfigurationError,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  getErrorMessage
} from '../../shared/utils/error-handling';
import type { Logger } from '../../shared/utils/logger';
import { type MessageBuilder, buildMessage } from '../../shared/utils/message-builder';
import type { ProgressSink } from '../../shared/utils/progress-tracker';
import type { TransportSession } from '../../shared/utils/transport-session';

export type Sleep = (ms: number) => Promise<void>;

/**
 * Utility function for delays
 */
export const delay: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface DispatchEngineOptions {
  session: Pick<TransportSession, 'send'>;
  logger: Logger;
  sink: ProgressSink;
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
  buildMessage?: MessageBuilder;
}

/**
 * Drives a recipient list to completion, one recipient at a time.
 * A recipient that exhausts its attempts is recorded as failed and the campaign moves on;
 * only an unexpected (non build/send) error aborts the remaining work.
 */
export class DispatchEngine {
  private readonly session: Pick<TransportSession, 'send'>;
  private readonly logger: Logger;
  private readonly sink: ProgressSink;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly buildMessage: MessageBuilder;
  private state: CampaignState = { recipients: [], currentIndex: 0, sentCount: 0, failedCount: 0 };

  constructor(options: DispatchEngineOptions) {
    this.session = options.session;
    this.logger = options.logger;
    this.sink = options.sink;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? delay;
    this.buildMessage = options.buildMessage ?? buildMessage;

    if (!Number.isInteger(this.retryPolicy.maxAttempts) || this.retryPolicy.maxAttempts < 1) {
      throw new ConfigurationError(`maxAttempts must be a positive integer, got ${this.retryPolicy.maxAttempts}`);
    }
  }

  getState(): Readonly<CampaignState> {
    return { ...this.state };
  }

  async dispatch(content: CampaignContent, recipients: readonly RecipientAddress[]): Promise<RecipientOutcome[]> {
    this.logger.debug('Starting email sending process', { recipients: recipients.length });
    this.state = { recipients, currentIndex: 0, sentCount: 0, failedCount: 0 };
    const outcomes: RecipientOutcome[] = [];

    for (let index = 0; index < recipients.length; index++) {
      this.state.currentIndex = index;
      const recipient = recipients[index];
      const outcome = await this.deliver(content, recipient);
      outcomes.push({ recipient, outcome });
    }

    this.state.currentIndex = recipients.length;
    this.sink.onDone();
    return outcomes;
  }

  /**
   * One build+send attempt, reported as a result rather than thrown
   */
  async attemptDelivery(content: CampaignContent, recipient: RecipientAddress): Promise<AttemptResult> {
    try {
      this.logger.debug(`Creating email message for: ${recipient}`);
      const message = this.buildMessage(content, recipient);
      const receipt = await this.session.send(message);
      return { kind: 'sent', messageId: receipt.messageId };
    } catch (error) {
      if (error instanceof BuildOrSendError) {
        return { kind: 'retryable', error, category: error.category };
      }
      return { kind: 'fatal', error };
    }
  }

  private async deliver(content: CampaignContent, recipient: RecipientAddress): Promise<DispatchOutcome> {
    const { maxAttempts, backoffMs, pacingMs } = this.retryPolicy;
    const total = this.state.recipients.length;
    let lastFailure: { message: string; category: SendErrorCategory } = { message: 'not attempted', category: 'sending' };

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const result = await this.attemptDelivery(content, recipient);

      if (result.kind === 'sent') {
        this.state.sentCount++;
        this.logger.info(`Email sent successfully to ${recipient}`, { attempt, messageId: result.messageId });
        this.sink.onInfo(`Sent email to: ${recipient}`);
        this.sink.onProgress(this.state.sentCount / total);
        await this.sleep(pacingMs);
        return { status: 'sent', attempts: attempt, messageId: result.messageId };
      }

      if (result.kind === 'fatal') {
        this.logger.error(`Unexpected error while sending to ${recipient}: ${getErrorMessage(result.error)}`, { attempt });
        throw result.error;
      }

      lastFailure = { message: result.error.message, category: result.category };
      this.logger.error(`Failed to send email to ${recipient}: ${result.error.message}`, {
        attempt,
        category: result.category
      });

      const remaining = maxAttempts - attempt;
      if (remaining > 0) {
        this.logger.debug(`Retrying email to ${recipient}. Attempts remaining: ${remaining}`);
        this.sink.onInfo(`Retrying email to ${recipient}... (${remaining} attempts remaining)`);
        await this.sleep(backoffMs);
      }
    }

    this.state.failedCount++;
    this.logger.error(`Max retries reached for ${recipient}`, { attempts: maxAttempts, category: lastFailure.category });
    this.sink.onInfo(`Failed to send email to ${recipient} after maximum retries`);
    return { status: 'failed', afterAttempts: maxAttempts, lastError: lastFailure.message, category: lastFailure.category };
  }
}
