// Campaign entry point: extract, open, dispatch, close
import { v4 as uuidv4 } from 'uuid';
import type { AttachmentBlob, CampaignContent, CampaignReport } from '../../shared/models';
import { extractRecipients } from '../../shared/utils/csv-parser';
import { config } from '../../shared/utils/environment';
import {
  ConfigurationError,
  DEFAULT_RETRY_POLICY,
  EmptyRecipientListError,
  type RetryPolicy,
  getErrorMessage
} from '../../shared/utils/error-handling';
import { type Logger, createConsoleLogger } from '../../shared/utils/logger';
import type { MessageBuilder } from '../../shared/utils/message-builder';
import type { ProgressSink } from '../../shared/utils/progress-tracker';
import {
  type CredentialsProvider,
  type SMTPConfig,
  envCredentialsProvider,
  formatSender,
  getSMTPConfig,
  validateSMTPConfig
} from '../../shared/utils/smtp-config';
import { type TransportFactory, TransportSession, createSmtpTransport } from '../../shared/utils/transport-session';
import { validateCampaignContent } from '../../shared/utils/validation';
import { DispatchEngine, type Sleep, delay } from '../email-sender';

export interface CampaignRequest {
  csvContent: string | Buffer;
  subject: string;
  htmlBody: string;
  attachments?: AttachmentBlob[];
}

export interface CampaignDependencies {
  sink: ProgressSink;
  credentials?: CredentialsProvider;
  relay?: Partial<Pick<SMTPConfig, 'host' | 'port' | 'useStartTLS'>>;
  logger?: Logger;
  createTransport?: TransportFactory;
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
  buildMessage?: MessageBuilder;
}

/**
 * Pauses come from the environment; every recipient always gets three attempts
 */
export function retryPolicyFromConfig(): RetryPolicy {
  return {
    maxAttempts: DEFAULT_RETRY_POLICY.maxAttempts,
    backoffMs: config.retryBackoffMs,
    pacingMs: config.sendPacingMs
  };
}

/**
 * Runs one campaign. Fatal errors (schema, empty list, credentials, transport setup,
 * or anything unexpected) are logged once and rethrown; per-recipient failures are
 * reported in the returned outcomes.
 */
export async function runCampaign(request: CampaignRequest, deps: CampaignDependencies): Promise<CampaignReport> {
  const campaignId = uuidv4();
  const startedAt = new Date();
  const logger = (deps.logger ?? createConsoleLogger({ debugMode: config.debugMode })).child({ campaignId });

  try {
    validateCampaignContent(request);

    const extraction = await extractRecipients(request.csvContent, logger);
    if (extraction.recipients.length === 0) {
      throw new EmptyRecipientListError();
    }
    deps.sink.onInfo(`Found ${extraction.recipients.length} valid email addresses`);

    const credentials = await (deps.credentials ?? envCredentialsProvider).getCredentials();
    const smtpConfig = getSMTPConfig(credentials, deps.relay);
    if (!validateSMTPConfig(smtpConfig)) {
      throw new ConfigurationError('Invalid SMTP configuration');
    }

    const content: CampaignContent = {
      sender: formatSender(smtpConfig),
      subject: request.subject,
      htmlBody: request.htmlBody,
      attachments: Object.freeze([...(request.attachments ?? [])])
    };

    const session = new TransportSession(smtpConfig, logger, deps.createTransport ?? createSmtpTransport);
    const engine = new DispatchEngine({
      session,
      logger,
      sink: deps.sink,
      retryPolicy: deps.retryPolicy ?? retryPolicyFromConfig(),
      sleep: deps.sleep ?? delay,
      buildMessage: deps.buildMessage
    });

    await session.open();
    try {
      const outcomes = await engine.dispatch(content, extraction.recipients);
      return {
        campaignId,
        recipients: extraction.recipients,
        outcomes,
        warnings: extraction.warnings,
        startedAt,
        completedAt: new Date()
      };
    } finally {
      session.close();
    }
  } catch (error) {
    logger.error(`Critical error: ${getErrorMessage(error)}`);
    throw error;
  }
}
