export type * from './shared/models';
export * from './shared/utils/attachments';
export * from './shared/utils/csv-parser';
export * from './shared/utils/error-handling';
export * from './shared/utils/logger';
export * from './shared/utils/message-builder';
export * from './shared/utils/progress-tracker';
export * from './shared/utils/smtp-config';
export * from './shared/utils/smtp-relay';
export * from './shared/utils/transport-session';
export * from './shared/utils/validation';
export * from './workers/email-sender';
export * from './workers/campaign-runner';
