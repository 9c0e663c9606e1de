// Environment configuration
export const config = {
  // SMTP relay
  smtpHost: process.env.SMTP_HOST || 'smtp.gmail.com',
  smtpPort: parseInt(process.env.SMTP_PORT || '587'),
  useStartTLS: (process.env.SMTP_USE_STARTTLS || 'true') !== 'false',

  // Dispatch pauses; the attempt budget is fixed by DEFAULT_RETRY_POLICY
  retryBackoffMs: parseInt(process.env.RETRY_BACKOFF_MS || '2000'),
  sendPacingMs: parseInt(process.env.SEND_PACING_MS || '1000'),

  // Attachment configuration
  maxAttachmentSize: parseInt(process.env.MAX_ATTACHMENT_SIZE || '10485760'), // 10MB
  allowedAttachmentExtensions: ['jpg', 'jpeg', 'png', 'pdf'],

  debugMode: process.env.DEBUG_MODE === 'true'
};
