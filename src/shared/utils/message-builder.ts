// Per-recipient message construction
import type Mail from 'nodemailer/lib/mailer';
import type { CampaignContent, OutboundMessage, RecipientAddress } from '../models';
import { buildAttachmentPart } from './attachments';

export type MessageBuilder = (content: CampaignContent, recipient: RecipientAddress) => OutboundMessage;

/**
 * Builds one HTML message for one recipient. Attachment bytes are shared, not copied.
 * Throws AttachmentError when an attachment cannot be encoded.
 */
export const buildMessage: MessageBuilder = (content, recipient) => {
  return {
    from: content.sender,
    to: recipient,
    subject: content.subject,
    html: content.htmlBody,
    attachments: content.attachments.map(buildAttachmentPart)
  };
};

/**
 * Converts a built message into nodemailer's send options
 */
export function toMailOptions(message: OutboundMessage): Mail.Options {
  return {
    from: message.from,
    to: message.to,
    subject: message.subject,
    html: message.html,
    attachments: message.attachments.map(part => ({
      filename: part.filename,
      content: part.content,
      contentType: part.contentType,
      contentDisposition: part.contentDisposition
    }))
  };
}
