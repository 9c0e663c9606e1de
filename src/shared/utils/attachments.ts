// Attachment typing: content type from file extension, checked against the file's leading bytes
import type { AttachmentBlob, AttachmentPart } from '../models';
import { AttachmentError } from './error-handling';
import { getFileExtension } from './validation';

const EXTENSION_CONTENT_TYPES: Partial<Record<string, string>> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
  bmp: 'image/bmp',
  pdf: 'application/pdf',
  txt: 'text/plain',
  csv: 'text/csv',
  html: 'text/html',
  zip: 'application/zip',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document'
};

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

function startsWith(bytes: Buffer, signature: readonly number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) {
    return false;
  }
  return signature.every((byte, index) => bytes[offset + index] === byte);
}

const ascii = (text: string): number[] => Array.from(text, char => char.charCodeAt(0));

/**
 * Detects a content type from magic numbers, or null when the format is not recognised
 */
export function sniffContentType(bytes: Buffer): string | null {
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) {
    return 'image/png';
  }
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) {
    return 'image/jpeg';
  }
  if (startsWith(bytes, ascii('GIF87a')) || startsWith(bytes, ascii('GIF89a'))) {
    return 'image/gif';
  }
  if (startsWith(bytes, ascii('RIFF')) && startsWith(bytes, ascii('WEBP'), 8)) {
    return 'image/webp';
  }
  if (startsWith(bytes, ascii('BM'))) {
    return 'image/bmp';
  }
  if (startsWith(bytes, ascii('%PDF-'))) {
    return 'application/pdf';
  }
  if (startsWith(bytes, [0x50, 0x4b, 0x03, 0x04])) {
    return 'application/zip';
  }
  return null;
}

/**
 * Chooses the MIME type for an attachment.
 * Image extensions must carry image bytes; other known extensions are trusted;
 * unknown ones fall back to sniffing and then to application/octet-stream.
 */
export function resolveAttachmentContentType(fileName: string, bytes: Buffer): string {
  if (bytes.length === 0) {
    throw new AttachmentError(fileName, 'file is empty');
  }

  const declared = EXTENSION_CONTENT_TYPES[getFileExtension(fileName)];
  const sniffed = sniffContentType(bytes);

  if (declared?.startsWith('image/')) {
    if (!sniffed?.startsWith('image/')) {
      throw new AttachmentError(fileName, `content is not a valid ${declared} image`);
    }
    return sniffed;
  }

  return declared ?? sniffed ?? DEFAULT_CONTENT_TYPE;
}

export function buildAttachmentPart(blob: AttachmentBlob): AttachmentPart {
  return {
    filename: blob.fileName,
    content: blob.bytes,
    contentType: resolveAttachmentContentType(blob.fileName, blob.bytes),
    contentDisposition: 'attachment'
  };
}
