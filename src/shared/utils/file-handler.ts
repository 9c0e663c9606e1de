// File handling utilities
import { promises as fs } from 'fs';
import { basename } from 'path';
import type { AttachmentBlob } from '../models';
import { config } from './environment';
import { ConfigurationError } from './error-handling';
import { validateFileConstraints } from './validation';

export interface FileInfo {
  name: string;
  size: number;
}

export interface FileValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Validates an attachment file against type and size constraints
 */
export function validateAttachmentFile(fileInfo: FileInfo): FileValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const constraints = validateFileConstraints(fileInfo, config.maxAttachmentSize, config.allowedAttachmentExtensions);
  if (!constraints.isValid && constraints.error) {
    errors.push(constraints.error);
  }

  if (fileInfo.size === 0) {
    errors.push('File is empty');
  }

  // Size warnings
  if (fileInfo.size > config.maxAttachmentSize * 0.8) {
    warnings.push('File is close to maximum size limit');
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Reads attachment files in the given order
 */
export async function loadAttachments(filePaths: readonly string[]): Promise<AttachmentBlob[]> {
  const attachments: AttachmentBlob[] = [];

  for (const filePath of filePaths) {
    const bytes = await fs.readFile(filePath);
    const fileName = basename(filePath);
    const validation = validateAttachmentFile({ name: fileName, size: bytes.length });

    if (!validation.isValid) {
      throw new ConfigurationError(`Attachment ${fileName} rejected: ${validation.errors.join('; ')}`);
    }

    attachments.push({ fileName, bytes });
  }

  return attachments;
}

export async function readCsvFile(filePath: string): Promise<Buffer> {
  return fs.readFile(filePath);
}
