// Data validation utilities
import type { CampaignContent, RecipientAddress } from '../models';
import { CampaignInputError } from './error-handling';

const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

/**
 * Validates email format: local-part@domain.tld with a final label of two or more letters
 */
export function isValidEmailFormat(email: string): boolean {
  if (!email || typeof email !== 'string') {
    return false;
  }

  return EMAIL_PATTERN.test(email);
}

/**
 * Trims and validates a raw cell value, returning null when it is not an address
 */
export function toRecipientAddress(value: string | undefined | null): RecipientAddress | null {
  const trimmed = (value ?? '').trim();
  if (!isValidEmailFormat(trimmed)) {
    return null;
  }
  return trimmed as RecipientAddress;
}

export function validateCampaignContent(content: Pick<CampaignContent, 'subject' | 'htmlBody'>): void {
  if (!content.subject.trim() || !content.htmlBody.trim()) {
    throw new CampaignInputError('Please fill in both subject and content');
  }
}

/**
 * Validates file extension and size constraints
 */
export function validateFileConstraints(
  file: { name: string; size: number },
  maxSize: number,
  allowedExtensions: readonly string[]
): { isValid: boolean; error?: string } {
  const extension = getFileExtension(file.name);
  if (!allowedExtensions.includes(extension)) {
    return {
      isValid: false,
      error: `Invalid file type. Allowed types: ${allowedExtensions.join(', ')}`
    };
  }

  if (file.size > maxSize) {
    return {
      isValid: false,
      error: `File size exceeds maximum allowed size of ${Math.round(maxSize / 1024 / 1024)}MB`
    };
  }

  return { isValid: true };
}

export function getFileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  if (dot <= 0 || dot === fileName.length - 1) {
    return '';
  }
  return fileName.slice(dot + 1).toLowerCase();
}
