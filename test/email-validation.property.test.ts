// Property-based tests for address validation
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { CampaignInputError } from '../src/shared/utils/error-handling';
import {
  getFileExtension,
  isValidEmailFormat,
  toRecipientAddress,
  validateCampaignContent,
  validateFileConstraints
} from '../src/shared/utils/validation';

const localPart = fc.stringMatching(/^[A-Za-z0-9._%+-]{1,20}$/);
const domainPart = fc.stringMatching(/^[A-Za-z0-9.-]{1,20}$/);
const topLevelLabel = fc.stringMatching(/^[A-Za-z]{2,6}$/);

describe('Address Validation Properties', () => {
  it('should accept every string of the form local@domain.tld', () => {
    fc.assert(
      fc.property(localPart, domainPart, topLevelLabel, (local, domain, tld) => {
        expect(isValidEmailFormat(`${local}@${domain}.${tld}`)).toBe(true);
      }),
      { numRuns: 200 }
    );
  });

  it('should reject any string without an @', () => {
    fc.assert(
      fc.property(fc.string().filter(s => !s.includes('@')), value => {
        expect(isValidEmailFormat(value)).toBe(false);
      }),
      { numRuns: 200 }
    );
  });

  it('should reject addresses whose final label is shorter than two letters', () => {
    fc.assert(
      fc.property(localPart, domainPart, fc.stringMatching(/^[A-Za-z]$/), (local, domain, label) => {
        expect(isValidEmailFormat(`${local}@${domain}.${label}`)).toBe(false);
      }),
      { numRuns: 200 }
    );
  });

  it('should produce the trimmed address for padded valid input', () => {
    fc.assert(
      fc.property(
        localPart,
        domainPart,
        topLevelLabel,
        fc.stringMatching(/^[ \t]{0,3}$/),
        (local, domain, tld, padding) => {
          const address = `${local}@${domain}.${tld}`;
          expect(toRecipientAddress(`${padding}${address}${padding}`)).toBe(address);
        }
      ),
      { numRuns: 100 }
    );
  });
});

describe('Address Validation Examples', () => {
  it('should classify common inputs', () => {
    expect(isValidEmailFormat('a@x.com')).toBe(true);
    expect(isValidEmailFormat('user.name+tag@sub.example.co.uk')).toBe(true);
    expect(isValidEmailFormat('bad')).toBe(false);
    expect(isValidEmailFormat('a@x.c')).toBe(false);
    expect(isValidEmailFormat('a@x.c0m')).toBe(false);
    expect(isValidEmailFormat('a@@x.com')).toBe(false);
    expect(isValidEmailFormat(' a@x.com')).toBe(false);
    expect(isValidEmailFormat('')).toBe(false);
  });

  it('should return null for missing or invalid cells', () => {
    expect(toRecipientAddress(undefined)).toBeNull();
    expect(toRecipientAddress(null)).toBeNull();
    expect(toRecipientAddress('   ')).toBeNull();
    expect(toRecipientAddress('not-an-address')).toBeNull();
  });
});

describe('Campaign Input Validation', () => {
  it('should require both subject and body', () => {
    expect(() => validateCampaignContent({ subject: '', htmlBody: '<p>Hi</p>' })).toThrow(CampaignInputError);
    expect(() => validateCampaignContent({ subject: 'Hi', htmlBody: '   ' })).toThrow('Please fill in both subject and content');
    expect(() => validateCampaignContent({ subject: 'Hi', htmlBody: '<p>Hi</p>' })).not.toThrow();
  });

  it('should check attachment extension before size', () => {
    const allowed = ['pdf', 'png'];
    expect(validateFileConstraints({ name: 'report.PDF', size: 10 }, 100, allowed)).toEqual({ isValid: true });
    expect(validateFileConstraints({ name: 'notes.txt', size: 10 }, 100, allowed)).toEqual({
      isValid: false,
      error: 'Invalid file type. Allowed types: pdf, png'
    });
    expect(validateFileConstraints({ name: 'scan.png', size: 3 * 1024 * 1024 }, 2 * 1024 * 1024, allowed)).toEqual({
      isValid: false,
      error: 'File size exceeds maximum allowed size of 2MB'
    });
  });

  it('should extract lower-cased file extensions', () => {
    expect(getFileExtension('photo.JPG')).toBe('jpg');
    expect(getFileExtension('archive.tar.gz')).toBe('gz');
    expect(getFileExtension('README')).toBe('');
    expect(getFileExtension('.hidden')).toBe('');
    expect(getFileExtension('trailing.')).toBe('');
  });
});
