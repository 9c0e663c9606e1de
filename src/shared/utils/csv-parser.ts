// CSV recipient extraction
import csv from 'csv-parser';
import { Readable } from 'stream';
import type { RawRow, RecipientAddress } from '../models';
import { SchemaError, getErrorMessage } from './error-handling';
import type { Logger } from './logger';
import { toRecipientAddress } from './validation';

export interface RecipientExtractionResult {
  recipients: RecipientAddress[];
  emailColumn: string;
  headers: string[];
  totalRows: number;
  invalidRows: number;
  warnings: string[];
}

/**
 * Returns the first header, in column order, whose name contains "email" (case-insensitive)
 */
export function detectEmailColumn(headers: readonly string[]): string | null {
  return headers.find(header => header.toLowerCase().includes('email')) ?? null;
}

/**
 * Parses CSV content and returns valid recipient addresses in row order.
 * Invalid rows are skipped with a warning; a missing email column rejects with SchemaError.
 */
export async function extractRecipients(csvContent: string | Buffer, logger: Logger): Promise<RecipientExtractionResult> {
  const text = (typeof csvContent === 'string' ? csvContent : csvContent.toString('utf-8')).replace(/^\uFEFF/, '');
  logger.debug('Reading CSV content');

  const result = await new Promise<RecipientExtractionResult>((resolve, reject) => {
    const recipients: RecipientAddress[] = [];
    const warnings: string[] = [];
    let headers: string[] = [];
    let emailColumn: string | null = null;
    let totalRows = 0;
    let invalidRows = 0;
    let settled = false;

    const fail = (error: Error) => {
      if (!settled) {
        settled = true;
        reject(error);
      }
    };

    const parser = csv();

    Readable.from([text])
      .pipe(parser)
      .on('headers', (headerList: string[]) => {
        headers = headerList;
        emailColumn = detectEmailColumn(headers);

        if (!emailColumn) {
          fail(new SchemaError('No email column found in CSV'));
          parser.destroy();
        }
      })
      .on('data', (row: RawRow) => {
        // Blank lines are not records
        if (!emailColumn || Object.values(row).every(value => value === '')) {
          return;
        }
        totalRows++;

        const rawValue = row[emailColumn] ?? '';
        const recipient = toRecipientAddress(rawValue);
        if (!recipient) {
          invalidRows++;
          const warning = `Invalid email found: ${rawValue.trim()}`;
          warnings.push(warning);
          logger.warn(warning, { row: totalRows });
          return;
        }

        recipients.push(recipient);
      })
      .on('end', () => {
        if (!emailColumn) {
          fail(new SchemaError('No email column found in CSV'));
          return;
        }
        if (!settled) {
          settled = true;
          resolve({ recipients, emailColumn, headers, totalRows, invalidRows, warnings });
        }
      })
      .on('error', (error: Error) => {
        fail(new Error(`CSV parsing failed: ${error.message}`));
      });
  }).catch((error: unknown) => {
    logger.error(`Error reading CSV: ${getErrorMessage(error)}`);
    throw error;
  });

  logger.debug(`Found ${result.recipients.length} valid emails`);
  return result;
}
