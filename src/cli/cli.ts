// Command-line front-end for running a campaign
import { promises as fs } from 'fs';
import { parseArgs } from 'util';
import { config } from '../shared/utils/environment';
import { CampaignInputError, getErrorMessage } from '../shared/utils/error-handling';
import { loadAttachments, readCsvFile } from '../shared/utils/file-handler';
import { createConsoleLogger } from '../shared/utils/logger';
import { type ProgressSink, createConsoleProgressSink, summarizeOutcomes } from '../shared/utils/progress-tracker';
import { type CampaignDependencies, runCampaign } from '../workers/campaign-runner';

export const USAGE = `Usage: bulk-mail-dispatch --csv <file> --subject <text> (--body <html> | --body-file <file>) [--attach <file>]... [--debug]`;

export interface CliOptions {
  csvPath: string;
  subject: string;
  body: { html: string } | { file: string };
  attachmentPaths: string[];
  debug: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      csv: { type: 'string' },
      subject: { type: 'string' },
      body: { type: 'string' },
      'body-file': { type: 'string' },
      attach: { type: 'string', multiple: true },
      debug: { type: 'boolean', default: false }
    },
    strict: true
  });

  if (!values.csv) {
    throw new CampaignInputError('Please upload a CSV file');
  }

  const bodyFile = values['body-file'];
  if (values.body !== undefined && bodyFile !== undefined) {
    throw new CampaignInputError('Use either --body or --body-file, not both');
  }

  const body = bodyFile !== undefined ? { file: bodyFile } : { html: values.body ?? '' };

  return {
    csvPath: values.csv,
    subject: values.subject ?? '',
    body,
    attachmentPaths: values.attach ?? [],
    debug: values.debug ?? false
  };
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line)
};

/**
 * Runs the CLI and resolves to the process exit code
 */
export async function main(
  argv: string[],
  io: CliIO = consoleIO,
  overrides: Partial<Omit<CampaignDependencies, 'sink'>> = {}
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    io.err(getErrorMessage(error));
    io.err(USAGE);
    return 2;
  }

  const sink: ProgressSink = createConsoleProgressSink(io.out);
  const logger = overrides.logger ?? createConsoleLogger({ debugMode: options.debug || config.debugMode });

  try {
    const htmlBody = 'html' in options.body ? options.body.html : await fs.readFile(options.body.file, 'utf-8');
    const [csvContent, attachments] = await Promise.all([
      readCsvFile(options.csvPath),
      loadAttachments(options.attachmentPaths)
    ]);

    const report = await runCampaign(
      { csvContent, subject: options.subject, htmlBody, attachments },
      { ...overrides, logger, sink }
    );

    const stats = summarizeOutcomes(report.outcomes);
    io.out(`Sent ${stats.sent} of ${stats.total} emails (${stats.failed} failed)`);
    return 0;
  } catch (error) {
    io.err(`An error occurred: ${getErrorMessage(error)}`);
    return 1;
  }
}
