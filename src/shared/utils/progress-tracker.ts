// Progress reporting for a running campaign
import type { RecipientOutcome } from '../models';

/**
 * Receives campaign status events. Any renderer (console, web UI, log file) implements this.
 */
export interface ProgressSink {
  onInfo(text: string): void;
  onProgress(fraction: number): void;
  onDone(): void;
}

export type ProgressEvent =
  | { type: 'info'; text: string }
  | { type: 'progress'; value: number }
  | { type: 'done' };

/**
 * Keeps every event in order; used by callers that render after the fact
 */
export class RecordingProgressSink implements ProgressSink {
  readonly events: ProgressEvent[] = [];

  onInfo(text: string): void {
    this.events.push({ type: 'info', text });
  }

  onProgress(value: number): void {
    this.events.push({ type: 'progress', value });
  }

  onDone(): void {
    this.events.push({ type: 'done' });
  }

  get progressValues(): number[] {
    return this.events.flatMap(event => (event.type === 'progress' ? [event.value] : []));
  }

  get infoMessages(): string[] {
    return this.events.flatMap(event => (event.type === 'info' ? [event.text] : []));
  }
}

export function createConsoleProgressSink(write: (line: string) => void = line => console.log(line)): ProgressSink {
  return {
    onInfo: text => write(text),
    onProgress: fraction => write(`Progress: ${Math.round(fraction * 100)}%`),
    onDone: () => write('Email campaign completed!')
  };
}

export interface CampaignStatistics {
  total: number;
  sent: number;
  failed: number;
  successRate: number; // percentage
}

/**
 * Derives sent/failed counts from per-recipient outcomes
 */
export function summarizeOutcomes(outcomes: readonly RecipientOutcome[]): CampaignStatistics {
  const total = outcomes.length;
  const sent = outcomes.filter(({ outcome }) => outcome.status === 'sent').length;
  const failed = total - sent;
  const successRate = total > 0 ? (sent / total) * 100 : 0;

  return { total, sent, failed, successRate };
}
