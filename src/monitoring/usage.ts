/**
 * Provider usage ledger: counts every billable external call made during a run.
 *
 * A re-run over an unchanged script should end with an all-zero summary; the
 * pipeline logs this summary at the end of every run.
 */
import { logger } from '../utils/logger.js';

export type UsageEvent =
  | { kind: 'speech'; provider: string; characters: number }
  | { kind: 'asset_upload'; provider: string }
  | { kind: 'video_job'; provider: string };

export interface UsageSummary {
  speechCalls: number;
  speechCharacters: number;
  assetUploads: number;
  videoJobs: number;
  totalCalls: number;
}

export class UsageLedger {
  private readonly events: UsageEvent[] = [];

  record(event: UsageEvent): void {
    this.events.push(event);
    logger.debug('Usage: provider call recorded', { ...event });
  }

  summary(): UsageSummary {
    const count = (kind: UsageEvent['kind']) => this.events.filter(e => e.kind === kind).length;
    const speech = this.events.flatMap(e => (e.kind === 'speech' ? [e] : []));
    return {
      speechCalls:      speech.length,
      speechCharacters: speech.reduce((n, e) => n + e.characters, 0),
      assetUploads:     count('asset_upload'),
      videoJobs:        count('video_job'),
      totalCalls:       this.events.length,
    };
  }

  log(label: string): UsageSummary {
    const summary = this.summary();
    logger.info(`Usage: ${label}`, { ...summary });
    return summary;
  }
}
