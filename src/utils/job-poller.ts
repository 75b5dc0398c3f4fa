/**
 * Bounded polling for a single asynchronous provider job.
 *
 *   REQUESTED → PROCESSING* → COMPLETED | FAILED
 *             ↘ TIMEOUT (after maxAttempts polls without a terminal state)
 *
 * COMPLETED fetches the result once; a fetch error is fatal for the job.
 * Nothing in here retries: FAILED, TIMEOUT and request/fetch errors all
 * surface to the caller as ProviderError subclasses.
 */
import { setTimeout as delay } from 'node:timers/promises';
import { logger } from './logger.js';
import {
  ProviderJobFailedError,
  ProviderJobTimeoutError,
  ProviderRequestError,
  RenderAbortedError,
  throwIfAborted,
} from './errors.js';

export type JobState = 'REQUESTED' | 'PROCESSING' | 'COMPLETED' | 'FAILED' | 'TIMEOUT';

export type JobStatus =
  | { state: 'processing' }
  | { state: 'completed'; locator: string }
  | { state: 'failed'; reason: string };

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface PollOptions {
  /** Provider name used in errors and logs. */
  provider: string;
  intervalMs: number;
  maxAttempts: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  onTransition?: (state: JobState, attempt: number) => void;
}

export interface JobHandle<T> {
  jobId: string;
  poll: (jobId: string) => Promise<JobStatus>;
  fetchResult: (locator: string) => Promise<T>;
}

export const sleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw new RenderAbortedError(signal.reason);
    throw err;
  }
};

export async function awaitJob<T>(job: JobHandle<T>, opts: PollOptions): Promise<T> {
  const { provider, intervalMs, maxAttempts, signal, onTransition } = opts;
  const wait = opts.sleep ?? sleep;
  const { jobId } = job;

  let state: JobState = 'REQUESTED';
  const enter = (next: JobState, attempt: number) => {
    if (next !== state) logger.debug('Job poller: transition', { provider, jobId, from: state, to: next, attempt });
    state = next;
    onTransition?.(next, attempt);
  };

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    throwIfAborted(signal);

    let status: JobStatus;
    try {
      status = await job.poll(jobId);
    } catch (err) {
      throw new ProviderRequestError(provider, 'poll', err);
    }

    switch (status.state) {
      case 'completed': {
        enter('COMPLETED', attempt);
        logger.info('Job poller: job completed', { provider, jobId, attempt });
        try {
          return await job.fetchResult(status.locator);
        } catch (err) {
          throw new ProviderRequestError(provider, 'fetch', err);
        }
      }
      case 'failed':
        enter('FAILED', attempt);
        throw new ProviderJobFailedError(provider, jobId, status.reason);
      case 'processing':
        enter('PROCESSING', attempt);
        logger.debug('Job poller: still processing', { provider, jobId, attempt, maxAttempts });
        if (attempt < maxAttempts) await wait(intervalMs, signal);
        break;
    }
  }

  enter('TIMEOUT', maxAttempts);
  throw new ProviderJobTimeoutError(provider, jobId, maxAttempts);
}
