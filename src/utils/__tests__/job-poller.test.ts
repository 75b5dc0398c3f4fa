import { describe, it, expect, vi } from 'vitest';
import { awaitJob, type JobState, type JobStatus } from '../job-poller.js';
import {
  ProviderJobFailedError,
  ProviderJobTimeoutError,
  ProviderRequestError,
  RenderAbortedError,
} from '../errors.js';

function scriptedJob(statuses: JobStatus[]) {
  const poll = vi.fn(async (): Promise<JobStatus> => statuses.shift() ?? { state: 'processing' });
  const fetchResult = vi.fn(async (locator: string) => `downloaded ${locator}`);
  return { jobId: 'job-1', poll, fetchResult };
}

const options = () => ({
  provider:    'heygen',
  intervalMs:  10_000,
  maxAttempts: 3,
  sleep:       vi.fn(async () => undefined),
});

describe('awaitJob', () => {
  it('polls until completed, then fetches the result once', async () => {
    const job = scriptedJob([
      { state: 'processing' },
      { state: 'processing' },
      { state: 'completed', locator: 'https://cdn.test/v.mp4' },
    ]);
    const opts = options();

    await expect(awaitJob(job, opts)).resolves.toBe('downloaded https://cdn.test/v.mp4');
    expect(job.poll).toHaveBeenCalledTimes(3);
    expect(job.poll).toHaveBeenCalledWith('job-1');
    expect(job.fetchResult).toHaveBeenCalledTimes(1);
    expect(opts.sleep).toHaveBeenCalledTimes(2);
    expect(opts.sleep).toHaveBeenCalledWith(10_000, undefined);
  });

  it('raises the provider-reported failure immediately', async () => {
    const job = scriptedJob([{ state: 'failed', reason: 'avatar not found' }]);
    const opts = options();

    const err = await awaitJob(job, opts).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderJobFailedError);
    expect(err).toMatchObject({ jobId: 'job-1', reason: 'avatar not found', scope: 'paragraph' });
    expect(opts.sleep).not.toHaveBeenCalled();
    expect(job.fetchResult).not.toHaveBeenCalled();
  });

  it('times out after maxAttempts polls without sleeping after the last one', async () => {
    const job = scriptedJob([]);
    const opts = options();

    const err = await awaitJob(job, opts).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderJobTimeoutError);
    expect(err).toMatchObject({ attempts: 3, message: 'heygen: job job-1 not finished after 3 poll attempts' });
    expect(job.poll).toHaveBeenCalledTimes(3);
    expect(opts.sleep).toHaveBeenCalledTimes(2);
  });

  it('wraps a poll request error', async () => {
    const job = scriptedJob([]);
    job.poll.mockRejectedValueOnce(new Error('socket hang up'));

    const err = await awaitJob(job, options()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderRequestError);
    expect(err).toMatchObject({ stage: 'poll', message: 'heygen: poll failed: socket hang up' });
  });

  it('treats a fetch error as fatal for the job', async () => {
    const job = scriptedJob([{ state: 'completed', locator: 'https://cdn.test/v.mp4' }]);
    job.fetchResult.mockRejectedValueOnce(new Error('disk full'));

    const err = await awaitJob(job, options()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderRequestError);
    expect(err).toMatchObject({ stage: 'fetch' });
    expect(job.poll).toHaveBeenCalledTimes(1);
  });

  it('stops before polling when the signal is already aborted', async () => {
    const job = scriptedJob([]);
    const controller = new AbortController();
    controller.abort();

    await expect(awaitJob(job, { ...options(), signal: controller.signal })).rejects.toBeInstanceOf(RenderAbortedError);
    expect(job.poll).not.toHaveBeenCalled();
  });

  it('reports state transitions', async () => {
    const job = scriptedJob([{ state: 'processing' }, { state: 'completed', locator: 'loc' }]);
    const seen: Array<[JobState, number]> = [];

    await awaitJob(job, { ...options(), onTransition: (state, attempt) => seen.push([state, attempt]) });
    expect(seen).toEqual([['PROCESSING', 1], ['COMPLETED', 2]]);
  });

  it('aborts a real sleep when the signal fires', async () => {
    const job = scriptedJob([]);
    const controller = new AbortController();
    const pending = awaitJob(job, { provider: 'heygen', intervalMs: 60_000, maxAttempts: 5, signal: controller.signal });
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toBeInstanceOf(RenderAbortedError);
    expect(job.poll).toHaveBeenCalledTimes(1);
  });
});
