/**
 * Paragraph renderer: one paragraph → one cached avatar video.
 *
 * Order of checks:
 *   1. actor profile lookup (unknown actor → skipped);
 *   2. paragraph-video cache (hit → done, no audio work at all);
 *   3. speech: native voice sends text to the video provider, otherwise the
 *      paragraph-audio tier is consulted and filled first;
 *   4. submit → poll → fetch into a private path → publish.
 * Provider errors are returned as a `failed` outcome. Anything else, such as
 * an abort or a CacheWriteError, escapes to the scene.
 */
import * as fs from 'fs';
import { logger } from '../utils/logger.js';
import { awaitJob } from '../utils/job-poller.js';
import { paragraphDigest } from '../utils/hash.js';
import { ProviderError, ProviderRequestError, UnknownActorError } from '../utils/errors.js';
import { ensureParagraphAudio } from './speech.js';
import { videoStamp } from './stamps.js';
import type { ActorProfile } from '../actors.js';
import type { AvatarSpeech } from '../ai/heygen.js';
import type { ParagraphKey } from '../cache/scene-cache.js';
import type { Paragraph, Scene } from '../script/types.js';
import type { RenderContext } from './context.js';

export type ParagraphOutcome =
  | { status: 'rendered'; paragraph: Paragraph; videoPath: string; cached: boolean }
  | { status: 'skipped'; paragraph: Paragraph; error: UnknownActorError }
  | { status: 'failed'; paragraph: Paragraph; error: ProviderError };

function preview(text: string): string {
  return text.length > 30 ? `${text.slice(0, 30)}...` : text;
}

async function speechFor(ctx: RenderContext, key: ParagraphKey, profile: ActorProfile): Promise<AvatarSpeech> {
  const { audio } = profile;
  switch (audio.provider) {
    case 'heygen':
      return { kind: 'text', text: key.paragraph.text, voiceId: audio.voiceId };
    case 'elevenlabs':
      return { kind: 'audio', audioPath: await ensureParagraphAudio(ctx, key, audio) };
  }
}

async function produceVideo(ctx: RenderContext, key: ParagraphKey, profile: ActorProfile): Promise<string> {
  const tier = ctx.cache.paragraphVideo;
  const speech = await speechFor(ctx, key, profile);

  let jobId: string;
  try {
    jobId = await ctx.avatar.submit(speech, profile.video);
  } catch (err) {
    throw new ProviderRequestError(ctx.avatar.name, 'submit', err);
  }
  ctx.usage.record({ kind: 'video_job', provider: ctx.avatar.name });
  logger.info('Paragraph: video job submitted', { actor: key.paragraph.actor, jobId, speech: speech.kind });

  const tmp = tier.tempPathFor(key);
  try {
    await awaitJob(
      {
        jobId,
        poll:        id => ctx.avatar.poll(id),
        fetchResult: locator => ctx.avatar.fetch(locator, tmp),
      },
      {
        provider:    ctx.avatar.name,
        intervalMs:  ctx.poll.intervalMs,
        maxAttempts: ctx.poll.maxAttempts,
        signal:      ctx.signal,
        sleep:       ctx.sleep,
      },
    );
    return tier.publish(key, tmp, videoStamp(profile, ctx.dimension), { jobId, speech: speech.kind });
  } finally {
    fs.rmSync(tmp, { force: true });
  }
}

export async function renderParagraph(
  ctx: RenderContext,
  scene: Scene,
  paragraph: Paragraph,
): Promise<ParagraphOutcome> {
  const profile = ctx.actors.get(paragraph.actor);
  if (!profile) {
    const error = new UnknownActorError(paragraph.actor);
    logger.warn('Paragraph: skipped, no actor profile', { actor: paragraph.actor, text: preview(paragraph.text) });
    return { status: 'skipped', paragraph, error };
  }

  const key: ParagraphKey = { scene, paragraph };
  const tier = ctx.cache.paragraphVideo;

  if (tier.exists(key, videoStamp(profile, ctx.dimension))) {
    const videoPath = tier.pathFor(key);
    logger.info('Paragraph: video cache hit', { actor: paragraph.actor, videoPath });
    return { status: 'rendered', paragraph, videoPath, cached: true };
  }

  logger.info('Paragraph: rendering', {
    actor:  paragraph.actor,
    digest: paragraphDigest(paragraph),
    text:   preview(paragraph.text),
  });

  try {
    const videoPath = await produceVideo(ctx, key, profile);
    logger.info('Paragraph: video cached', { actor: paragraph.actor, videoPath });
    return { status: 'rendered', paragraph, videoPath, cached: false };
  } catch (error) {
    if (!(error instanceof ProviderError)) throw error;
    logger.error('Paragraph: dropped after provider failure', {
      actor: paragraph.actor,
      text:  preview(paragraph.text),
      kind:  error.kind,
      error: error.message,
    });
    return { status: 'failed', paragraph, error };
  }
}
