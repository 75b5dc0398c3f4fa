/**
 * Scene narration audio: the scene-audio-complete tier.
 *
 * Only externally voiced paragraphs have standalone audio; native-voice and
 * unknown actors are left out with a warning. The tier's derived existence
 * check is evaluated against exactly the paragraphs that would be included.
 */
import * as fs from 'fs';
import { logger } from '../utils/logger.js';
import { sceneDigest } from '../utils/hash.js';
import {
  CompositionError,
  ProviderError,
  SceneEmptyError,
  throwIfAborted,
} from '../utils/errors.js';
import { ensureParagraphAudio } from './speech.js';
import { SCENE_AUDIO_STAMP, audioStamp } from './stamps.js';
import type { ElevenLabsVoice } from '../actors.js';
import type { Paragraph, Scene } from '../script/types.js';
import type { RenderContext } from './context.js';

export interface SceneAudioResult {
  scene: Scene;
  digest: string;
  path: string;
  cached: boolean;
  /** Paragraphs that contributed audio, in document order. */
  included: Paragraph[];
  /** Paragraphs left out: no profile, native voice, or a synthesis failure. */
  omitted: Paragraph[];
}

function externalVoice(ctx: RenderContext, paragraph: Paragraph): ElevenLabsVoice | null {
  const profile = ctx.actors.get(paragraph.actor);
  if (!profile) {
    logger.warn('Scene audio: skipped, no actor profile', { actor: paragraph.actor });
    return null;
  }
  if (profile.audio.provider !== 'elevenlabs') {
    logger.warn('Scene audio: skipped, actor is voiced by the video provider', { actor: paragraph.actor });
    return null;
  }
  return profile.audio;
}

export async function renderSceneAudio(ctx: RenderContext, scene: Scene): Promise<SceneAudioResult> {
  const tier = ctx.cache.sceneAudioComplete;
  const digest = sceneDigest(scene);

  const voiced = scene.paragraphs.flatMap(paragraph => {
    const voice = externalVoice(ctx, paragraph);
    return voice ? [{ paragraph, voice }] : [];
  });
  const candidates = voiced.map(v => v.paragraph);
  const constituents = voiced.map(({ paragraph, voice }) => ({ paragraph, stamp: audioStamp(voice) }));

  if (candidates.length > 0 && tier.exists(scene, SCENE_AUDIO_STAMP, constituents)) {
    const path = tier.pathFor(scene);
    logger.info('Scene audio: cache hit', { digest, path });
    return {
      scene, digest, path, cached: true,
      included: candidates,
      omitted:  scene.paragraphs.filter(p => !candidates.includes(p)),
    };
  }

  const included: Paragraph[] = [];
  const files: string[] = [];
  for (const { paragraph, voice } of voiced) {
    throwIfAborted(ctx.signal);
    try {
      files.push(await ensureParagraphAudio(ctx, { scene, paragraph }, voice));
      included.push(paragraph);
    } catch (err) {
      if (!(err instanceof ProviderError)) throw err;
      logger.error('Scene audio: paragraph dropped', { actor: paragraph.actor, error: err.message });
    }
  }

  if (files.length === 0) throw new SceneEmptyError(digest, scene.paragraphs.length);

  const tmp = tier.tempPathFor(scene);
  try {
    await ctx.compositor.concatenate(files, tmp, 'copy');
    if (!fs.existsSync(tmp)) throw new Error(`compositor produced no output at ${tmp}`);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw new CompositionError(digest, err);
  }

  const omitted = scene.paragraphs.filter(p => !included.includes(p));
  const path = tier.publishConcatenation(scene, tmp, SCENE_AUDIO_STAMP, included, {
    paragraphs: included.length,
    omitted:    omitted.length,
  });
  logger.info('Scene audio: published', { digest, path, paragraphs: included.length });
  return { scene, digest, path, cached: false, included, omitted };
}
