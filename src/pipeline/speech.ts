import * as fs from 'fs';
import { logger } from '../utils/logger.js';
import { ProviderRequestError } from '../utils/errors.js';
import { audioStamp } from './stamps.js';
import type { ElevenLabsVoice } from '../actors.js';
import type { ParagraphKey } from '../cache/scene-cache.js';
import type { RenderContext } from './context.js';

/**
 * Return the cached paragraph-audio path for `key`, synthesizing it first
 * on a miss. Synthesis failures surface as ProviderRequestError.
 */
export async function ensureParagraphAudio(
  ctx: RenderContext,
  key: ParagraphKey,
  voice: ElevenLabsVoice,
): Promise<string> {
  const tier = ctx.cache.paragraphAudio;
  const stamp = audioStamp(voice);

  if (tier.exists(key, stamp)) {
    logger.debug('Speech: cache hit', { actor: key.paragraph.actor, path: tier.pathFor(key) });
    return tier.pathFor(key);
  }

  const tmp = tier.tempPathFor(key);
  try {
    await ctx.speech.synthesize(key.paragraph.text, voice, tmp);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw new ProviderRequestError(ctx.speech.name, 'synthesize', err);
  }
  ctx.usage.record({ kind: 'speech', provider: ctx.speech.name, characters: key.paragraph.text.length });

  const audioPath = tier.publish(key, tmp, stamp, { voiceId: voice.voiceId, modelId: voice.modelId });
  logger.info('Speech: paragraph audio cached', { actor: key.paragraph.actor, audioPath });
  return audioPath;
}
