/**
 * Scene renderer: paragraphs → ordered paragraph videos → scene.mp4.
 *
 * Paragraph failures stay inside their outcome. The scene itself fails only
 * when nothing survived (SceneEmptyError) or the compositor breaks
 * (CompositionError); in both cases no scene-final entry is published.
 */
import * as fs from 'fs';
import { logger } from '../utils/logger.js';
import { sceneDigest } from '../utils/hash.js';
import { CompositionError, SceneEmptyError, throwIfAborted } from '../utils/errors.js';
import { overlayElements } from '../media/overlay.js';
import { renderParagraph, type ParagraphOutcome } from './paragraph-renderer.js';
import { SCENE_FINAL_STAMP } from './stamps.js';
import type { Scene } from '../script/types.js';
import type { RenderContext } from './context.js';

export interface SceneResult {
  scene: Scene;
  digest: string;
  path: string;
  cached: boolean;
  /** Empty when the scene came straight from the cache. */
  outcomes: ParagraphOutcome[];
}

async function composeScene(ctx: RenderContext, scene: Scene, inputs: string[]): Promise<string> {
  const tier = ctx.cache.sceneFinal;
  const digest = sceneDigest(scene);
  const joined = tier.tempPathFor(scene);
  const elements = overlayElements(scene.overlay);
  const composed = elements.length > 0 ? tier.tempPathFor(scene) : null;

  try {
    await ctx.compositor.concatenate(inputs, joined, 'compose');
    if (!fs.existsSync(joined)) throw new Error(`compositor produced no output at ${joined}`);

    if (composed) {
      const duration = await ctx.compositor.probeDuration(joined);
      await ctx.compositor.compose(joined, elements, duration, composed);
      if (!fs.existsSync(composed)) throw new Error(`compositor produced no output at ${composed}`);
    }
  } catch (err) {
    fs.rmSync(joined, { force: true });
    if (composed) fs.rmSync(composed, { force: true });
    throw new CompositionError(digest, err);
  }

  if (composed) {
    fs.rmSync(joined, { force: true });
    return composed;
  }
  return joined;
}

export async function renderScene(ctx: RenderContext, scene: Scene): Promise<SceneResult> {
  const tier = ctx.cache.sceneFinal;
  const digest = sceneDigest(scene);

  if (tier.exists(scene, SCENE_FINAL_STAMP)) {
    const path = tier.pathFor(scene);
    logger.info('Scene: final cache hit', { digest, path });
    return { scene, digest, path, cached: true, outcomes: [] };
  }

  logger.info('Scene: rendering', {
    digest,
    overlay:    scene.overlay?.tag ?? null,
    paragraphs: scene.paragraphs.length,
  });

  const outcomes: ParagraphOutcome[] = [];
  for (const paragraph of scene.paragraphs) {
    throwIfAborted(ctx.signal);
    outcomes.push(await renderParagraph(ctx, scene, paragraph));
  }

  const videos = outcomes.flatMap(o => (o.status === 'rendered' ? [o.videoPath] : []));
  if (videos.length === 0) {
    throw new SceneEmptyError(digest, scene.paragraphs.length);
  }

  const omitted = outcomes.length - videos.length;
  if (omitted > 0) {
    logger.warn('Scene: assembling without dropped paragraphs', { digest, kept: videos.length, omitted });
  }

  const output = await composeScene(ctx, scene, videos);
  const path = tier.publish(scene, output, SCENE_FINAL_STAMP, { paragraphs: videos.length, omitted });
  logger.info('Scene: final published', { digest, path });
  return { scene, digest, path, cached: false, outcomes };
}
