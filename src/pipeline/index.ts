/**
 * Project runner for scriptreel.
 *
 * Reads <project>/script.txt, renders every scene in document order, then
 * assembles final_movie.mp4 from the scene finals. Scene-level failures are
 * logged and alerted but do not stop later scenes: their paragraphs still
 * land in the cache for the next run. The movie is only assembled when every
 * scene succeeded.
 */
import * as fs from 'fs';
import * as path from 'path';
import { randomBytes } from 'node:crypto';
import { logger } from '../utils/logger.js';
import { describe, isRenderError, RenderAbortedError, type RenderError } from '../utils/errors.js';
import { sceneDigest } from '../utils/hash.js';
import { parseScriptFile } from '../script/parser.js';
import { sendAlert, sendRunSummary } from '../monitoring/telegram.js';
import { renderScene } from './scene-renderer.js';
import { renderSceneAudio } from './audio-renderer.js';
import type { ProjectPaths } from '../project.js';
import type { RenderContext } from './context.js';

export { renderScene, type SceneResult } from './scene-renderer.js';
export { renderSceneAudio, type SceneAudioResult } from './audio-renderer.js';
export { renderParagraph, type ParagraphOutcome } from './paragraph-renderer.js';
export type { RenderContext } from './context.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export type SceneStatus =
  | { index: number; digest: string; status: 'rendered' | 'cached'; path: string }
  | { index: number; digest: string; status: 'failed'; error: RenderError };

export interface ProjectResult {
  project: string;
  scenes: SceneStatus[];
  /** Null when any scene failed or the script had no scenes. */
  moviePath: string | null;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

/** Scene-scoped render errors are contained per scene; anything else ends the run. */
function sceneFailure(err: unknown): RenderError | null {
  if (err instanceof RenderAbortedError) return null;
  return isRenderError(err) && err.scope === 'scene' ? err : null;
}

async function assembleMovie(ctx: RenderContext, scenePaths: string[], target: string): Promise<string> {
  const tmp = path.join(path.dirname(target), `.tmp-${randomBytes(4).toString('hex')}-${path.basename(target)}`);
  try {
    await ctx.compositor.concatenate(scenePaths, tmp, 'compose');
    if (!fs.existsSync(tmp)) throw new Error(`compositor produced no output at ${tmp}`);
    fs.renameSync(tmp, target);
  } finally {
    fs.rmSync(tmp, { force: true });
  }
  return target;
}

// ── Video ─────────────────────────────────────────────────────────────────────

export async function renderProject(ctx: RenderContext, project: ProjectPaths): Promise<ProjectResult> {
  logger.info('Project: render starting', { project: project.name, root: project.root });
  const document = parseScriptFile(project.script);

  const scenes: SceneStatus[] = [];
  for (const [index, scene] of document.entries()) {
    const digest = sceneDigest(scene);
    try {
      const result = await renderScene(ctx, scene);
      scenes.push({ index, digest, status: result.cached ? 'cached' : 'rendered', path: result.path });
    } catch (err) {
      const error = sceneFailure(err);
      if (!error) throw err;
      logger.error('Project: scene failed', { index, digest, kind: error.kind, error: error.message });
      await sendAlert(`Scene ${index + 1} of ${project.name} failed: ${error.message}`, 'warning');
      scenes.push({ index, digest, status: 'failed', error });
    }
  }

  const failed = scenes.filter(s => s.status === 'failed').length;
  const finals = scenes.flatMap(s => (s.status === 'failed' ? [] : [s.path]));

  let moviePath: string | null = null;
  if (failed > 0) {
    logger.warn('Project: final movie not assembled', { failed });
  } else if (finals.length === 0) {
    logger.warn('Project: script has no scenes', { script: project.script });
  } else {
    moviePath = await assembleMovie(ctx, finals, project.finalMovie);
    logger.info('Project: final movie written', { moviePath, scenes: finals.length });
  }

  const usage = ctx.usage.log('run summary');
  await sendRunSummary({
    project:       project.name,
    rendered:      scenes.filter(s => s.status === 'rendered').length,
    cached:        scenes.filter(s => s.status === 'cached').length,
    failed,
    providerCalls: usage.totalCalls,
    moviePath,
  });

  return { project: project.name, scenes, moviePath };
}

// ── Audio only ────────────────────────────────────────────────────────────────

export async function renderProjectAudio(ctx: RenderContext, project: ProjectPaths): Promise<SceneStatus[]> {
  logger.info('Project: audio render starting', { project: project.name });
  const document = parseScriptFile(project.script);

  const scenes: SceneStatus[] = [];
  for (const [index, scene] of document.entries()) {
    const digest = sceneDigest(scene);
    try {
      const result = await renderSceneAudio(ctx, scene);
      scenes.push({ index, digest, status: result.cached ? 'cached' : 'rendered', path: result.path });
    } catch (err) {
      const error = sceneFailure(err);
      if (!error) throw err;
      logger.error('Project: scene audio failed', { index, digest, error: describe(error) });
      scenes.push({ index, digest, status: 'failed', error });
    }
  }

  ctx.usage.log('audio run summary');
  return scenes;
}
