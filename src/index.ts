#!/usr/bin/env node
/**
 * scriptreel: entry point.
 *
 *   scriptreel render [project]   render every scene and assemble final_movie.mp4
 *   scriptreel audio  [project]   build scene narration audio only
 *   scriptreel parse  [project]   print the parsed scene structure
 *
 * The project defaults to test_project under PROJECTS_DIR. All collaborators
 * are constructed here once and handed to the pipeline as a RenderContext.
 */
import { logger } from './utils/logger.js';
import { ConfigError, describe, isRenderError } from './utils/errors.js';
import { DEFAULT_PROJECT, env, POLL_POLICY, VIDEO_DIMENSION } from './config.js';
import { ActorRegistry } from './actors.js';
import { HeygenClient } from './ai/heygen.js';
import { ElevenLabsSpeech, type SpeechProvider } from './ai/voice.js';
import { SceneCache } from './cache/scene-cache.js';
import { FfmpegCompositor } from './media/ffmpeg.js';
import { UsageLedger } from './monitoring/usage.js';
import { sendAlert } from './monitoring/telegram.js';
import { parseScriptFile } from './script/parser.js';
import { paragraphDigest, sceneDigest } from './utils/hash.js';
import { resolveProject, type ProjectPaths } from './project.js';
import { renderProject, renderProjectAudio, type RenderContext } from './pipeline/index.js';

// ── Wiring ────────────────────────────────────────────────────────────────────

/** Stands in for ElevenLabs when no actor needs it and no key is configured. */
const disabledSpeech: SpeechProvider = {
  name: 'elevenlabs',
  synthesize: async () => {
    throw new ConfigError('ELEVENLABS_API_KEY is not set');
  },
};

function buildContext(project: ProjectPaths, signal: AbortSignal): RenderContext {
  const actors = ActorRegistry.load(project.actors);
  const usage = new UsageLedger();

  if (!env.HEYGEN_API_KEY) throw new ConfigError('HEYGEN_API_KEY is not set');
  if (!env.ELEVENLABS_API_KEY && actors.usesExternalSpeech()) {
    throw new ConfigError('ELEVENLABS_API_KEY is not set but some actors use external speech');
  }

  return {
    cache:  new SceneCache(project.root),
    actors,
    speech: env.ELEVENLABS_API_KEY ? new ElevenLabsSpeech(env.ELEVENLABS_API_KEY) : disabledSpeech,
    avatar: new HeygenClient({
      apiKey:    env.HEYGEN_API_KEY,
      dimension: VIDEO_DIMENSION,
      onUpload:  () => usage.record({ kind: 'asset_upload', provider: 'heygen' }),
    }),
    compositor: new FfmpegCompositor({
      ffmpegPath:  env.FFMPEG_PATH,
      ffprobePath: env.FFPROBE_PATH,
      fontFile:    env.FONT_FILE,
      dimension:   VIDEO_DIMENSION,
    }),
    usage,
    poll:      POLL_POLICY,
    dimension: VIDEO_DIMENSION,
    signal,
  };
}

// ── Commands ──────────────────────────────────────────────────────────────────

function printStructure(project: ProjectPaths): void {
  const document = parseScriptFile(project.script);
  for (const [index, scene] of document.entries()) {
    const overlay = scene.overlay ? `<${scene.overlay.tag}>` : '(no overlay)';
    console.log(`Scene ${index + 1} ${overlay} ${sceneDigest(scene).slice(0, 12)}`);
    for (const p of scene.paragraphs) {
      console.log(`  [${p.actor}] ${paragraphDigest(p).slice(0, 12)}  ${p.text}`);
    }
  }
}

const [,, command = 'render', projectArg = DEFAULT_PROJECT] = process.argv;

async function main(): Promise<number> {
  const project = resolveProject(projectArg);
  logger.info('scriptreel: starting', { command, project: project.root });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('scriptreel: interrupted, aborting the render');
    controller.abort();
  });

  switch (command) {
    case 'parse':
      printStructure(project);
      return 0;

    case 'audio': {
      const scenes = await renderProjectAudio(buildContext(project, controller.signal), project);
      return scenes.some(s => s.status === 'failed') ? 1 : 0;
    }

    case 'render': {
      const result = await renderProject(buildContext(project, controller.signal), project);
      return result.scenes.some(s => s.status === 'failed') ? 1 : 0;
    }

    default:
      console.error(`Unknown command "${command}". Usage: scriptreel <render|audio|parse> [project]`);
      return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch(async (err: unknown) => {
    logger.error('Fatal error', { kind: isRenderError(err) ? err.kind : 'unexpected', error: describe(err) });
    await sendAlert(`scriptreel ${command} failed: ${describe(err)}`, 'critical');
    process.exitCode = 1;
  });
