/**
 * Everything a render needs, built once at start-up and passed down.
 * There is no ambient registry: tests construct a context from fakes.
 */
import type { ActorRegistry } from '../actors.js';
import type { AvatarVideoProvider } from '../ai/heygen.js';
import type { SpeechProvider } from '../ai/voice.js';
import type { SceneCache } from '../cache/scene-cache.js';
import type { MediaCompositor } from '../media/ffmpeg.js';
import type { UsageLedger } from '../monitoring/usage.js';
import type { Sleep } from '../utils/job-poller.js';

export interface RenderContext {
  cache: SceneCache;
  actors: ActorRegistry;
  speech: SpeechProvider;
  avatar: AvatarVideoProvider;
  compositor: MediaCompositor;
  usage: UsageLedger;
  poll: { intervalMs: number; maxAttempts: number };
  /** Output geometry; part of every video producer stamp. */
  dimension: { width: number; height: number };
  signal?: AbortSignal;
  /** Overrides the poller's sleep (tests). */
  sleep?: Sleep;
}
