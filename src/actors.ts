/**
 * Actor profiles: which voice and avatar render an actor's paragraphs.
 *
 * Loaded once from JSON and validated eagerly; lookups afterwards are total
 * over the closed variant and never need defensive defaults.
 *
 * {
 *   "narrator": {
 *     "audio": { "provider": "elevenlabs", "voiceId": "..." },
 *     "video": { "provider": "heygen", "avatarId": "...", "avatarStyle": "normal", "speed": 1 }
 *   }
 * }
 */
import * as fs from 'fs';
import { z } from 'zod';
import { ConfigError } from './utils/errors.js';
import { logger } from './utils/logger.js';

// ── Schema ────────────────────────────────────────────────────────────────────

const ActorIdSchema = z.string().regex(/^[A-Za-z0-9_-]+$/, 'actor ids may only contain letters, digits, "_" and "-"');

const ElevenLabsVoiceSchema = z.object({
  provider: z.literal('elevenlabs'),
  voiceId:  z.string().min(1),
  modelId:  z.string().min(1).default('eleven_multilingual_v2'),
}).strict();

const HeygenVoiceSchema = z.object({
  provider: z.literal('heygen'),
  voiceId:  z.string().min(1),
}).strict();

const HeygenAvatarSchema = z.object({
  provider:    z.literal('heygen'),
  avatarId:    z.string().min(1),
  avatarStyle: z.enum(['normal', 'closeUp', 'circle']).default('normal'),
  speed:       z.number().min(0.5).max(1.5).default(1),
}).strict();

const ActorProfileSchema = z.object({
  audio: z.discriminatedUnion('provider', [ElevenLabsVoiceSchema, HeygenVoiceSchema]),
  video: HeygenAvatarSchema,
}).strict();

const ActorFileSchema = z.record(ActorIdSchema, ActorProfileSchema);

// ── Types ─────────────────────────────────────────────────────────────────────

export type ElevenLabsVoice = z.infer<typeof ElevenLabsVoiceSchema>;
export type HeygenVoice     = z.infer<typeof HeygenVoiceSchema>;
export type AvatarConfig    = z.infer<typeof HeygenAvatarSchema>;
export type ActorProfile    = z.infer<typeof ActorProfileSchema>;

/** The video provider voices the raw text itself; no separate speech synthesis. */
export function isNativeVoice(profile: ActorProfile): boolean {
  return profile.audio.provider === profile.video.provider;
}

// ── Registry ──────────────────────────────────────────────────────────────────

export class ActorRegistry {
  private readonly profiles: ReadonlyMap<string, ActorProfile>;

  constructor(profiles: Record<string, ActorProfile>) {
    const entries = new Map<string, ActorProfile>();
    for (const [id, profile] of Object.entries(profiles)) {
      const key = id.toLowerCase();
      if (entries.has(key)) throw new ConfigError(`Actor "${id}" is defined twice (ids are case-insensitive)`);
      entries.set(key, profile);
    }
    this.profiles = entries;
  }

  static parse(raw: unknown, source = 'actor profiles'): ActorRegistry {
    const result = ActorFileSchema.safeParse(raw);
    if (!result.success) {
      const problems = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new ConfigError(`Invalid ${source}: ${problems}`);
    }
    return new ActorRegistry(result.data);
  }

  static load(filePath: string): ActorRegistry {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Cannot read actor profiles ${filePath}`, err);
    }
    const registry = ActorRegistry.parse(raw, filePath);
    logger.info('Actors: profiles loaded', { filePath, actors: registry.ids() });
    return registry;
  }

  get(actor: string): ActorProfile | undefined {
    return this.profiles.get(actor.toLowerCase());
  }

  ids(): string[] {
    return [...this.profiles.keys()];
  }

  /** True when any actor needs the external speech provider. */
  usesExternalSpeech(): boolean {
    return [...this.profiles.values()].some(p => !isNativeVoice(p));
  }
}
