/**
 * Content-addressed artifact cache.
 *
 * Layout under <project>/cache:
 *   scene_<scene digest>/
 *     scene.mp4                        scene-final
 *     scene_audio_complete.mp3         scene-audio-complete
 *     <actor>_<paragraph digest>.mp3   paragraph-audio
 *     <actor>_<paragraph digest>.mp4   paragraph-video
 *
 * Entries are append-only: created by publish(), never mutated, never evicted.
 * publish() renames a file produced beside its target, then writes the
 * manifest; a lookup that supplies a producer stamp only trusts entries whose
 * manifest matches it, so a crash between the two steps reads as a miss.
 *
 * Single writer per process. Concurrent processes on one key are unsupported.
 */
import * as fs from 'fs';
import * as path from 'path';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { PROJECT_FILES } from '../config.js';
import { logger } from '../utils/logger.js';
import { CacheWriteError } from '../utils/errors.js';
import { hashFile, paragraphDigest, sceneDigest } from '../utils/hash.js';
import type { Paragraph, Scene } from '../script/types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export const CACHE_TIERS = ['paragraph-audio', 'paragraph-video', 'scene-audio-complete', 'scene-final'] as const;
export type CacheTierName = typeof CACHE_TIERS[number];

export interface ParagraphKey {
  scene: Scene;
  paragraph: Paragraph;
}

/** Identifies what produced an artifact; a change here invalidates existing entries. */
export interface ProducerStamp {
  producer: string;
  version: number;
}

const ManifestSchema = z.object({
  tier:      z.enum(CACHE_TIERS),
  digest:    z.string(),
  producer:  z.string(),
  version:   z.number().int(),
  sha256:    z.string(),
  createdAt: z.string(),
  details:   z.record(z.unknown()).optional(),
});

export type CacheManifest = z.infer<typeof ManifestSchema>;

interface Location {
  dir: string;
  file: string;
  digest: string;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

const manifestPathFor = (artifactPath: string) => `${artifactPath}.manifest.json`;

function readManifest(manifestPath: string): CacheManifest | null {
  if (!fs.existsSync(manifestPath)) return null;
  try {
    const result = ManifestSchema.safeParse(JSON.parse(fs.readFileSync(manifestPath, 'utf-8')));
    return result.success ? result.data : null;
  } catch (err) {
    logger.warn('Cache: unreadable manifest treated as absent', { manifestPath, error: String(err) });
    return null;
  }
}

function writeFileAtomic(target: string, contents: string): void {
  const tmp = path.join(path.dirname(target), `.tmp-${randomBytes(6).toString('hex')}-${path.basename(target)}`);
  fs.writeFileSync(tmp, contents, 'utf-8');
  fs.renameSync(tmp, target);
}

// ── Tier ──────────────────────────────────────────────────────────────────────

export class CacheTier<K> {
  constructor(
    readonly name: CacheTierName,
    private readonly locate: (key: K) => Location,
  ) {}

  pathFor(key: K): string {
    const { dir, file } = this.locate(key);
    return path.join(dir, file);
  }

  ensureDirectory(key: K): string {
    const { dir } = this.locate(key);
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (err) {
      throw new CacheWriteError(this.name, dir, err);
    }
    return dir;
  }

  /**
   * True when the artifact file is present and, if `stamp` is given, its
   * manifest records the same producer and version.
   */
  exists(key: K, stamp?: ProducerStamp): boolean {
    const artifact = this.pathFor(key);
    if (!fs.existsSync(artifact)) return false;
    if (!stamp) return true;

    const manifest = readManifest(manifestPathFor(artifact));
    const fresh = manifest !== null
      && manifest.tier === this.name
      && manifest.producer === stamp.producer
      && manifest.version === stamp.version;
    if (!fresh) {
      logger.debug('Cache: stale entry ignored', { tier: this.name, artifact, expected: stamp.producer });
    }
    return fresh;
  }

  manifest(key: K): CacheManifest | null {
    return readManifest(manifestPathFor(this.pathFor(key)));
  }

  /** A private path beside the target, on the same filesystem so publish() can rename. */
  tempPathFor(key: K): string {
    const { file } = this.locate(key);
    const dir = this.ensureDirectory(key);
    return path.join(dir, `.tmp-${Date.now()}-${randomBytes(4).toString('hex')}-${file}`);
  }

  publish(key: K, sourcePath: string, stamp: ProducerStamp, details?: Record<string, unknown>): string {
    const { digest } = this.locate(key);
    const target = this.pathFor(key);
    this.ensureDirectory(key);

    try {
      fs.renameSync(sourcePath, target);
      const manifest: CacheManifest = {
        tier:      this.name,
        digest,
        producer:  stamp.producer,
        version:   stamp.version,
        sha256:    hashFile(target),
        createdAt: new Date().toISOString(),
        ...(details ? { details } : {}),
      };
      writeFileAtomic(manifestPathFor(target), JSON.stringify(manifest, null, 2));
    } catch (err) {
      throw new CacheWriteError(this.name, target, err);
    }

    logger.debug('Cache: published', { tier: this.name, target });
    return target;
  }
}

/** A paragraph whose audio feeds a scene-audio-complete file, and the stamp that audio must carry. */
export interface SceneAudioConstituent {
  paragraph: Paragraph;
  stamp?: ProducerStamp;
}

const ChecksumListSchema = z.array(z.string());

/**
 * scene-audio-complete: present only when the concatenated file is present,
 * every constituent paragraph's audio is itself cached under its stamp, and
 * those audio files still hold the bytes the concatenation was built from.
 */
export class SceneAudioTier extends CacheTier<Scene> {
  constructor(
    locate: (scene: Scene) => Location,
    private readonly paragraphAudio: CacheTier<ParagraphKey>,
  ) {
    super('scene-audio-complete', locate);
  }

  /** Recorded content checksums of the paragraphs' audio, in order; '' where a manifest is missing. */
  constituentChecksums(scene: Scene, paragraphs: readonly Paragraph[]): string[] {
    return paragraphs.map(paragraph => this.paragraphAudio.manifest({ scene, paragraph })?.sha256 ?? '');
  }

  publishConcatenation(
    scene: Scene,
    sourcePath: string,
    stamp: ProducerStamp,
    paragraphs: readonly Paragraph[],
    details: Record<string, unknown> = {},
  ): string {
    return this.publish(scene, sourcePath, stamp, {
      ...details,
      constituents: this.constituentChecksums(scene, paragraphs),
    });
  }

  override exists(
    scene: Scene,
    stamp?: ProducerStamp,
    constituents: readonly SceneAudioConstituent[] = scene.paragraphs.map(paragraph => ({ paragraph })),
  ): boolean {
    if (!super.exists(scene, stamp)) return false;
    const cached = constituents.every(c => this.paragraphAudio.exists({ scene, paragraph: c.paragraph }, c.stamp));
    if (!cached) return false;
    if (!stamp) return true;

    const recorded = ChecksumListSchema.safeParse(this.manifest(scene)?.details?.['constituents']);
    const current = this.constituentChecksums(scene, constituents.map(c => c.paragraph));
    const fresh = recorded.success
      && recorded.data.length === current.length
      && recorded.data.every((sum, i) => sum === current[i]);
    if (!fresh) {
      logger.debug('Cache: scene audio built from other paragraph audio', { tier: this.name, scene: sceneDigest(scene) });
    }
    return fresh;
  }
}

// ── Store ─────────────────────────────────────────────────────────────────────

export class SceneCache {
  readonly cacheDir: string;
  readonly paragraphAudio: CacheTier<ParagraphKey>;
  readonly paragraphVideo: CacheTier<ParagraphKey>;
  readonly sceneAudioComplete: SceneAudioTier;
  readonly sceneFinal: CacheTier<Scene>;

  constructor(projectDir: string) {
    this.cacheDir = path.join(projectDir, PROJECT_FILES.cacheDir);

    const paragraphFile = (ext: string) => ({ scene, paragraph }: ParagraphKey): Location => {
      const digest = paragraphDigest(paragraph);
      return { dir: this.sceneDir(scene), file: `${paragraph.actor}_${digest}.${ext}`, digest };
    };
    const sceneFile = (file: string) => (scene: Scene): Location =>
      ({ dir: this.sceneDir(scene), file, digest: sceneDigest(scene) });

    this.paragraphAudio     = new CacheTier('paragraph-audio', paragraphFile('mp3'));
    this.paragraphVideo     = new CacheTier('paragraph-video', paragraphFile('mp4'));
    this.sceneAudioComplete = new SceneAudioTier(sceneFile('scene_audio_complete.mp3'), this.paragraphAudio);
    this.sceneFinal         = new CacheTier('scene-final', sceneFile('scene.mp4'));
  }

  sceneDir(scene: Scene): string {
    return path.join(this.cacheDir, `scene_${sceneDigest(scene)}`);
  }
}
