/**
 * Avatar video generation: HeyGen v2 generate, v1 status, asset upload.
 *
 * Submission returns a job id; pipeline code drives the job to completion with
 * utils/job-poller.ts and calls fetch() with the completed video URL.
 * This module is the sole entry point for HeyGen; never call the API elsewhere.
 */
import * as fs from 'fs';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { JobStatus } from '../utils/job-poller.js';
import type { AvatarConfig } from '../actors.js';

// ── Constants ─────────────────────────────────────────────────────────────────

const GENERATE_URL = 'https://api.heygen.com/v2/video/generate';
const STATUS_URL   = 'https://api.heygen.com/v1/video_status.get';
const UPLOAD_URL   = 'https://upload.heygen.com/v1/asset';

// ── Public interfaces ─────────────────────────────────────────────────────────

/** What the avatar speaks: raw text voiced by the provider, or pre-rendered audio. */
export type AvatarSpeech =
  | { kind: 'text'; text: string; voiceId: string }
  | { kind: 'audio'; audioPath: string };

export interface AvatarVideoProvider {
  readonly name: string;
  /** Start a render job; resolves to the provider's job id. */
  submit(speech: AvatarSpeech, avatar: AvatarConfig): Promise<string>;
  poll(jobId: string): Promise<JobStatus>;
  /** Download a completed job's result to `outputPath`. */
  fetch(locator: string, outputPath: string): Promise<void>;
}

export interface HeygenOptions {
  apiKey: string;
  dimension: { width: number; height: number };
  fetchImpl?: typeof fetch;
  /** Called once per uploaded audio asset. */
  onUpload?: () => void;
}

// ── Response shapes ───────────────────────────────────────────────────────────

const UploadResponse = z.object({
  data: z.object({
    id:       z.string().optional(),
    asset_id: z.string().optional(),
  }),
});

const GenerateResponse = z.object({
  error: z.unknown().optional(),
  data:  z.object({ video_id: z.string().min(1) }).nullable(),
});

const StatusResponse = z.object({
  data: z.object({
    status:    z.string(),
    video_url: z.string().nullish(),
    error:     z.unknown().optional(),
  }),
});

// ── Client ────────────────────────────────────────────────────────────────────

export class HeygenClient implements AvatarVideoProvider {
  readonly name = 'heygen';
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: HeygenOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  private get headers(): Record<string, string> {
    return {
      'X-Api-Key':    this.opts.apiKey,
      'Content-Type': 'application/json',
      Accept:         'application/json',
    };
  }

  private async json(res: Response, label: string): Promise<unknown> {
    if (!res.ok) {
      const body = await res.text();
      throw new Error(`HeyGen ${label} failed: ${res.status} ${body}`.trim());
    }
    return res.json();
  }

  async uploadAsset(filePath: string, contentType = 'audio/mpeg'): Promise<string> {
    logger.info('HeyGen: uploading asset', { filePath });
    const res = await this.fetchImpl(UPLOAD_URL, {
      method:  'POST',
      headers: { 'Content-Type': contentType, 'X-Api-Key': this.opts.apiKey },
      body:    fs.readFileSync(filePath),
    });
    const { data } = UploadResponse.parse(await this.json(res, 'upload'));
    const assetId = data.id ?? data.asset_id;
    if (!assetId) throw new Error('HeyGen upload returned no asset id');
    this.opts.onUpload?.();
    return assetId;
  }

  async submit(speech: AvatarSpeech, avatar: AvatarConfig): Promise<string> {
    const voice = speech.kind === 'audio'
      ? { type: 'audio', audio_asset_id: await this.uploadAsset(speech.audioPath), speed: avatar.speed }
      : { type: 'text', input_text: speech.text, voice_id: speech.voiceId, speed: avatar.speed };

    const payload = {
      video_inputs: [{
        character: { type: 'avatar', avatar_id: avatar.avatarId, avatar_style: avatar.avatarStyle },
        voice,
      }],
      dimension: this.opts.dimension,
    };

    logger.info('HeyGen: requesting video', { avatarId: avatar.avatarId, voice: voice.type });
    const res = await this.fetchImpl(GENERATE_URL, {
      method:  'POST',
      headers: this.headers,
      body:    JSON.stringify(payload),
    });
    const result = GenerateResponse.parse(await this.json(res, 'generate'));
    if (result.error) throw new Error(`HeyGen generate error: ${JSON.stringify(result.error)}`);
    if (!result.data) throw new Error('HeyGen generate returned no video_id');

    logger.info('HeyGen: video requested', { videoId: result.data.video_id });
    return result.data.video_id;
  }

  async poll(jobId: string): Promise<JobStatus> {
    const url = `${STATUS_URL}?${new URLSearchParams({ video_id: jobId }).toString()}`;
    const res = await this.fetchImpl(url, { headers: this.headers });
    const { data } = StatusResponse.parse(await this.json(res, 'status'));

    switch (data.status) {
      case 'completed':
        if (!data.video_url) throw new Error(`HeyGen video ${jobId} completed without a video_url`);
        return { state: 'completed', locator: data.video_url };
      case 'failed':
        return { state: 'failed', reason: JSON.stringify(data.error ?? 'unknown error') };
      default:
        // pending, waiting, processing
        return { state: 'processing' };
    }
  }

  async fetch(locator: string, outputPath: string): Promise<void> {
    logger.info('HeyGen: downloading video', { outputPath });
    const res = await this.fetchImpl(locator);
    if (!res.ok) throw new Error(`HeyGen download failed: ${res.status}`);
    const bytes = Buffer.from(await res.arrayBuffer());
    fs.writeFileSync(outputPath, bytes);
    logger.debug('HeyGen: video written', { outputPath, bytes: bytes.length });
  }
}
