/**
 * Media compositor: FFmpeg concatenation, overlay composition, duration probing.
 *
 * All functions throw on non-zero FFmpeg/FFprobe exit. Output paths are
 * written exactly where the caller asks; callers own atomic publication.
 */
import { execFileSync } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { logger } from '../utils/logger.js';
import { drawtextFilter, type OverlayTextElement } from './overlay.js';

// ── Interface ─────────────────────────────────────────────────────────────────

/**
 * copy   : concat demuxer with stream copy; inputs must share codecs and geometry.
 * compose: scale/pad every input to the output geometry and re-encode.
 */
export type FitPolicy = 'copy' | 'compose';

export interface MediaCompositor {
  concatenate(inputs: readonly string[], outputPath: string, fit: FitPolicy): Promise<void>;
  compose(
    backgroundPath: string,
    elements: readonly OverlayTextElement[],
    durationSeconds: number,
    outputPath: string,
  ): Promise<void>;
  probeDuration(filePath: string): Promise<number>;
}

export interface FfmpegOptions {
  ffmpegPath: string;
  ffprobePath: string;
  fontFile: string;
  dimension: { width: number; height: number };
  fps?: number;
}

// ── Filter builders ───────────────────────────────────────────────────────────

export function concatFilter(count: number, dimension: { width: number; height: number }, fps = 30): string {
  const { width: w, height: h } = dimension;
  const parts: string[] = [];
  const pairs: string[] = [];
  for (let i = 0; i < count; i++) {
    parts.push(
      `[${i}:v]scale=${w}:${h}:force_original_aspect_ratio=decrease,` +
      `pad=${w}:${h}:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=${fps}[v${i}]`,
      `[${i}:a]aresample=44100[a${i}]`,
    );
    pairs.push(`[v${i}][a${i}]`);
  }
  return `${parts.join(';')};${pairs.join('')}concat=n=${count}:v=1:a=1[outv][outa]`;
}

export function concatList(inputs: readonly string[]): string {
  return inputs.map(p => `file '${p.replace(/'/g, "'\\''")}'`).join('\n');
}

// ── FFmpeg implementation ─────────────────────────────────────────────────────

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err && err.stderr) return String(err.stderr);
  return String(err);
}

export class FfmpegCompositor implements MediaCompositor {
  constructor(private readonly opts: FfmpegOptions) {}

  private run(args: string[], label: string): void {
    logger.debug(`FFmpeg [${label}]`, { args });
    try {
      execFileSync(this.opts.ffmpegPath, ['-y', '-hide_banner', ...args], { stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (err) {
      throw new Error(`FFmpeg ${label} failed: ${stderrOf(err)}`);
    }
  }

  async concatenate(inputs: readonly string[], outputPath: string, fit: FitPolicy): Promise<void> {
    logger.info('FFmpeg: concatenating', { count: inputs.length, fit, outputPath });
    if (inputs.length === 0) throw new Error('concatenate: no inputs provided');

    if (fit === 'compose') {
      this.run([
        ...inputs.flatMap(p => ['-i', p]),
        '-filter_complex', concatFilter(inputs.length, this.opts.dimension, this.opts.fps),
        '-map', '[outv]', '-map', '[outa]',
        '-c:v', 'libx264', '-preset', 'fast', '-crf', '20', '-c:a', 'aac', '-b:a', '192k',
        outputPath,
      ], 'concatenate:compose');
      return;
    }

    const listPath = path.join(os.tmpdir(), `concat_${Date.now()}_${process.pid}.txt`);
    fs.writeFileSync(listPath, concatList(inputs), 'utf-8');
    try {
      this.run(['-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', outputPath], 'concatenate:copy');
    } finally {
      if (fs.existsSync(listPath)) fs.unlinkSync(listPath);
    }
  }

  async compose(
    backgroundPath: string,
    elements: readonly OverlayTextElement[],
    durationSeconds: number,
    outputPath: string,
  ): Promise<void> {
    logger.info('FFmpeg: composing overlay', { elements: elements.length, durationSeconds, outputPath });
    const filters = elements.map(el => drawtextFilter(el, this.opts.fontFile));
    this.run([
      '-i', backgroundPath,
      ...(filters.length > 0 ? ['-vf', filters.join(',')] : []),
      '-t', String(durationSeconds),
      '-c:v', 'libx264', '-preset', 'fast', '-crf', '20', '-c:a', 'copy',
      outputPath,
    ], 'compose');
  }

  async probeDuration(filePath: string): Promise<number> {
    let raw: string;
    try {
      raw = execFileSync(
        this.opts.ffprobePath,
        ['-v', 'error', '-show_entries', 'format=duration', '-of', 'csv=p=0', filePath],
        { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] },
      ).trim();
    } catch (err) {
      throw new Error(`FFprobe duration failed: ${stderrOf(err)}`);
    }
    const duration = Number.parseFloat(raw);
    if (!Number.isFinite(duration)) throw new Error(`FFprobe returned no duration for ${filePath}`);
    return duration;
  }
}
