/**
 * Scene overlays → timed text elements, and the drawtext filter that burns them.
 *
 * Only <chapter title="..." start="0" duration="3"/> produces visuals today;
 * other overlay tags are carried for hashing but draw nothing.
 */
import { logger } from '../utils/logger.js';
import { textContent } from '../script/markup.js';
import type { OverlayElement } from '../script/types.js';

export interface OverlayTextElement {
  text: string;
  /** Seconds from the start of the scene. */
  start: number;
  /** Seconds on screen. */
  duration: number;
}

const CHAPTER_DEFAULTS = { start: 0, duration: 3 } as const;

function seconds(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number.parseFloat(raw);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

export function overlayElements(overlay: OverlayElement | null): OverlayTextElement[] {
  if (!overlay) return [];

  if (overlay.tag.toLowerCase() !== 'chapter') {
    logger.debug('Overlay: no visual elements for tag', { tag: overlay.tag });
    return [];
  }

  const text = overlay.attributes['title'] ?? textContent(overlay);
  if (!text) return [];

  return [{
    text,
    start:    seconds(overlay.attributes['start'], CHAPTER_DEFAULTS.start),
    duration: seconds(overlay.attributes['duration'], CHAPTER_DEFAULTS.duration),
  }];
}

/** Escape a string for use inside an FFmpeg drawtext text= expression */
export function escapeDrawtext(s: string): string {
  return s.replace(/[\\:'[\]{}%]/g, '\\$&');
}

export function drawtextFilter(element: OverlayTextElement, fontFile: string): string {
  const end = element.start + element.duration;
  return (
    `drawtext=fontfile='${fontFile}':text='${escapeDrawtext(element.text)}':` +
    `fontsize=64:fontcolor=white:box=1:boxcolor=black@0.55:boxborderw=24:` +
    `x=(w-text_w)/2:y=(h-text_h)/2:enable='between(t,${element.start},${end})'`
  );
}
