import { createHash } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { canonicalize } from '../script/markup.js';
import type { OverlayElement, Paragraph, Scene } from '../script/types.js';

// Fields are NUL-separated so ("ab", "c") and ("a", "bc") never collide.
const SEPARATOR = '\u0000';

const sceneDigests = new WeakMap<Scene, string>();

export const hashFile = (filePath: string) => createHash('sha256').update(readFileSync(filePath)).digest('hex');

export function hashFields(fields: readonly string[]): string {
  const h = createHash('sha256');
  fields.forEach((field, i) => {
    if (i > 0) h.update(SEPARATOR);
    h.update(field, 'utf8');
  });
  return h.digest('hex');
}

export const canonicalOverlay = (overlay: OverlayElement | null) => overlay ? canonicalize(overlay) : '';

/** H(actor, normalized text). */
export const paragraphDigest = (p: Paragraph) => hashFields([p.actor, p.text]);

/** H(canonical overlay or empty, digest(p1), digest(p2), …). Memoised per scene object. */
export function sceneDigest(scene: Scene): string {
  const cached = sceneDigests.get(scene);
  if (cached) return cached;
  const digest = hashFields([canonicalOverlay(scene.overlay), ...scene.paragraphs.map(paragraphDigest)]);
  sceneDigests.set(scene, digest);
  return digest;
}
