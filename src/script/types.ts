/**
 * Document model produced by the script parser.
 * All values are immutable once parsed; identity for caching is derived from
 * content (see utils/hash.ts), never from object identity.
 */

export const DEFAULT_ACTOR = 'narrator';

export interface OverlayText {
  readonly kind: 'text';
  readonly text: string;
}

export interface OverlayElement {
  readonly kind: 'element';
  readonly tag: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly OverlayNode[];
}

export type OverlayNode = OverlayElement | OverlayText;

export interface Paragraph {
  readonly text: string;
  readonly actor: string;
}

export interface Scene {
  /** Markup fragment that opened the scene; null for the implicit leading scene. */
  readonly overlay: OverlayElement | null;
  readonly paragraphs: readonly Paragraph[];
}

export type ScriptDocument = readonly Scene[];

export interface ParseDegradation {
  blockIndex: number;
  excerpt: string;
  reason: string;
}

/** Collapse every whitespace run to one space and trim. */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function createParagraph(text: string, actor: string): Paragraph {
  return Object.freeze({ text: normalizeText(text), actor });
}
