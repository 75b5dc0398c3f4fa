/**
 * Script parser: plain text → ordered scenes of actor-attributed paragraphs.
 *
 * Blocks are separated by blank lines. Per block, in order:
 *   1. a whole-block <actor name="..."/> switches the current actor;
 *   2. any other whole-block element opens a new scene with that element as
 *      its overlay and resets the actor to the narrator;
 *   3. everything else is paragraph text, optionally prefixed by an inline
 *      self-closing <actor .../> tag.
 * Markup that fails to parse is kept as paragraph text. Nothing here throws.
 */
import * as fs from 'fs';
import { logger } from '../utils/logger.js';
import { ScriptReadError } from '../utils/errors.js';
import { fragmentProblem, parseFragment } from './markup.js';
import {
  DEFAULT_ACTOR,
  createParagraph,
  type OverlayElement,
  type Paragraph,
  type ParseDegradation,
  type Scene,
  type ScriptDocument,
} from './types.js';

const ACTOR_TAG = 'actor';
const COMMENT_PATTERN = /<!--[\s\S]*?-->/g;
const BLOCK_SEPARATOR = /\n\s*\n/;
const INLINE_ACTOR_PATTERN = /^(<actor\s+[^>]*\/>)\s*([\s\S]*)$/i;

interface SceneDraft {
  overlay: OverlayElement | null;
  paragraphs: Paragraph[];
}

export interface ParseResult {
  document: ScriptDocument;
  degradations: ParseDegradation[];
}

function isActorTag(element: OverlayElement): boolean {
  return element.tag.toLowerCase() === ACTOR_TAG;
}

function actorName(element: OverlayElement): string {
  return element.attributes['name'] ?? DEFAULT_ACTOR;
}

function excerpt(block: string): string {
  return block.length > 60 ? `${block.slice(0, 57)}...` : block;
}

export function splitBlocks(source: string): string[] {
  return source
    .replace(/\r\n?/g, '\n')
    .replace(COMMENT_PATTERN, '')
    .trim()
    .split(BLOCK_SEPARATOR)
    .map(block => block.trim())
    .filter(block => block.length > 0);
}

export function parseScriptWithDiagnostics(source: string): ParseResult {
  const drafts: SceneDraft[] = [];
  const degradations: ParseDegradation[] = [];
  let currentScene: SceneDraft | null = null;
  let currentActor = DEFAULT_ACTOR;

  for (const [blockIndex, block] of splitBlocks(source).entries()) {
    const element = parseFragment(block);

    if (element && isActorTag(element)) {
      currentActor = actorName(element);
      continue;
    }

    if (element) {
      currentScene = { overlay: element, paragraphs: [] };
      drafts.push(currentScene);
      currentActor = DEFAULT_ACTOR;
      continue;
    }

    let text = block;
    const inline = INLINE_ACTOR_PATTERN.exec(block);
    if (inline) {
      const [, tag = '', remainder = ''] = inline;
      const actorElement = parseFragment(tag);
      if (actorElement) {
        currentActor = actorName(actorElement);
      } else {
        currentActor = DEFAULT_ACTOR;
        degradations.push({ blockIndex, excerpt: excerpt(tag), reason: fragmentProblem(tag) });
      }
      text = remainder;
    } else if (block.startsWith('<')) {
      degradations.push({ blockIndex, excerpt: excerpt(block), reason: fragmentProblem(block) });
    }

    const paragraph = createParagraph(text, currentActor);
    if (!paragraph.text) continue;

    if (currentScene === null) {
      currentScene = { overlay: null, paragraphs: [] };
      drafts.push(currentScene);
    }
    currentScene.paragraphs.push(paragraph);
  }

  const document: Scene[] = drafts.map(draft =>
    Object.freeze({ overlay: draft.overlay, paragraphs: Object.freeze([...draft.paragraphs]) }),
  );
  return { document: Object.freeze(document), degradations };
}

export function parseScript(source: string): ScriptDocument {
  const { document, degradations } = parseScriptWithDiagnostics(source);
  for (const d of degradations) {
    logger.warn('Parser: malformed markup kept as paragraph text', { ...d });
  }
  logger.debug('Parser: parsed script', {
    scenes:     document.length,
    paragraphs: document.reduce((n, s) => n + s.paragraphs.length, 0),
  });
  return document;
}

export function parseScriptFile(scriptPath: string): ScriptDocument {
  let source: string;
  try {
    source = fs.readFileSync(scriptPath, 'utf-8');
  } catch (err) {
    throw new ScriptReadError(scriptPath, err);
  }
  logger.info('Parser: reading script', { scriptPath, bytes: source.length });
  return parseScript(source);
}
