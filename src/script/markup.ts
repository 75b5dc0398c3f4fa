/**
 * Markup fragments: parsing a block as a single well-formed element and
 * serialising it canonically for hashing.
 *
 * Canonical form: attributes sorted by name (code-unit order, never locale
 * order), text runs whitespace-collapsed, empty elements self-closed. Two
 * fragments that differ only in attribute order or formatting serialise
 * identically.
 */
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { normalizeText, type OverlayElement, type OverlayNode } from './types.js';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder:       true,
  ignoreAttributes:    false,
  attributeNamePrefix: '',
  parseTagValue:       false,
  parseAttributeValue: false,
  trimValues:          true,
});

// ── Parsing ───────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(raw: unknown): Record<string, string> {
  if (!isRecord(raw)) return {};
  return Object.fromEntries(Object.entries(raw).map(([name, value]) => [name, String(value)]));
}

function toNodes(raw: unknown): OverlayNode[] {
  if (!Array.isArray(raw)) return [];
  const entries: unknown[] = raw;
  const nodes: OverlayNode[] = [];

  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        const text = normalizeText(String(value));
        if (text) nodes.push({ kind: 'text', text });
        continue;
      }
      nodes.push({
        kind:       'element',
        tag:        key,
        attributes: toAttributes(entry[ATTRIBUTES_KEY]),
        children:   toNodes(value),
      });
    }
  }
  return nodes;
}

const SKIPPED_SECTIONS: Array<[string, string]> = [
  ['<!--', '-->'],
  ['<![CDATA[', ']]>'],
  ['<?', '?>'],
];

/**
 * Offset just past the tag that closes the first top-level element, or -1
 * when the markup never closes it. Quoted attribute values may hold `>`.
 */
export function rootElementEnd(source: string): number {
  let depth = 0;
  let i = 0;

  while (i < source.length) {
    const open = source.indexOf('<', i);
    if (open === -1) return -1;

    const section = SKIPPED_SECTIONS.find(([start]) => source.startsWith(start, open));
    if (section) {
      const close = source.indexOf(section[1], open + section[0].length);
      if (close === -1) return -1;
      i = close + section[1].length;
      continue;
    }

    let j = open + 1;
    let quote: string | null = null;
    for (; j < source.length; j++) {
      const c = source[j];
      if (quote !== null) {
        if (c === quote) quote = null;
      } else if (c === '"' || c === "'") {
        quote = c;
      } else if (c === '>') {
        break;
      }
    }
    if (j >= source.length) return -1;

    if (source[open + 1] === '/') depth--;
    else if (source[j - 1] !== '/') depth++;
    i = j + 1;
    if (depth <= 0) return i;
  }
  return -1;
}

/**
 * Parse `source` as exactly one well-formed element.
 * Returns null for anything else: plain text, malformed markup, several
 * sibling roots, or text outside the root.
 */
export function parseFragment(source: string): OverlayElement | null {
  const trimmed = source.trim();
  if (!trimmed.startsWith('<')) return null;
  if (XMLValidator.validate(trimmed) !== true) return null;
  if (rootElementEnd(trimmed) !== trimmed.length) return null;

  let raw: unknown;
  try {
    raw = parser.parse(trimmed);
  } catch {
    return null;
  }

  const nodes = toNodes(raw);
  const [root] = nodes;
  if (nodes.length !== 1 || root === undefined || root.kind !== 'element') return null;
  return root;
}

/** Validator message for a block that looks like markup but is not well formed. */
export function fragmentProblem(source: string): string {
  const trimmed = source.trim();
  const result = XMLValidator.validate(trimmed);
  if (result !== true) return result.err.msg;
  return rootElementEnd(trimmed) === trimmed.length ? 'not a single root element' : 'content after the root element';
}

// ── Canonical serialisation ───────────────────────────────────────────────────

function escapeMarkup(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function canonicalize(node: OverlayNode): string {
  if (node.kind === 'text') return escapeMarkup(node.text);

  const attrs = Object.keys(node.attributes)
    .sort(byCodeUnit)
    .map(name => ` ${name}="${escapeMarkup(normalizeText(node.attributes[name] ?? ''))}"`)
    .join('');

  if (node.children.length === 0) return `<${node.tag}${attrs}/>`;
  return `<${node.tag}${attrs}>${node.children.map(canonicalize).join('')}</${node.tag}>`;
}

/** Concatenated text content of an element, whitespace-collapsed. */
export function textContent(node: OverlayNode): string {
  if (node.kind === 'text') return node.text;
  return normalizeText(node.children.map(textContent).join(' '));
}
