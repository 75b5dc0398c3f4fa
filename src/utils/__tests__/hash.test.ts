import { describe, it, expect } from 'vitest';
import { canonicalOverlay, hashFields, paragraphDigest, sceneDigest } from '../hash.js';
import { parseFragment } from '../../script/markup.js';
import { createParagraph, type Scene } from '../../script/types.js';

describe('hashFields', () => {
  it('produces a 64-char hex sha256 digest', () => {
    expect(hashFields(['a', 'b'])).toMatch(/^[0-9a-f]{64}$/);
  });

  it('separates fields so shifted boundaries do not collide', () => {
    expect(hashFields(['ab', 'c'])).not.toBe(hashFields(['a', 'bc']));
  });
});

describe('paragraphDigest', () => {
  it('ignores whitespace that normalization collapses', () => {
    const a = createParagraph('Hello   world', 'narrator');
    const b = createParagraph('  Hello\n world ', 'narrator');
    expect(paragraphDigest(a)).toBe(paragraphDigest(b));
  });

  it('changes when the text changes', () => {
    expect(paragraphDigest(createParagraph('Hello world', 'narrator')))
      .not.toBe(paragraphDigest(createParagraph('Hello world!', 'narrator')));
  });

  it('changes when the actor changes', () => {
    expect(paragraphDigest(createParagraph('Hello', 'narrator')))
      .not.toBe(paragraphDigest(createParagraph('Hello', 'host')));
  });

  it('hashes exactly the actor and the normalized text', () => {
    expect(paragraphDigest(createParagraph(' Hi  there ', 'host'))).toBe(hashFields(['host', 'Hi there']));
  });
});

describe('canonicalOverlay', () => {
  it('is stable across attribute order and formatting', () => {
    const a = parseFragment('<chapter  start="1"   title="C1"/>');
    const b = parseFragment('<chapter title="C1" start="1"></chapter>');
    expect(canonicalOverlay(a)).toBe('<chapter start="1" title="C1"/>');
    expect(canonicalOverlay(b)).toBe('<chapter start="1" title="C1"/>');
  });

  it('collapses whitespace in nested text', () => {
    const overlay = parseFragment('<chapter>\n  Part   One\n</chapter>');
    expect(canonicalOverlay(overlay)).toBe('<chapter>Part One</chapter>');
  });

  it('is empty for a scene without an overlay', () => {
    expect(canonicalOverlay(null)).toBe('');
  });
});

describe('sceneDigest', () => {
  const paragraphs = [createParagraph('One.', 'narrator'), createParagraph('Two.', 'host')];

  it('depends on content, not object identity', () => {
    const a: Scene = { overlay: parseFragment('<chapter title="C1"/>'), paragraphs };
    const b: Scene = { overlay: parseFragment('<chapter title="C1" />'), paragraphs: [...paragraphs] };
    expect(sceneDigest(a)).toBe(sceneDigest(b));
  });

  it('changes with the overlay', () => {
    const withOverlay: Scene = { overlay: parseFragment('<chapter title="C1"/>'), paragraphs };
    const without: Scene = { overlay: null, paragraphs };
    expect(sceneDigest(withOverlay)).not.toBe(sceneDigest(without));
  });

  it('changes with paragraph order', () => {
    const forward: Scene = { overlay: null, paragraphs };
    const reversed: Scene = { overlay: null, paragraphs: [...paragraphs].reverse() };
    expect(sceneDigest(forward)).not.toBe(sceneDigest(reversed));
  });

  it('combines the canonical overlay with the paragraph digests', () => {
    const scene: Scene = { overlay: null, paragraphs };
    expect(sceneDigest(scene)).toBe(hashFields(['', ...paragraphs.map(paragraphDigest)]));
  });
});
