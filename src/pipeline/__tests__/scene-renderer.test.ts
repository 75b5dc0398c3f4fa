import { describe, it, expect, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { renderScene } from '../scene-renderer.js';
import { parseScript } from '../../script/parser.js';
import {
  CacheWriteError,
  CompositionError,
  ProviderJobFailedError,
  ProviderJobTimeoutError,
  ProviderRequestError,
  RenderAbortedError,
  SceneEmptyError,
  UnknownActorError,
} from '../../utils/errors.js';
import { ACTORS, makeRig, providerCalls } from './fakes.js';
import type { Paragraph, Scene } from '../../script/types.js';

const SCRIPT = '<chapter title="C1"/>\n\nHello there.\n\n<actor name="host"/>\nGoodbye.';

function firstScene(source = SCRIPT): Scene {
  const [scene] = parseScript(source);
  if (!scene) throw new Error('fixture script produced no scene');
  return scene;
}

function paragraphAt(scene: Scene, i: number): Paragraph {
  const paragraph = scene.paragraphs[i];
  if (!paragraph) throw new Error(`fixture has no paragraph ${i}`);
  return paragraph;
}

function dropSceneFinal(scenePath: string): void {
  fs.rmSync(scenePath);
  fs.rmSync(`${scenePath}.manifest.json`);
}

describe('renderScene', () => {
  it('voices external actors through speech and native actors through the avatar provider', async () => {
    const rig = makeRig();
    const scene = firstScene();

    const result = await renderScene(rig.ctx, scene);

    expect(rig.speech.calls).toEqual(['Hello there.']);
    expect(rig.avatar.submissions.map(s => s.speech)).toEqual([
      { kind: 'audio', audioPath: rig.ctx.cache.paragraphAudio.pathFor({ scene, paragraph: paragraphAt(scene, 0) }) },
      { kind: 'text', text: 'Goodbye.', voiceId: 'voice-host' },
    ]);
    expect(rig.avatar.submissions.map(s => s.avatar.avatarId)).toEqual(['avatar-narrator', 'avatar-host']);
    expect(result.cached).toBe(false);
    expect(result.outcomes.map(o => o.status)).toEqual(['rendered', 'rendered']);
  });

  it('concatenates paragraph videos in document order and burns the chapter title', async () => {
    const rig = makeRig();
    const scene = firstScene();

    const result = await renderScene(rig.ctx, scene);

    expect(rig.compositor.concatenations).toHaveLength(1);
    expect(rig.compositor.concatenations[0]?.fit).toBe('compose');
    expect(rig.compositor.concatenations[0]?.inputs).toEqual(
      scene.paragraphs.map(paragraph => rig.ctx.cache.paragraphVideo.pathFor({ scene, paragraph })),
    );
    expect(rig.compositor.compositions).toEqual([{ elements: [{ text: 'C1', start: 0, duration: 3 }], duration: 4.5 }]);
    expect(result.path).toBe(rig.ctx.cache.sceneFinal.pathFor(scene));
    expect(fs.readFileSync(result.path, 'utf-8')).toBe('overlay(C1)[video:video://job-1|video:video://job-2]');
  });

  it('skips composition for a scene without an overlay', async () => {
    const rig = makeRig();
    const result = await renderScene(rig.ctx, firstScene('First.\n\nSecond.'));

    expect(rig.compositor.compositions).toEqual([]);
    expect(fs.readFileSync(result.path, 'utf-8')).toBe('video:video://job-1|video:video://job-2');
  });

  it('makes zero provider calls when re-rendering an unchanged scene', async () => {
    const first = makeRig();
    const initial = await renderScene(first.ctx, firstScene());

    const second = makeRig(first.projectDir);
    const again = await renderScene(second.ctx, firstScene());

    expect(again.cached).toBe(true);
    expect(again.path).toBe(initial.path);
    expect(providerCalls(second)).toBe(0);
    expect(second.compositor.concatenations).toEqual([]);
    expect(second.ctx.usage.summary().totalCalls).toBe(0);
  });

  it('reuses cached paragraph videos when only the scene final is missing', async () => {
    const first = makeRig();
    const initial = await renderScene(first.ctx, firstScene());
    dropSceneFinal(initial.path);

    const second = makeRig(first.projectDir);
    const rebuilt = await renderScene(second.ctx, firstScene());

    expect(providerCalls(second)).toBe(0);
    expect(rebuilt.cached).toBe(false);
    expect(rebuilt.outcomes.map(o => (o.status === 'rendered' ? o.cached : null))).toEqual([true, true]);
    expect(second.compositor.concatenations).toHaveLength(1);
  });

  it('checks the paragraph video before doing any audio work', async () => {
    const first = makeRig();
    const scene = firstScene();
    const initial = await renderScene(first.ctx, scene);
    dropSceneFinal(initial.path);
    const narratorParagraph = paragraphAt(scene, 0);
    fs.rmSync(first.ctx.cache.paragraphAudio.pathFor({ scene, paragraph: narratorParagraph }));

    const second = makeRig(first.projectDir);
    await renderScene(second.ctx, firstScene());

    expect(second.speech.calls).toEqual([]);
    expect(fs.existsSync(first.ctx.cache.paragraphAudio.pathFor({ scene, paragraph: narratorParagraph }))).toBe(false);
  });

  it('re-renders a paragraph video whose avatar settings changed but keeps its audio', async () => {
    const first = makeRig();
    const initial = await renderScene(first.ctx, firstScene());
    dropSceneFinal(initial.path);

    const changed = { ...ACTORS, narrator: { ...ACTORS.narrator, video: { provider: 'heygen', avatarId: 'avatar-new' } } };
    const second = makeRig(first.projectDir, changed);
    await renderScene(second.ctx, firstScene());

    expect(second.speech.calls).toEqual([]);
    expect(second.avatar.submissions.map(s => s.avatar.avatarId)).toEqual(['avatar-new']);
  });

  it('records provider usage', async () => {
    const rig = makeRig();
    await renderScene(rig.ctx, firstScene());

    expect(rig.ctx.usage.summary()).toEqual({
      speechCalls:      1,
      speechCharacters: 'Hello there.'.length,
      assetUploads:     0,
      videoJobs:        2,
      totalCalls:       3,
    });
  });

  describe('paragraph failures', () => {
    it('skips a paragraph whose actor has no profile', async () => {
      const rig = makeRig();
      const result = await renderScene(rig.ctx, firstScene('Hello.\n\n<actor name="ghost"/>\nBoo.'));

      expect(result.outcomes.map(o => o.status)).toEqual(['rendered', 'skipped']);
      const skipped = result.outcomes[1];
      expect(skipped?.status === 'skipped' ? skipped.error : null).toBeInstanceOf(UnknownActorError);
      expect(rig.compositor.concatenations[0]?.inputs).toHaveLength(1);
      expect(rig.ctx.cache.sceneFinal.manifest(result.scene)?.details).toEqual({ paragraphs: 1, omitted: 1 });
    });

    it('drops a paragraph whose submission fails and keeps the rest', async () => {
      const rig = makeRig();
      rig.avatar.rejectSubmit = speech => speech.kind === 'text';

      const result = await renderScene(rig.ctx, firstScene());
      const failed = result.outcomes[1];

      expect(result.outcomes.map(o => o.status)).toEqual(['rendered', 'failed']);
      expect(failed?.status === 'failed' ? failed.error : null).toBeInstanceOf(ProviderRequestError);
      expect(failed).toMatchObject({ error: { stage: 'submit', provider: 'heygen' } });
      expect(fs.readFileSync(result.path, 'utf-8')).toBe('overlay(C1)[video:video://job-1]');
    });

    it('drops a paragraph whose speech synthesis fails', async () => {
      const rig = makeRig();
      rig.speech.failing.add('Hello there.');

      const result = await renderScene(rig.ctx, firstScene());

      expect(result.outcomes[0]).toMatchObject({ status: 'failed', error: { stage: 'synthesize', provider: 'elevenlabs' } });
      expect(rig.avatar.submissions.map(s => s.speech.kind)).toEqual(['text']);
    });

    it('drops a paragraph whose job fails', async () => {
      const rig = makeRig();
      rig.avatar.scripted.set('job-1', [{ state: 'failed', reason: 'avatar not found' }]);

      const result = await renderScene(rig.ctx, firstScene());
      const failed = result.outcomes[0];

      expect(failed?.status === 'failed' ? failed.error : null).toBeInstanceOf(ProviderJobFailedError);
      expect(result.outcomes[1]?.status).toBe('rendered');
      expect(rig.ctx.cache.paragraphVideo.exists({ scene: result.scene, paragraph: paragraphAt(result.scene, 0) })).toBe(false);
    });

    it('drops a paragraph whose job times out', async () => {
      const rig = makeRig();
      rig.avatar.scripted.set('job-1', [{ state: 'processing' }, { state: 'processing' }, { state: 'processing' }]);

      const result = await renderScene(rig.ctx, firstScene());
      const failed = result.outcomes[0];

      expect(failed?.status === 'failed' ? failed.error : null).toBeInstanceOf(ProviderJobTimeoutError);
      expect(rig.avatar.polls.filter(id => id === 'job-1')).toHaveLength(3);
      expect(rig.ctx.sleep).toHaveBeenCalledTimes(2);
    });
  });

  describe('scene failures', () => {
    it('fails when no paragraph produced a video', async () => {
      const rig = makeRig();
      const scene = firstScene('<chapter title="Lost"/>\n\n<actor name="ghost"/>\nNobody here.');

      await expect(renderScene(rig.ctx, scene)).rejects.toBeInstanceOf(SceneEmptyError);
      expect(rig.ctx.cache.sceneFinal.exists(scene)).toBe(false);
      expect(rig.compositor.concatenations).toEqual([]);
    });

    it('fails without publishing when composition breaks', async () => {
      const rig = makeRig();
      rig.compositor.failOn = 'compose';
      const scene = firstScene();

      await expect(renderScene(rig.ctx, scene)).rejects.toBeInstanceOf(CompositionError);
      expect(rig.ctx.cache.sceneFinal.exists(scene)).toBe(false);
      const leftovers = fs.readdirSync(rig.ctx.cache.sceneDir(scene)).filter(f => f.startsWith('.tmp-'));
      expect(leftovers).toEqual([]);
    });

    it('fails the scene when the cache cannot store a paragraph video', async () => {
      const rig = makeRig();
      const scene = firstScene();
      const blocked = rig.ctx.cache.paragraphVideo.pathFor({ scene, paragraph: paragraphAt(scene, 1) });
      fs.mkdirSync(blocked, { recursive: true });

      await expect(renderScene(rig.ctx, scene)).rejects.toBeInstanceOf(CacheWriteError);
      expect(rig.avatar.submissions).toHaveLength(2);
      expect(rig.compositor.concatenations).toEqual([]);
      expect(rig.ctx.cache.sceneFinal.exists(scene)).toBe(false);
    });

    it('keeps paragraph videos cached after a composition failure', async () => {
      const rig = makeRig();
      rig.compositor.failOn = 'concatenate';
      const scene = firstScene();

      await expect(renderScene(rig.ctx, scene)).rejects.toBeInstanceOf(CompositionError);

      const next = makeRig(rig.projectDir);
      await renderScene(next.ctx, firstScene());
      expect(providerCalls(next)).toBe(0);
      expect(fs.existsSync(path.join(rig.ctx.cache.sceneDir(scene), 'scene.mp4'))).toBe(true);
    });
  });

  describe('cancellation', () => {
    it('stops before the first paragraph when already aborted', async () => {
      const rig = makeRig();
      const controller = new AbortController();
      controller.abort();
      rig.ctx.signal = controller.signal;

      await expect(renderScene(rig.ctx, firstScene())).rejects.toBeInstanceOf(RenderAbortedError);
      expect(providerCalls(rig)).toBe(0);
    });

    it('propagates an abort during polling instead of dropping the paragraph', async () => {
      const rig = makeRig();
      const controller = new AbortController();
      rig.ctx.signal = controller.signal;
      rig.ctx.sleep = vi.fn(async () => controller.abort());
      rig.avatar.scripted.set('job-1', [{ state: 'processing' }]);

      await expect(renderScene(rig.ctx, firstScene())).rejects.toBeInstanceOf(RenderAbortedError);
      expect(rig.avatar.submissions).toHaveLength(1);
    });
  });
});
