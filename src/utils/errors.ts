/**
 * Render error taxonomy.
 *
 * Every error carries a closed `kind` and the `scope` it is fatal for, so the
 * orchestrator decides between "drop the paragraph", "fail the scene" and
 * "abort the run" by branching on data, never on message text.
 */

export type ErrorScope = 'paragraph' | 'scene' | 'run';

export type RenderErrorKind =
  | 'unknown_actor'
  | 'provider_request_failed'
  | 'provider_job_failed'
  | 'provider_job_timeout'
  | 'composition_failed'
  | 'scene_empty'
  | 'cache_write_failed'
  | 'render_aborted'
  | 'script_unreadable'
  | 'config_invalid';

export abstract class RenderError extends Error {
  abstract readonly kind: RenderErrorKind;
  abstract readonly scope: ErrorScope;

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

// ── Paragraph scope ───────────────────────────────────────────────────────────

export class UnknownActorError extends RenderError {
  readonly kind = 'unknown_actor' as const;
  readonly scope = 'paragraph' as const;

  constructor(public readonly actor: string) {
    super(`No actor profile configured for "${actor}"`);
  }
}

export type ProviderStage = 'synthesize' | 'upload' | 'submit' | 'poll' | 'fetch';

export abstract class ProviderError extends RenderError {
  readonly scope = 'paragraph' as const;

  constructor(public readonly provider: string, message: string, cause?: unknown) {
    super(`${provider}: ${message}`, cause);
  }
}

export class ProviderRequestError extends ProviderError {
  readonly kind = 'provider_request_failed' as const;

  constructor(provider: string, public readonly stage: ProviderStage, cause?: unknown) {
    super(provider, `${stage} failed: ${describe(cause)}`, cause);
  }
}

export class ProviderJobFailedError extends ProviderError {
  readonly kind = 'provider_job_failed' as const;

  constructor(provider: string, public readonly jobId: string, public readonly reason: string) {
    super(provider, `job ${jobId} failed: ${reason}`);
  }
}

export class ProviderJobTimeoutError extends ProviderError {
  readonly kind = 'provider_job_timeout' as const;

  constructor(provider: string, public readonly jobId: string, public readonly attempts: number) {
    super(provider, `job ${jobId} not finished after ${attempts} poll attempts`);
  }
}

// ── Scene scope ───────────────────────────────────────────────────────────────

export class CompositionError extends RenderError {
  readonly kind = 'composition_failed' as const;
  readonly scope = 'scene' as const;

  constructor(public readonly sceneDigest: string, cause?: unknown) {
    super(`Composition failed for scene ${sceneDigest}: ${describe(cause)}`, cause);
  }
}

export class SceneEmptyError extends RenderError {
  readonly kind = 'scene_empty' as const;
  readonly scope = 'scene' as const;

  constructor(public readonly sceneDigest: string, public readonly paragraphCount: number) {
    super(`No paragraph of scene ${sceneDigest} produced a usable artifact (${paragraphCount} attempted)`);
  }
}

/** The cache could not take a finished artifact. Storage trouble is never a provider fault. */
export class CacheWriteError extends RenderError {
  readonly kind = 'cache_write_failed' as const;
  readonly scope = 'scene' as const;

  constructor(public readonly tier: string, public readonly target: string, cause?: unknown) {
    super(`Cache ${tier} could not write ${target}: ${describe(cause)}`, cause);
  }
}

// ── Run scope ─────────────────────────────────────────────────────────────────

export class RenderAbortedError extends RenderError {
  readonly kind = 'render_aborted' as const;
  readonly scope = 'run' as const;

  constructor(cause?: unknown) {
    super('Render aborted', cause);
  }
}

export class ScriptReadError extends RenderError {
  readonly kind = 'script_unreadable' as const;
  readonly scope = 'run' as const;

  constructor(public readonly scriptPath: string, cause?: unknown) {
    super(`Cannot read script ${scriptPath}: ${describe(cause)}`, cause);
  }
}

export class ConfigError extends RenderError {
  readonly kind = 'config_invalid' as const;
  readonly scope = 'run' as const;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

export function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isRenderError(err: unknown): err is RenderError {
  return err instanceof RenderError;
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new RenderAbortedError(signal.reason);
}
