/**
 * Error taxonomy for a compilation job.
 *
 * Every failure that reaches the job boundary is a CompilationError carrying the
 * stage it happened in and, where one is involved, the scene id. `toJSON()` is the
 * structured form handed back to callers.
 */

export type CompilationStage =
  | 'validation'
  | 'assets'
  | 'render'
  | 'mix'
  | 'stitch'
  | 'workspace'
  | 'cancelled';

export type AssetKind = 'image' | 'narration';

export interface CompilationErrorJson {
  name: string;
  stage: CompilationStage;
  message: string;
  sceneId?: number;
  assetKind?: AssetKind;
}

export class CompilationError extends Error {
  constructor(
    message: string,
    public readonly stage: CompilationStage,
    public readonly sceneId?: number,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'CompilationError';
  }

  toJSON(): CompilationErrorJson {
    return {
      name:    this.name,
      stage:   this.stage,
      message: this.message,
      ...(this.sceneId !== undefined ? { sceneId: this.sceneId } : {}),
    };
  }
}

export interface ValidationIssue {
  /** Scene id the issue belongs to, when it can be attributed to one */
  sceneId?: number;
  path: string;
  message: string;
}

export class ValidationError extends CompilationError {
  constructor(public readonly issues: ValidationIssue[]) {
    const first = issues[0];
    const where = first?.sceneId !== undefined ? `Scene ${first.sceneId}: ` : '';
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : '';
    super(`${where}${first?.message ?? 'invalid job'}${more}`, 'validation', first?.sceneId);
    this.name = 'ValidationError';
  }
}

export class AssetResolutionError extends CompilationError {
  constructor(
    sceneId: number,
    public readonly assetKind: AssetKind,
    detail: string,
    cause?: unknown,
  ) {
    super(`Scene ${sceneId}: ${assetKind} resolution failed — ${detail}`, 'assets', sceneId, cause);
    this.name = 'AssetResolutionError';
  }

  override toJSON(): CompilationErrorJson {
    return { ...super.toJSON(), assetKind: this.assetKind };
  }
}

export class RenderError extends CompilationError {
  constructor(
    message: string,
    stage: Extract<CompilationStage, 'render' | 'mix' | 'stitch'>,
    sceneId?: number,
    cause?: unknown,
  ) {
    super(message, stage, sceneId, cause);
    this.name = 'RenderError';
  }
}

export class WorkspaceError extends CompilationError {
  constructor(message: string, cause?: unknown) {
    super(message, 'workspace', undefined, cause);
    this.name = 'WorkspaceError';
  }
}

export class CancelledError extends CompilationError {
  constructor(reason?: unknown) {
    super(`Job cancelled${reason instanceof Error ? `: ${reason.message}` : ''}`, 'cancelled', undefined, reason);
    this.name = 'CancelledError';
  }
}

/** Throw a CancelledError when the signal has fired. */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError(signal.reason);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
