/**
 * SceneSpec validation — raw job description → CompilationJob.
 *
 * Runs before any workspace or provider work. Every problem found is collected
 * into a single ValidationError; the first issue names the scene and field.
 */
import * as fs from 'fs';
import { z } from 'zod';
import { EFFECTS, type Effect } from '../media/effects.js';
import { ValidationError, type ValidationIssue } from '../errors.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface SceneSpec {
  readonly id: number;
  readonly script: string;
  readonly imagePrompt?: string;
  readonly imagePath?: string;
  readonly negativeImagePrompt?: string;
  readonly modelId?: string;
  readonly audioPath?: string;
  readonly effect: Effect;
  /** Declared length in seconds; a ceiling on the narration-driven length */
  readonly duration: number;
}

export interface JobMetadata {
  title?: string;
  description?: string;
}

export interface CompilationJob {
  readonly niche: string;
  /** Ascending by id */
  readonly scenes: readonly SceneSpec[];
  readonly metadata?: JobMetadata;
}

// ── Schemas ───────────────────────────────────────────────────────────────────

const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

export function isRemoteSource(source: string): boolean {
  return URL_SCHEME.test(source);
}

/** A pre-supplied source must be a well-formed http(s) URL or an existing local file. */
function checkSource(source: string): string | undefined {
  if (isRemoteSource(source)) {
    try {
      const url = new URL(source);
      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        return `unsupported URL scheme "${url.protocol}"`;
      }
      return undefined;
    } catch {
      return `malformed URL "${source}"`;
    }
  }
  return fs.existsSync(source) ? undefined : `file not found "${source}"`;
}

const sourcePath = (field: string) =>
  z.string().trim().min(1, `${field} must not be empty`).superRefine((value, ctx) => {
    const problem = checkSource(value);
    if (problem) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field}: ${problem}` });
  });

const optionalText = z.string().trim().min(1).optional();

/** Numbers pass through; only non-blank strings are converted. */
const numericText = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() !== '' ? Number(value) : value;

const SceneInputSchema = z
  .object({
    script:              z.string({ required_error: 'script is required' }).trim().min(1, 'script must not be empty'),
    imagePrompt:         optionalText,
    imagePath:           sourcePath('imagePath').optional(),
    negativeImagePrompt: optionalText,
    modelId:             optionalText,
    audioPath:           sourcePath('audioPath').optional(),
    effect: z.enum(EFFECTS, {
      errorMap: (_issue, ctx) => ({
        message: ctx.data === undefined
          ? 'effect is required'
          : `unknown effect "${String(ctx.data)}" (expected one of ${EFFECTS.join(', ')})`,
      }),
    }),
    duration: z.preprocess(
      numericText,
      z.number({ required_error: 'duration is required', invalid_type_error: 'duration must be a number' })
        .finite('duration must be a number')
        .positive('duration must be > 0'),
    ),
  })
  .refine((s) => s.imagePrompt !== undefined || s.imagePath !== undefined, {
    message: 'an image source (imagePrompt or imagePath) is required',
    path: ['imagePrompt'],
  });

const MetadataSchema = z.object({
  title:       z.string().optional(),
  description: z.string().optional(),
});

const JobInputSchema = z.object({
  niche:    z.string().trim().default(''),
  scenes:   z.record(z.unknown(), { required_error: 'scenes is required' }),
  metadata: MetadataSchema.optional(),
});

// ── Validation ────────────────────────────────────────────────────────────────

/** Positive integer from a scene key; `"01"` normalises to 1. */
export function parseSceneId(key: string): number | undefined {
  if (!/^\d+$/.test(key.trim())) return undefined;
  const id = parseInt(key, 10);
  return id > 0 && Number.isSafeInteger(id) ? id : undefined;
}

export function validateJob(input: unknown): CompilationJob {
  const job = JobInputSchema.safeParse(input);
  if (!job.success) {
    throw new ValidationError(
      job.error.issues.map((i) => ({ path: i.path.join('.'), message: `${i.path.join('.') || 'job'}: ${i.message}` })),
    );
  }

  const issues: ValidationIssue[] = [];
  const scenes: SceneSpec[] = [];
  const seen = new Map<number, string>();
  let metadata = job.data.metadata;

  for (const [key, raw] of Object.entries(job.data.scenes)) {
    if (key === 'metadata') {
      const meta = MetadataSchema.safeParse(raw);
      if (meta.success) metadata = { ...meta.data, ...metadata };
      else issues.push({ path: 'scenes.metadata', message: 'metadata must be an object of strings' });
      continue;
    }

    const id = parseSceneId(key);
    if (id === undefined) {
      issues.push({ path: `scenes.${key}`, message: `scene id "${key}" is not a positive integer` });
      continue;
    }
    const previous = seen.get(id);
    if (previous !== undefined) {
      issues.push({ sceneId: id, path: `scenes.${key}`, message: `duplicate scene id (also given as "${previous}")` });
      continue;
    }
    seen.set(id, key);

    const scene = SceneInputSchema.safeParse(raw);
    if (!scene.success) {
      for (const issue of scene.error.issues) {
        issues.push({ sceneId: id, path: ['scenes', key, ...issue.path].join('.'), message: issue.message });
      }
      continue;
    }
    scenes.push(Object.freeze({ id, ...scene.data }));
  }

  if (seen.size === 0 && issues.length === 0) {
    issues.push({ path: 'scenes', message: 'scenes must contain at least one scene' });
  }
  if (issues.length > 0) throw new ValidationError(issues);

  scenes.sort((a, b) => a.id - b.id);
  return Object.freeze({
    niche: job.data.niche,
    scenes: Object.freeze(scenes),
    ...(metadata ? { metadata } : {}),
  });
}
