/**
 * Asset resolver — per scene, a local image and narration clip in the workspace.
 *
 * Scenes resolve concurrently (bounded). Provider calls and downloads retry on
 * transient failure; anything left over becomes an AssetResolutionError naming the
 * scene and asset kind, which aborts the remaining scenes.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { mapConcurrent } from '../utils/pool.js';
import { downloadBytes, type ImageProvider } from '../ai/images.js';
import type { NarrationProvider } from '../ai/voice.js';
import type { Dimensions, MediaToolkit } from '../media/ffmpeg.js';
import { frameCount } from '../media/effects.js';
import { AssetResolutionError, CompilationError, describeError, type AssetKind } from '../errors.js';
import type { RetryPolicy } from '../config.js';
import { isRemoteSource, type CompilationJob, type SceneSpec } from './scenes.js';
import type { Workspace } from './workspace.js';

export interface SceneAsset {
  sceneId: number;
  imagePath: string;
  audioPath: string;
  /** Measured narration length in seconds */
  audioDuration: number;
  /** Length the scene is rendered at */
  effectiveDuration: number;
}

export interface AssetDeps {
  images: ImageProvider;
  narration: NarrationProvider;
  toolkit: MediaToolkit;
  retry: RetryPolicy;
  concurrency: number;
  /** Size requested from the image provider */
  imageSize: Dimensions;
  /** Output frame rate; effective durations land on frame boundaries */
  fps: number;
}

const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp', '.bmp'];
const AUDIO_EXTENSIONS = ['.mp3', '.wav', '.m4a', '.aac', '.ogg', '.flac'];

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  'image/png':  '.png',
  'image/jpeg': '.jpg',
  'image/webp': '.webp',
  'image/bmp':  '.bmp',
  'audio/mpeg': '.mp3',
  'audio/wav':  '.wav',
  'audio/x-wav': '.wav',
  'audio/mp4':  '.m4a',
  'audio/aac':  '.aac',
  'audio/ogg':  '.ogg',
  'audio/flac': '.flac',
};

/**
 * Declared duration is a ceiling: narration shorter than it wins, longer narration
 * is cut at the declared length. The result is snapped to a whole number of frames
 * so the clip, its narration segment and its captions share one length.
 */
export function effectiveDuration(measured: number, declared: number, fps: number): number {
  const capped = measured <= declared ? measured : declared;
  return frameCount(capped, fps) / fps;
}

/**
 * Extension for a fetched asset: the source path's extension when it is one of
 * `allowed`, otherwise the one implied by the response content type, otherwise
 * whatever the path ends in (so the format error can name it).
 */
export function extensionFor(source: string | undefined, allowed: readonly string[], contentType?: string): string {
  let fromPath = '';
  if (source) {
    const pathname = isRemoteSource(source) ? new URL(source).pathname : source;
    fromPath = path.extname(pathname).toLowerCase();
    if (allowed.includes(fromPath)) return fromPath;
  }
  const mime = contentType?.split(';')[0]?.trim().toLowerCase();
  const fromType = mime ? CONTENT_TYPE_EXTENSIONS[mime] : undefined;
  if (fromType && allowed.includes(fromType)) return fromType;
  return fromPath || (fromType ?? '');
}

// ── Per-kind resolution ───────────────────────────────────────────────────────

function requireFormat(ext: string, allowed: readonly string[], kind: AssetKind): string {
  if (!allowed.includes(ext)) {
    throw new Error(`unsupported ${kind} format "${ext || 'unknown'}"`);
  }
  return ext;
}

async function fetchSource(
  source: string,
  target: (ext: string) => string,
  allowed: readonly string[],
  kind: AssetKind,
  deps: AssetDeps,
  signal: AbortSignal,
): Promise<string> {
  if (!isRemoteSource(source)) {
    const dest = target(requireFormat(extensionFor(source, allowed), allowed, kind));
    await fs.copyFile(source, dest);
    return dest;
  }
  const { bytes, contentType } = await withRetry(
    () => downloadBytes(source, signal),
    { ...deps.retry, signal, label: `${kind} download` },
  );
  const dest = target(requireFormat(extensionFor(source, allowed, contentType), allowed, kind));
  await fs.writeFile(dest, bytes);
  return dest;
}

async function resolveImage(scene: SceneSpec, ws: Workspace, deps: AssetDeps, signal: AbortSignal): Promise<string> {
  const target = (ext: string) => ws.file(`image_${scene.id}${ext}`);
  if (scene.imagePath) return fetchSource(scene.imagePath, target, IMAGE_EXTENSIONS, 'image', deps, signal);

  const prompt = scene.imagePrompt ?? '';
  const { bytes, contentType } = await withRetry(
    () => deps.images.generate({
      prompt,
      size: deps.imageSize,
      ...(scene.negativeImagePrompt ? { negativePrompt: scene.negativeImagePrompt } : {}),
      ...(scene.modelId ? { modelId: scene.modelId } : {}),
    }, signal),
    { ...deps.retry, signal, label: `image scene ${scene.id}` },
  );
  const dest = target(requireFormat(extensionFor(undefined, IMAGE_EXTENSIONS, contentType) || '.png', IMAGE_EXTENSIONS, 'image'));
  await fs.writeFile(dest, bytes);
  return dest;
}

async function resolveNarration(scene: SceneSpec, ws: Workspace, deps: AssetDeps, signal: AbortSignal): Promise<string> {
  const target = (ext: string) => ws.file(`audio_${scene.id}${ext}`);
  if (scene.audioPath) return fetchSource(scene.audioPath, target, AUDIO_EXTENSIONS, 'narration', deps, signal);

  const { bytes, extension } = await withRetry(
    () => deps.narration.synthesize(scene.script, signal),
    { ...deps.retry, signal, label: `narration scene ${scene.id}` },
  );
  const dest = target(requireFormat(extension, AUDIO_EXTENSIONS, 'narration'));
  await fs.writeFile(dest, bytes);
  return dest;
}

async function attempt<T>(scene: SceneSpec, kind: AssetKind, fn: () => Promise<T>, signal: AbortSignal): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    // Aborts and already-classified failures pass through untouched
    if (signal.aborted || err instanceof CompilationError) throw err;
    throw new AssetResolutionError(scene.id, kind, describeError(err), err);
  }
}

export async function resolveSceneAsset(
  scene: SceneSpec,
  ws: Workspace,
  deps: AssetDeps,
  signal: AbortSignal,
): Promise<SceneAsset> {
  logger.info('Assets: resolving scene', { jobId: ws.id, sceneId: scene.id });

  const imagePath = await attempt(scene, 'image', () => resolveImage(scene, ws, deps, signal), signal);
  const audioPath = await attempt(scene, 'narration', () => resolveNarration(scene, ws, deps, signal), signal);
  const audioDuration = await attempt(scene, 'narration', () => deps.toolkit.probeDuration(audioPath, signal), signal);

  const asset: SceneAsset = {
    sceneId: scene.id,
    imagePath,
    audioPath,
    audioDuration,
    effectiveDuration: effectiveDuration(audioDuration, scene.duration, deps.fps),
  };
  logger.info('Assets: scene resolved', {
    jobId: ws.id,
    sceneId: scene.id,
    audioDuration,
    effectiveDuration: asset.effectiveDuration,
  });
  return asset;
}

/** Resolve every scene; result is index-aligned with `job.scenes`. */
export function resolveAssets(
  job: CompilationJob,
  ws: Workspace,
  deps: AssetDeps,
  signal?: AbortSignal,
): Promise<SceneAsset[]> {
  return mapConcurrent(job.scenes, deps.concurrency, (scene, _i, sceneSignal) =>
    resolveSceneAsset(scene, ws, deps, sceneSignal), signal);
}
