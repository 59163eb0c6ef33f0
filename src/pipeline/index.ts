/**
 * Pipeline orchestrator — validate → resolve assets → render scenes → mix → stitch.
 *
 * Validation runs before the workspace exists or any provider is called. Every
 * later stage runs inside a scoped workspace, so success leaves only the final
 * video and any failure or cancellation leaves nothing behind.
 */
import { CONCURRENCY, MUSIC, RENDER, RETRY_POLICY, SUBTITLES, env } from '../config.js';
import type { RenderSettings, RetryPolicy, SubtitleSettings } from '../config.js';
import { logger } from '../utils/logger.js';
import { FalImageProvider, type ImageProvider } from '../ai/images.js';
import { OpenAiNarrationProvider, type NarrationProvider } from '../ai/voice.js';
import { ffmpegToolkit, type MediaToolkit } from '../media/ffmpeg.js';
import { loadMusicLibrary, resolveMusicTrack, type MusicLibrary } from '../media/music.js';
import { mixAudio, totalDuration, type NarrationSegment } from '../media/audio.js';
import type { Effect } from '../media/effects.js';
import {
  CancelledError, CompilationError, RenderError, describeError, throwIfCancelled,
} from '../errors.js';
import { validateJob, type JobMetadata } from './scenes.js';
import { resolveAssets } from './assets.js';
import { renderScenes } from './renderer.js';
import { stitchVideo } from './stitcher.js';
import { withWorkspace } from './workspace.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface PipelineDeps {
  images: ImageProvider;
  narration: NarrationProvider;
  toolkit: MediaToolkit;
  music: MusicLibrary;
  render: RenderSettings;
  subtitles: SubtitleSettings;
  retry: RetryPolicy;
  concurrency: { assets: number; render: number };
  musicVolumeDb: number;
}

export interface CompileOptions {
  /** Directory the per-job workspace is created in */
  outputDir?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
  deps?: Partial<PipelineDeps>;
}

export interface SceneSummary {
  id: number;
  effect: Effect;
  audioDuration: number;
  effectiveDuration: number;
}

export interface CompilationResult {
  jobId: string;
  videoPath: string;
  durationSeconds: number;
  sceneCount: number;
  scenes: SceneSummary[];
  musicTrack?: string;
  metadata?: JobMetadata;
}

// ── Dependencies ──────────────────────────────────────────────────────────────

let sharedMusicLibrary: MusicLibrary | undefined;

function defaultDeps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
  return {
    images:        overrides.images ?? new FalImageProvider(),
    narration:     overrides.narration ?? new OpenAiNarrationProvider(),
    toolkit:       overrides.toolkit ?? ffmpegToolkit,
    music:         overrides.music ?? (sharedMusicLibrary ??= loadMusicLibrary(MUSIC.libraryPath)),
    render:        overrides.render ?? RENDER,
    subtitles:     overrides.subtitles ?? SUBTITLES,
    retry:         overrides.retry ?? RETRY_POLICY,
    concurrency:   overrides.concurrency ?? CONCURRENCY,
    musicVolumeDb: overrides.musicVolumeDb ?? MUSIC.volumeDb,
  };
}

// ── Cancellation ──────────────────────────────────────────────────────────────

interface JobSignal {
  signal: AbortSignal;
  dispose(): void;
}

/** One signal that fires on the caller's signal or the job timeout, whichever is first. */
function jobSignal(outer: AbortSignal | undefined, timeoutMs: number | undefined): JobSignal {
  const controller = new AbortController();
  const onAbort = () => controller.abort(outer?.reason);
  if (outer?.aborted) controller.abort(outer.reason);
  else outer?.addEventListener('abort', onAbort, { once: true });

  const timer = timeoutMs
    ? setTimeout(() => controller.abort(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs)
    : undefined;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      outer?.removeEventListener('abort', onAbort);
    },
  };
}

async function stage<T>(
  name: 'mix' | 'stitch',
  signal: AbortSignal,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (signal.aborted || err instanceof CompilationError) throw err;
    throw new RenderError(`${name} failed — ${describeError(err)}`, name, undefined, err);
  }
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function compileVideo(input: unknown, options: CompileOptions = {}): Promise<CompilationResult> {
  const job = validateJob(input);
  const deps = defaultDeps(options.deps);
  const outputDir = options.outputDir ?? env.OUTPUT_DIR;
  const { signal, dispose } = jobSignal(options.signal, options.timeoutMs ?? env.JOB_TIMEOUT_MS);

  try {
    throwIfCancelled(signal);
    return await withWorkspace(outputDir, async (ws) => {
      logger.info('Pipeline: starting job', { jobId: ws.id, niche: job.niche, scenes: job.scenes.length });
      try {
        const assets = await resolveAssets(job, ws, {
          images:      deps.images,
          narration:   deps.narration,
          toolkit:     deps.toolkit,
          retry:       deps.retry,
          concurrency: deps.concurrency.assets,
          imageSize:   { width: deps.render.width, height: deps.render.height },
          fps:         deps.render.fps,
        }, signal);
        throwIfCancelled(signal);

        const clips = await renderScenes(job.scenes, assets, ws, {
          toolkit:     deps.toolkit,
          render:      deps.render,
          subtitles:   deps.subtitles,
          concurrency: deps.concurrency.render,
        }, signal);
        throwIfCancelled(signal);

        const segments: NarrationSegment[] = assets.map((a) => ({
          sceneId:  a.sceneId,
          audioPath: a.audioPath,
          duration: a.effectiveDuration,
        }));
        const durationSeconds = totalDuration(segments);
        const musicTrack = resolveMusicTrack(deps.music, job.niche);

        const audioPath = await stage('mix', signal, () => mixAudio(deps.toolkit, {
          segments,
          ...(musicTrack ? { musicPath: musicTrack } : {}),
          musicVolumeDb: deps.musicVolumeDb,
          outputPath: ws.file('mixed_audio.m4a'),
        }, signal));
        throwIfCancelled(signal);

        const videoPath = await stage('stitch', signal, () =>
          stitchVideo(deps.toolkit, { clips, audioPath, durationSeconds }, ws, signal));

        logger.info('Pipeline: job complete', { jobId: ws.id, videoPath, durationSeconds });
        return {
          jobId: ws.id,
          videoPath,
          durationSeconds,
          sceneCount: job.scenes.length,
          scenes: job.scenes.map((scene, i) => ({
            id:                scene.id,
            effect:            scene.effect,
            audioDuration:     assets[i]?.audioDuration ?? 0,
            effectiveDuration: assets[i]?.effectiveDuration ?? 0,
          })),
          ...(musicTrack ? { musicTrack } : {}),
          ...(job.metadata ? { metadata: job.metadata } : {}),
        };
      } catch (err) {
        const failure = signal.aborted && !(err instanceof CancelledError) ? new CancelledError(signal.reason) : err;
        logger.error('Pipeline: job failed', {
          jobId: ws.id,
          error: describeError(failure),
          ...(failure instanceof CompilationError ? failure.toJSON() : {}),
        });
        throw failure;
      }
    });
  } finally {
    dispose();
  }
}

export { validateJob } from './scenes.js';
export type { CompilationJob, SceneSpec } from './scenes.js';
