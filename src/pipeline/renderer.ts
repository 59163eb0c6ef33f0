/**
 * Scene renderer — one still image + effect + captions → one silent clip.
 *
 * Motion and captions are applied in a single ffmpeg pass so each scene touches
 * only its own files; scenes render concurrently.
 */
import * as fs from 'fs/promises';
import { logger } from '../utils/logger.js';
import { mapConcurrent } from '../utils/pool.js';
import { buildEffectFilter, frameCount, type Effect } from '../media/effects.js';
import { buildCaptionDocument, chunkScript } from '../media/subtitles.js';
import { escapeFilterPath, type Dimensions, type MediaToolkit } from '../media/ffmpeg.js';
import { CompilationError, RenderError, describeError } from '../errors.js';
import type { RenderSettings, SubtitleSettings } from '../config.js';
import type { SceneSpec } from './scenes.js';
import type { SceneAsset } from './assets.js';
import type { Workspace } from './workspace.js';

export interface RenderedClip {
  sceneId: number;
  clipPath: string;
  duration: number;
}

export interface RenderDeps {
  toolkit: MediaToolkit;
  render: RenderSettings;
  subtitles: SubtitleSettings;
  concurrency: number;
}

export interface SceneRenderPlan {
  imagePath: string;
  imageSize: Dimensions;
  effect: Effect;
  durationSeconds: number;
  captionsPath: string;
  fontsDir?: string;
  outputPath: string;
  render: RenderSettings;
}

export function buildSceneRenderArgs(plan: SceneRenderPlan): string[] {
  const { render } = plan;
  const target = { width: render.width, height: render.height };
  const motion = buildEffectFilter({
    effect: plan.effect,
    source: plan.imageSize,
    target,
    fps: render.fps,
    durationSeconds: plan.durationSeconds,
  });
  const captions = `ass=filename=${escapeFilterPath(plan.captionsPath)}` +
    (plan.fontsDir ? `:fontsdir=${escapeFilterPath(plan.fontsDir)}` : '');

  return [
    '-i', plan.imagePath,
    '-vf', `${motion},${captions},format=yuv420p`,
    '-frames:v', String(frameCount(plan.durationSeconds, render.fps)),
    '-r', String(render.fps),
    '-an',
    '-c:v', 'libx264',
    '-preset', 'fast',
    '-crf', '23',
    plan.outputPath,
  ];
}

export async function renderScene(
  scene: SceneSpec,
  asset: SceneAsset,
  ws: Workspace,
  deps: RenderDeps,
  signal?: AbortSignal,
): Promise<RenderedClip> {
  const duration = asset.effectiveDuration;
  logger.info('Render: scene', { jobId: ws.id, sceneId: scene.id, effect: scene.effect, duration });

  try {
    const imageSize = await deps.toolkit.probeDimensions(asset.imagePath, signal);
    const frame = { width: deps.render.width, height: deps.render.height };

    const captionsPath = ws.file(`captions_${scene.id}.ass`);
    const chunks = chunkScript(scene.script, duration, deps.subtitles);
    await fs.writeFile(captionsPath, buildCaptionDocument(chunks, frame, deps.subtitles), 'utf-8');

    const clipPath = ws.file(`clip_${scene.id}.mp4`);
    await deps.toolkit.ffmpeg(
      buildSceneRenderArgs({
        imagePath: asset.imagePath,
        imageSize,
        effect: scene.effect,
        durationSeconds: duration,
        captionsPath,
        ...(deps.subtitles.fontsDir ? { fontsDir: deps.subtitles.fontsDir } : {}),
        outputPath: clipPath,
        render: deps.render,
      }),
      `renderScene:${scene.id}`,
      signal,
    );
    return { sceneId: scene.id, clipPath, duration };
  } catch (err) {
    if (signal?.aborted || err instanceof CompilationError) throw err;
    throw new RenderError(`Scene ${scene.id}: render failed — ${describeError(err)}`, 'render', scene.id, err);
  }
}

/** Render every scene; `assets` must be index-aligned with `scenes`. */
export function renderScenes(
  scenes: readonly SceneSpec[],
  assets: readonly SceneAsset[],
  ws: Workspace,
  deps: RenderDeps,
  signal?: AbortSignal,
): Promise<RenderedClip[]> {
  return mapConcurrent(scenes, deps.concurrency, async (scene, i, sceneSignal) => {
    const asset = assets[i];
    if (!asset || asset.sceneId !== scene.id) {
      throw new RenderError(`Scene ${scene.id}: no resolved assets`, 'render', scene.id);
    }
    return renderScene(scene, asset, ws, deps, sceneSignal);
  }, signal);
}
