/**
 * Stitcher — concatenate rendered clips in ascending scene id, attach the mixed
 * audio and move the encode into place only once it has completed cleanly.
 */
import * as fs from 'fs/promises';
import { logger } from '../utils/logger.js';
import { formatSeconds, type MediaToolkit } from '../media/ffmpeg.js';
import type { RenderedClip } from './renderer.js';
import type { Workspace } from './workspace.js';

/** Concat-demuxer list; clips sorted by scene id regardless of input order. */
export function buildConcatList(clips: readonly RenderedClip[]): string {
  return [...clips]
    .sort((a, b) => a.sceneId - b.sceneId)
    .map((c) => `file '${c.clipPath.replace(/'/g, "'\\''")}'`)
    .join('\n') + '\n';
}

export function buildConcatArgs(listPath: string, outputPath: string): string[] {
  return ['-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', outputPath];
}

export function buildMuxArgs(videoPath: string, audioPath: string, durationSeconds: number, outputPath: string): string[] {
  return [
    '-i', videoPath,
    '-i', audioPath,
    '-map', '0:v:0',
    '-map', '1:a:0',
    '-c:v', 'copy',
    '-c:a', 'aac',
    '-b:a', '192k',
    '-t', formatSeconds(durationSeconds),
    '-movflags', '+faststart',
    outputPath,
  ];
}

export interface StitchPlan {
  clips: readonly RenderedClip[];
  audioPath: string;
  durationSeconds: number;
}

export async function concatenateClips(
  toolkit: MediaToolkit,
  clips: readonly RenderedClip[],
  ws: Workspace,
  signal?: AbortSignal,
): Promise<string> {
  if (clips.length === 0) throw new Error('concatenateClips: no clips provided');
  logger.info('FFmpeg: concatenating clips', { jobId: ws.id, count: clips.length });

  const listPath = ws.file('concat.txt');
  await fs.writeFile(listPath, buildConcatList(clips), 'utf-8');
  const outputPath = ws.file('video_concat.mp4');
  await toolkit.ffmpeg(buildConcatArgs(listPath, outputPath), 'concatenateClips', signal);
  return outputPath;
}

/**
 * Write the final artifact. The encode targets a partial file in `tmp/`; only a
 * clean exit renames it to the workspace's final path.
 */
export async function stitchVideo(
  toolkit: MediaToolkit,
  plan: StitchPlan,
  ws: Workspace,
  signal?: AbortSignal,
): Promise<string> {
  const videoPath = await concatenateClips(toolkit, plan.clips, ws, signal);

  const partialPath = ws.file('final.partial.mp4');
  logger.info('FFmpeg: attaching audio', { jobId: ws.id, duration: plan.durationSeconds });
  await toolkit.ffmpeg(buildMuxArgs(videoPath, plan.audioPath, plan.durationSeconds, partialPath), 'muxAudio', signal);

  await fs.rename(partialPath, ws.finalPath);
  logger.info('Stitcher: final video written', { jobId: ws.id, path: ws.finalPath });
  return ws.finalPath;
}
