/**
 * Audio mixer — narration bed for the whole video.
 *
 * Each narration is padded/trimmed to its scene's effective duration and the
 * pieces are concatenated in stitch order. An optional music track is looped,
 * attenuated and trimmed to the narration length, then mixed underneath.
 */
import { logger } from '../utils/logger.js';
import { formatSeconds, type MediaToolkit } from './ffmpeg.js';

export interface NarrationSegment {
  sceneId: number;
  audioPath: string;
  /** Exact length this segment must occupy */
  duration: number;
}

export interface MixPlan {
  segments: NarrationSegment[];
  musicPath?: string;
  musicVolumeDb: number;
  outputPath: string;
}

const NORMALISE = 'aformat=sample_fmts=fltp:sample_rates=44100:channel_layouts=stereo';

export function totalDuration(segments: NarrationSegment[]): number {
  return segments.reduce((sum, s) => sum + s.duration, 0);
}

/** Build the ffmpeg argument list for a mix plan. */
export function buildMixArgs(plan: MixPlan): string[] {
  const { segments, musicPath, musicVolumeDb, outputPath } = plan;
  if (segments.length === 0) throw new Error('buildMixArgs: no narration segments');

  const inputs = segments.flatMap((s) => ['-i', s.audioPath]);
  const filters = segments.map(
    (s, i) => `[${i}:a]${NORMALISE},apad,atrim=duration=${formatSeconds(s.duration)},asetpts=PTS-STARTPTS[n${i}]`,
  );
  const labels = segments.map((_, i) => `[n${i}]`).join('');
  filters.push(`${labels}concat=n=${segments.length}:v=0:a=1[narration]`);

  let outLabel = '[narration]';
  if (musicPath) {
    const musicIndex = segments.length;
    inputs.push('-stream_loop', '-1', '-i', musicPath);
    filters.push(
      `[${musicIndex}:a]${NORMALISE},volume=${musicVolumeDb}dB,` +
        `atrim=duration=${formatSeconds(totalDuration(segments))},asetpts=PTS-STARTPTS[bed]`,
      '[narration][bed]amix=inputs=2:duration=first:dropout_transition=0:normalize=0[mix]',
    );
    outLabel = '[mix]';
  }

  return [
    ...inputs,
    '-filter_complex', filters.join(';'),
    '-map', outLabel,
    '-c:a', 'aac',
    '-b:a', '192k',
    outputPath,
  ];
}

export async function mixAudio(toolkit: MediaToolkit, plan: MixPlan, signal?: AbortSignal): Promise<string> {
  logger.info('Audio: mixing narration', {
    segments: plan.segments.length,
    duration: totalDuration(plan.segments),
    music: plan.musicPath ?? null,
  });
  await toolkit.ffmpeg(buildMixArgs(plan), 'mixAudio', signal);
  return plan.outputPath;
}
