/**
 * Ken-Burns motion effects.
 *
 * The source image is scaled to cover the output frame and centre-cropped to it;
 * each effect is then a linear interpolation between a start and an end crop window
 * on that base frame, resampled to the output size every frame via `zoompan`.
 */
import type { Dimensions } from './ffmpeg.js';

export const EFFECTS = ['zoom_in', 'zoom_out', 'pan_left', 'pan_right', 'pan_up', 'pan_down'] as const;

export type Effect = typeof EFFECTS[number];

export function isEffect(value: unknown): value is Effect {
  return typeof value === 'string' && (EFFECTS as readonly string[]).includes(value);
}

/** Zoomed window size as a share of each frame dimension. */
export const ZOOM_WINDOW_SCALE = 0.8;
/** Fixed window size for pans as a share of each frame dimension. */
export const PAN_WINDOW_SCALE = 0.9;

export interface CropWindow {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface EffectKeyframes {
  start: CropWindow;
  end: CropWindow;
}

// ── Geometry ──────────────────────────────────────────────────────────────────

export interface CoverGeometry {
  /** Scaled source size, >= target on both axes */
  scaledWidth: number;
  scaledHeight: number;
  /** Centre-crop offset into the scaled source */
  cropX: number;
  cropY: number;
}

/**
 * Scale factor that makes the source cover the target on both axes. Sources smaller
 * than the target are upscaled, so every crop window stays inside real pixels.
 */
export function coverGeometry(source: Dimensions, target: Dimensions): CoverGeometry {
  const scale = Math.max(target.width / source.width, target.height / source.height);
  const scaledWidth = Math.max(target.width, Math.ceil(source.width * scale));
  const scaledHeight = Math.max(target.height, Math.ceil(source.height * scale));
  return {
    scaledWidth,
    scaledHeight,
    cropX: Math.floor((scaledWidth - target.width) / 2),
    cropY: Math.floor((scaledHeight - target.height) / 2),
  };
}

function centred(frame: Dimensions, width: number, height: number): CropWindow {
  return { x: (frame.width - width) / 2, y: (frame.height - height) / 2, width, height };
}

export function effectKeyframes(effect: Effect, frame: Dimensions): EffectKeyframes {
  const full: CropWindow = { x: 0, y: 0, width: frame.width, height: frame.height };
  const zoomed = centred(frame, Math.round(frame.width * ZOOM_WINDOW_SCALE), Math.round(frame.height * ZOOM_WINDOW_SCALE));
  const pan = centred(frame, Math.round(frame.width * PAN_WINDOW_SCALE), Math.round(frame.height * PAN_WINDOW_SCALE));
  const maxX = frame.width - pan.width;
  const maxY = frame.height - pan.height;

  switch (effect) {
    case 'zoom_in':   return { start: full, end: zoomed };
    case 'zoom_out':  return { start: zoomed, end: full };
    case 'pan_left':  return { start: { ...pan, x: maxX }, end: { ...pan, x: 0 } };
    case 'pan_right': return { start: { ...pan, x: 0 }, end: { ...pan, x: maxX } };
    case 'pan_up':    return { start: { ...pan, y: maxY }, end: { ...pan, y: 0 } };
    case 'pan_down':  return { start: { ...pan, y: 0 }, end: { ...pan, y: maxY } };
    default: {
      const unreachable: never = effect;
      throw new Error(`Unhandled effect: ${String(unreachable)}`);
    }
  }
}

// ── Interpolation ─────────────────────────────────────────────────────────────

export function frameCount(durationSeconds: number, fps: number): number {
  return Math.max(1, Math.round(durationSeconds * fps));
}

/** Progress of a frame in [0, 1]; the last frame lands exactly on the end window. */
export function frameProgress(frame: number, totalFrames: number): number {
  return totalFrames <= 1 ? 0 : frame / (totalFrames - 1);
}

const lerp = (a: number, b: number, p: number) => a + (b - a) * p;

export function cropWindowAt(keyframes: EffectKeyframes, progress: number): CropWindow {
  const { start, end } = keyframes;
  return {
    x:      lerp(start.x, end.x, progress),
    y:      lerp(start.y, end.y, progress),
    width:  lerp(start.width, end.width, progress),
    height: lerp(start.height, end.height, progress),
  };
}

// ── ffmpeg filter ─────────────────────────────────────────────────────────────

/** `a + (b-a)*on/denom` in ffmpeg expression syntax, folded to a constant when a == b. */
function lerpExpr(a: number, b: number, denom: number): string {
  if (a === b || denom === 0) return String(a);
  return `${a}+(${b - a})*on/${denom}`;
}

export interface EffectFilterOptions {
  effect: Effect;
  source: Dimensions;
  target: Dimensions;
  fps: number;
  durationSeconds: number;
}

/**
 * Filter chain turning one still image into `frameCount()` frames of motion:
 * cover-scale, centre-crop, then zoompan with per-frame crop-window expressions.
 */
export function buildEffectFilter(opts: EffectFilterOptions): string {
  const { effect, source, target, fps, durationSeconds } = opts;
  const cover = coverGeometry(source, target);
  const { start, end } = effectKeyframes(effect, target);
  const frames = frameCount(durationSeconds, fps);
  const denom = frames - 1;

  // zoompan crops iw/zoom x ih/zoom; windows keep the frame's aspect so one zoom fits both axes
  const zoom = start.width === end.width
    ? String(target.width / start.width)
    : `${target.width}/(${lerpExpr(start.width, end.width, denom)})`;

  return [
    `scale=${cover.scaledWidth}:${cover.scaledHeight}:flags=lanczos`,
    `crop=${target.width}:${target.height}:${cover.cropX}:${cover.cropY}`,
    'setsar=1',
    `zoompan=z='${zoom}':x='${lerpExpr(start.x, end.x, denom)}':y='${lerpExpr(start.y, end.y, denom)}'` +
      `:d=${frames}:s=${target.width}x${target.height}:fps=${fps}`,
  ].join(',');
}
