/**
 * FFmpeg / FFprobe process boundary.
 *
 * Everything that touches the codec toolchain goes through a MediaToolkit so the
 * pipeline can run against an in-process stand-in. The default toolkit spawns the
 * binaries found on PATH; all calls reject on non-zero exit and honour AbortSignal.
 */
import { spawn } from 'child_process';
import { logger } from '../utils/logger.js';

export interface Dimensions {
  width: number;
  height: number;
}

export interface MediaToolkit {
  /** Run ffmpeg with the given arguments (`-y` is prepended). */
  ffmpeg(args: string[], label: string, signal?: AbortSignal): Promise<void>;
  /** Container duration in seconds. */
  probeDuration(filePath: string, signal?: AbortSignal): Promise<number>;
  /** Pixel size of the first video stream (images included). */
  probeDimensions(filePath: string, signal?: AbortSignal): Promise<Dimensions>;
}

// ── Helpers ────────────────────────────────────────────────────────────────────

interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

function runProcess(command: string, args: string[], signal?: AbortSignal): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], signal });
    let stdout = '';
    let stderr = '';
    proc.stdout.on('data', (chunk: Buffer) => { stdout += chunk.toString(); });
    proc.stderr.on('data', (chunk: Buffer) => { stderr += chunk.toString(); });
    proc.on('error', reject);
    proc.on('close', (code) => resolve({ code, stdout: stdout.trim(), stderr: stderr.trim() }));
  });
}

/** Last few stderr lines; ffmpeg prints its banner and progress before the actual error. */
function tail(text: string, lines = 8): string {
  return text.split('\n').slice(-lines).join('\n');
}

async function runFfmpeg(args: string[], label: string, signal?: AbortSignal): Promise<void> {
  logger.debug(`FFmpeg [${label}]`, { args: args.join(' ') });
  const { code, stderr } = await runProcess('ffmpeg', ['-y', '-hide_banner', ...args], signal);
  if (code !== 0) {
    throw new Error(`FFmpeg ${label} failed (exit ${code ?? 'signal'}): ${tail(stderr)}`);
  }
}

async function runFfprobe(args: string[], label: string, signal?: AbortSignal): Promise<string> {
  logger.debug(`FFprobe [${label}]`, { args: args.join(' ') });
  const { code, stdout, stderr } = await runProcess('ffprobe', ['-v', 'error', ...args], signal);
  if (code !== 0) {
    throw new Error(`FFprobe ${label} failed (exit ${code ?? 'signal'}): ${tail(stderr)}`);
  }
  return stdout;
}

// ── Probe parsing ─────────────────────────────────────────────────────────────

export function parseDuration(raw: string): number {
  const duration = parseFloat(raw.split('\n')[0] ?? '');
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new Error(`unreadable duration "${raw}"`);
  }
  return duration;
}

/** Parses ffprobe `width,height` csv output. */
export function parseDimensions(raw: string): Dimensions {
  const [widthStr, heightStr] = (raw.split('\n')[0] ?? '').split(',');
  const width = parseInt(widthStr ?? '', 10);
  const height = parseInt(heightStr ?? '', 10);
  if (!(width > 0) || !(height > 0)) {
    throw new Error(`unreadable dimensions "${raw}"`);
  }
  return { width, height };
}

// ── Default toolkit ───────────────────────────────────────────────────────────

export const ffmpegToolkit: MediaToolkit = {
  ffmpeg: runFfmpeg,

  async probeDuration(filePath, signal) {
    const out = await runFfprobe(
      ['-show_entries', 'format=duration', '-of', 'csv=p=0', filePath],
      'probeDuration',
      signal,
    );
    return parseDuration(out);
  },

  async probeDimensions(filePath, signal) {
    const out = await runFfprobe(
      ['-select_streams', 'v:0', '-show_entries', 'stream=width,height', '-of', 'csv=s=,:p=0', filePath],
      'probeDimensions',
      signal,
    );
    return parseDimensions(out);
  },
};

/** Seconds as an ffmpeg-friendly decimal: at most millisecond precision, no trailing zeros. */
export function formatSeconds(seconds: number): string {
  return String(Number(seconds.toFixed(3)));
}

/**
 * Escape a file path for use as a filter option value inside a filtergraph
 * (e.g. `ass=filename=...`).
 */
export function escapeFilterPath(filePath: string): string {
  return filePath
    .replace(/\\/g, '/')
    .replace(/:/g, '\\:')
    .replace(/'/g, "\\'")
    .replace(/,/g, '\\,')
    .replace(/\[/g, '\\[')
    .replace(/]/g, '\\]');
}
