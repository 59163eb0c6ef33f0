import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Providers
  FAL_KEY:                      z.string().min(1).optional(),
  OPENAI_API_KEY:               z.string().min(1).optional(),
  OPENAI_TTS_MODEL:             z.enum(['tts-1', 'tts-1-hd']).default('tts-1'),
  OPENAI_TTS_VOICE:             z.enum(['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer']).default('nova'),
  DEFAULT_IMAGE_MODEL:          z.string().min(1).default('fal-ai/fast-sdxl'),

  // Local storage
  OUTPUT_DIR:                   z.string().min(1).default('./output'),
  MUSIC_LIBRARY_PATH:           z.string().min(1).default('./assets/music'),

  // Render target
  VIDEO_WIDTH:                  z.coerce.number().int().positive().default(1080),
  VIDEO_HEIGHT:                 z.coerce.number().int().positive().default(1920),
  VIDEO_FPS:                    z.coerce.number().int().positive().default(24),

  // Pipeline throughput
  ASSET_CONCURRENCY:            z.coerce.number().int().positive().default(4),
  RENDER_CONCURRENCY:           z.coerce.number().int().positive().default(2),
  PROVIDER_MAX_ATTEMPTS:        z.coerce.number().int().positive().default(3),
  PROVIDER_RETRY_BASE_MS:       z.coerce.number().nonnegative().default(1_000),
  JOB_TIMEOUT_MS:               z.coerce.number().int().positive().optional(),

  // Audio
  MUSIC_VOLUME_DB:              z.coerce.number().max(0).default(-26),

  // Captions
  SUBTITLE_MAX_CHARS_PER_LINE:  z.coerce.number().int().positive().default(24),
  SUBTITLE_LINES_PER_CHUNK:     z.coerce.number().int().positive().default(2),
  SUBTITLE_FONT:                z.string().min(1).default('Montserrat'),
  SUBTITLE_FONTS_DIR:           z.string().min(1).optional(),

  // Logging
  LOG_LEVEL:                    z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                   z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${missing}`);
}

export const env = parsed.data;

// ── Render ────────────────────────────────────────────────────────────────────

export interface RenderSettings {
  width: number;
  height: number;
  fps: number;
}

export const RENDER: RenderSettings = {
  width:  env.VIDEO_WIDTH,
  height: env.VIDEO_HEIGHT,
  fps:    env.VIDEO_FPS,
};

// ── Captions ──────────────────────────────────────────────────────────────────

export interface SubtitleSettings {
  maxCharsPerLine: number;
  linesPerChunk: number;
  font: string;
  fontsDir?: string;
  /** Font size as a share of frame height */
  fontScale: number;
  /** Top edge of the caption block as a share of frame height */
  anchorY: number;
}

export const SUBTITLES: SubtitleSettings = {
  maxCharsPerLine: env.SUBTITLE_MAX_CHARS_PER_LINE,
  linesPerChunk:   env.SUBTITLE_LINES_PER_CHUNK,
  font:            env.SUBTITLE_FONT,
  fontsDir:        env.SUBTITLE_FONTS_DIR,
  fontScale:       0.04,
  anchorY:         0.625,
};

// ── Throughput & Retry ────────────────────────────────────────────────────────

export const CONCURRENCY = {
  assets: env.ASSET_CONCURRENCY,
  render: env.RENDER_CONCURRENCY,
} as const;

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export const RETRY_POLICY: RetryPolicy = {
  maxAttempts: env.PROVIDER_MAX_ATTEMPTS,
  baseDelayMs: env.PROVIDER_RETRY_BASE_MS,
};

// ── Music ─────────────────────────────────────────────────────────────────────

export const MUSIC = {
  libraryPath: env.MUSIC_LIBRARY_PATH,
  volumeDb:    env.MUSIC_VOLUME_DB,
} as const;
