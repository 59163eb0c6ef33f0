/**
 * Image generation — fal.ai synchronous REST endpoint.
 * This module is the sole entry-point for prompt → image; the asset resolver never
 * calls fal.ai directly.
 */
import { z } from 'zod';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';
import { NonRetryableError, ProviderError, isTransientStatus } from '../utils/retry.js';
import type { Dimensions } from '../media/ffmpeg.js';

// ── Public interfaces ─────────────────────────────────────────────────────────

export interface ImageRequest {
  prompt: string;
  negativePrompt?: string;
  /** Provider model/endpoint id, e.g. `fal-ai/fast-sdxl` */
  modelId?: string;
  size: Dimensions;
}

export interface ImageResult {
  bytes: Buffer;
  contentType?: string;
}

export interface ImageProvider {
  generate(request: ImageRequest, signal?: AbortSignal): Promise<ImageResult>;
}

// ── HTTP helpers ──────────────────────────────────────────────────────────────

/**
 * GET a URL into memory. Transient HTTP statuses become retryable ProviderErrors;
 * network failures surface as fetch's TypeError, which the retry layer also retries.
 */
export async function downloadBytes(url: string, signal?: AbortSignal): Promise<ImageResult> {
  const res = await fetch(url, { signal });
  if (!res.ok) {
    throw new ProviderError(`GET ${url} returned ${res.status}`, isTransientStatus(res.status), res.status);
  }
  const contentType = res.headers.get('content-type') ?? undefined;
  return { bytes: Buffer.from(await res.arrayBuffer()), ...(contentType ? { contentType } : {}) };
}

// ── fal.ai ────────────────────────────────────────────────────────────────────

const FAL_BASE_URL = 'https://fal.run';

const FalImageResponseSchema = z.object({
  images: z.array(z.object({
    url:          z.string().url(),
    content_type: z.string().optional(),
  })).default([]),
});

export class FalImageProvider implements ImageProvider {
  constructor(
    private readonly apiKey: string | undefined = env.FAL_KEY,
    private readonly defaultModel: string = env.DEFAULT_IMAGE_MODEL,
  ) {}

  async generate(request: ImageRequest, signal?: AbortSignal): Promise<ImageResult> {
    if (!this.apiKey) throw new NonRetryableError('FAL_KEY is not set');

    const model = request.modelId ?? this.defaultModel;
    logger.info('fal.generateImage', { model, chars: request.prompt.length });

    const res = await fetch(`${FAL_BASE_URL}/${model}`, {
      method: 'POST',
      headers: {
        'Authorization': `Key ${this.apiKey}`,
        'Content-Type':  'application/json',
      },
      body: JSON.stringify({
        prompt:          request.prompt,
        negative_prompt: request.negativePrompt,
        image_size:      { width: request.size.width, height: request.size.height },
        num_images:      1,
      }),
      signal,
    });

    if (!res.ok) {
      const detail = await res.text().catch(() => '');
      throw new ProviderError(
        `fal.ai ${model} returned ${res.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`,
        isTransientStatus(res.status),
        res.status,
      );
    }

    const parsed = FalImageResponseSchema.safeParse(await res.json());
    const image = parsed.success ? parsed.data.images[0] : undefined;
    if (!image) throw new NonRetryableError(`fal.ai ${model} returned no image`);

    const downloaded = await downloadBytes(image.url, signal);
    const contentType = downloaded.contentType ?? image.content_type;
    return { bytes: downloaded.bytes, ...(contentType ? { contentType } : {}) };
  }
}
