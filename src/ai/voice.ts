/**
 * Narration synthesis — OpenAI text-to-speech.
 * The SDK's own retries are disabled; the asset resolver owns retry policy.
 */
import OpenAI from 'openai';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';
import { NonRetryableError, ProviderError, isTransientStatus } from '../utils/retry.js';

type TtsModel = typeof env.OPENAI_TTS_MODEL;
type TtsVoice = typeof env.OPENAI_TTS_VOICE;

export interface NarrationResult {
  bytes: Buffer;
  /** File extension including the dot, e.g. `.mp3` */
  extension: string;
}

export interface NarrationProvider {
  synthesize(text: string, signal?: AbortSignal): Promise<NarrationResult>;
}

/** Map SDK errors onto the retry taxonomy. */
export function classifyOpenAiError(err: unknown): unknown {
  if (err instanceof OpenAI.APIConnectionError) {
    return new ProviderError(`OpenAI TTS unreachable: ${err.message}`, true, undefined, err);
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    const transient = status === undefined || isTransientStatus(status);
    return new ProviderError(`OpenAI TTS returned ${status ?? 'an error'}: ${err.message}`, transient, status, err);
  }
  return err;
}

export class OpenAiNarrationProvider implements NarrationProvider {
  private client: OpenAI | undefined;

  constructor(
    private readonly apiKey: string | undefined = env.OPENAI_API_KEY,
    private readonly model: TtsModel = env.OPENAI_TTS_MODEL,
    private readonly voice: TtsVoice = env.OPENAI_TTS_VOICE,
  ) {}

  async synthesize(text: string, signal?: AbortSignal): Promise<NarrationResult> {
    if (!this.apiKey) throw new NonRetryableError('OPENAI_API_KEY is not set');
    this.client ??= new OpenAI({ apiKey: this.apiKey, maxRetries: 0 });

    logger.info('Voice: synthesizing narration', { model: this.model, voice: this.voice, chars: text.length });
    try {
      const res = await this.client.audio.speech.create(
        { model: this.model, voice: this.voice, input: text, response_format: 'mp3' },
        { signal },
      );
      return { bytes: Buffer.from(await res.arrayBuffer()), extension: '.mp3' };
    } catch (err) {
      throw classifyOpenAiError(err);
    }
  }
}
