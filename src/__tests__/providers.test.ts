import { describe, it, expect, vi, afterEach } from 'vitest';
import OpenAI from 'openai';
import { FalImageProvider, downloadBytes } from '../ai/images.js';
import { OpenAiNarrationProvider, classifyOpenAiError } from '../ai/voice.js';
import { NonRetryableError, ProviderError } from '../utils/retry.js';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('FalImageProvider', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('posts the prompt to the model endpoint and downloads the first image', async () => {
    const mockFetch = vi.spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(jsonResponse({ images: [{ url: 'https://cdn.fal.test/out.jpg', content_type: 'image/jpeg' }] }))
      .mockResolvedValueOnce(new Response('JPEGDATA', { headers: { 'Content-Type': 'image/jpeg' } }));

    const provider = new FalImageProvider('test-key', 'fal-ai/fast-sdxl');
    const result = await provider.generate({
      prompt: 'misty valley',
      negativePrompt: 'text, watermark',
      size: { width: 1080, height: 1920 },
    });

    expect(result.bytes.toString()).toBe('JPEGDATA');
    expect(result.contentType).toBe('image/jpeg');

    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe('https://fal.run/fal-ai/fast-sdxl');
    expect(init).toMatchObject({
      method: 'POST',
      headers: { 'Authorization': 'Key test-key', 'Content-Type': 'application/json' },
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      prompt: 'misty valley',
      negative_prompt: 'text, watermark',
      image_size: { width: 1080, height: 1920 },
      num_images: 1,
    });
    expect(mockFetch.mock.calls[1]?.[0]).toBe('https://cdn.fal.test/out.jpg');
  });

  it('uses a per-request model id when given', async () => {
    const mockFetch = vi.spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(jsonResponse({ images: [{ url: 'https://cdn.fal.test/out.png' }] }))
      .mockResolvedValueOnce(new Response('PNG'));

    await new FalImageProvider('test-key').generate({
      prompt: 'city at night',
      modelId: 'fal-ai/flux/schnell',
      size: { width: 1080, height: 1920 },
    });
    expect(mockFetch.mock.calls[0]?.[0]).toBe('https://fal.run/fal-ai/flux/schnell');
  });

  it('marks rate limits as transient and client errors as permanent', async () => {
    const mockFetch = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(new Response('slow down', { status: 429 }));
    const provider = new FalImageProvider('test-key', 'fal-ai/fast-sdxl');
    const request = { prompt: 'x', size: { width: 1080, height: 1920 } };

    await expect(provider.generate(request)).rejects.toMatchObject({
      name: 'ProviderError',
      transient: true,
      status: 429,
      message: 'fal.ai fal-ai/fast-sdxl returned 429: slow down',
    });

    mockFetch.mockResolvedValueOnce(new Response('', { status: 422 }));
    await expect(provider.generate(request)).rejects.toMatchObject({ transient: false, status: 422 });
  });

  it('fails permanently when the response has no image', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ images: [] }));
    await expect(
      new FalImageProvider('test-key', 'fal-ai/fast-sdxl').generate({ prompt: 'x', size: { width: 1, height: 1 } }),
    ).rejects.toBeInstanceOf(NonRetryableError);
  });

  it('refuses to run without an API key', async () => {
    const mockFetch = vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
    await expect(
      new FalImageProvider('', 'fal-ai/fast-sdxl').generate({ prompt: 'x', size: { width: 1, height: 1 } }),
    ).rejects.toThrow('FAL_KEY is not set');
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe('downloadBytes', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('maps server errors to transient provider errors', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('', { status: 502 }));
    const err = await downloadBytes('https://cdn.example.com/a.png').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ transient: true, status: 502, message: 'GET https://cdn.example.com/a.png returned 502' });
  });

  it('omits the content type when the response has none', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response(new Uint8Array([1, 2, 3])));
    const result = await downloadBytes('https://cdn.example.com/a.bin');
    expect([...result.bytes]).toEqual([1, 2, 3]);
    expect(result.contentType).toBeUndefined();
  });
});

describe('OpenAI narration', () => {
  it('classifies connection failures as transient', () => {
    const err = classifyOpenAiError(new OpenAI.APIConnectionError({ message: 'socket hang up' }));
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ transient: true });
  });

  it('passes unrelated errors through', () => {
    const original = new Error('boom');
    expect(classifyOpenAiError(original)).toBe(original);
  });

  it('refuses to run without an API key', async () => {
    await expect(new OpenAiNarrationProvider('').synthesize('hello')).rejects.toBeInstanceOf(NonRetryableError);
  });
});
