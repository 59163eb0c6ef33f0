import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseSceneId, validateJob } from '../pipeline/scenes.js';
import { ValidationError } from '../errors.js';

const scene = (overrides: Record<string, unknown> = {}) => ({
  script: 'A quiet morning in the valley.',
  imagePrompt: 'misty valley at dawn, cinematic',
  effect: 'zoom_in',
  duration: 12,
  ...overrides,
});

function validationFailure(input: unknown): ValidationError {
  try {
    validateJob(input);
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('expected validateJob to throw');
}

describe('parseSceneId', () => {
  it('accepts positive integer keys and normalises leading zeros', () => {
    expect(parseSceneId('3')).toBe(3);
    expect(parseSceneId('01')).toBe(1);
  });

  it('rejects zero, negatives and non-numeric keys', () => {
    expect(parseSceneId('0')).toBeUndefined();
    expect(parseSceneId('-1')).toBeUndefined();
    expect(parseSceneId('1.5')).toBeUndefined();
    expect(parseSceneId('intro')).toBeUndefined();
  });
});

describe('validateJob', () => {
  let tmpDir: string;
  let localImage: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scenes-test-'));
    localImage = path.join(tmpDir, 'frame.png');
    fs.writeFileSync(localImage, 'png');
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns scenes in ascending id order', () => {
    const job = validateJob({
      niche: 'tech',
      scenes: { '10': scene(), '2': scene(), '1': scene() },
    });
    expect(job.niche).toBe('tech');
    expect(job.scenes.map((s) => s.id)).toEqual([1, 2, 10]);
  });

  it('trims text fields and coerces numeric strings', () => {
    const job = validateJob({ scenes: { '1': scene({ script: '  Hello there.  ', duration: '15' }) } });
    expect(job.scenes[0]).toMatchObject({ id: 1, script: 'Hello there.', duration: 15 });
  });

  it('defaults the niche to an empty string', () => {
    expect(validateJob({ scenes: { '1': scene() } }).niche).toBe('');
  });

  it('lifts a metadata entry out of the scene map', () => {
    const job = validateJob({
      niche: 'news',
      scenes: { '1': scene(), metadata: { title: 'Morning brief', description: 'Top stories' } },
    });
    expect(job.scenes).toHaveLength(1);
    expect(job.metadata).toEqual({ title: 'Morning brief', description: 'Top stories' });
  });

  it('prefers top-level metadata over the scene-map entry', () => {
    const job = validateJob({
      scenes: { '1': scene(), metadata: { title: 'inner', description: 'kept' } },
      metadata: { title: 'outer' },
    });
    expect(job.metadata).toEqual({ title: 'outer', description: 'kept' });
  });

  it('returns an immutable job', () => {
    const job = validateJob({ scenes: { '1': scene() } });
    expect(Object.isFrozen(job)).toBe(true);
    expect(Object.isFrozen(job.scenes)).toBe(true);
    expect(Object.isFrozen(job.scenes[0])).toBe(true);
  });

  it('names the scene and lists the allowed effects for an unknown effect', () => {
    const err = validationFailure({ scenes: { '1': scene(), '2': scene({ effect: 'spin' }) } });
    expect(err.message).toBe(
      'Scene 2: unknown effect "spin" (expected one of zoom_in, zoom_out, pan_left, pan_right, pan_up, pan_down)',
    );
    expect(err.sceneId).toBe(2);
    expect(err.stage).toBe('validation');
    expect(err.issues).toEqual([
      {
        sceneId: 2,
        path: 'scenes.2.effect',
        message: 'unknown effect "spin" (expected one of zoom_in, zoom_out, pan_left, pan_right, pan_up, pan_down)',
      },
    ]);
  });

  it('reports a missing effect', () => {
    const { effect: _omit, ...noEffect } = scene();
    expect(validationFailure({ scenes: { '1': noEffect } }).message).toBe('Scene 1: effect is required');
  });

  it('rejects duplicate ids that normalise to the same number', () => {
    const err = validationFailure({ scenes: { '1': scene(), '01': scene() } });
    expect(err.message).toBe('Scene 1: duplicate scene id (also given as "1")');
  });

  it('rejects non-integer scene keys', () => {
    const err = validationFailure({ scenes: { intro: scene() } });
    expect(err.message).toBe('scene id "intro" is not a positive integer');
    expect(err.sceneId).toBeUndefined();
  });

  it('rejects an empty scene map', () => {
    expect(validationFailure({ niche: 'tech', scenes: {} }).message).toBe('scenes must contain at least one scene');
  });

  it('rejects a job without scenes', () => {
    expect(validationFailure({ niche: 'tech' }).message).toBe('scenes: scenes is required');
  });

  it('requires a non-empty script', () => {
    expect(validationFailure({ scenes: { '1': scene({ script: '   ' }) } }).message)
      .toBe('Scene 1: script must not be empty');
    const { script: _omit, ...noScript } = scene();
    expect(validationFailure({ scenes: { '1': noScript } }).message).toBe('Scene 1: script is required');
  });

  it('requires a positive numeric duration', () => {
    expect(validationFailure({ scenes: { '1': scene({ duration: 0 }) } }).message)
      .toBe('Scene 1: duration must be > 0');
    expect(validationFailure({ scenes: { '1': scene({ duration: 'soon' }) } }).message)
      .toBe('Scene 1: duration must be a number');
  });

  it('converts numeric strings only, never booleans or arrays', () => {
    expect(validationFailure({ scenes: { '1': scene({ duration: true }) } }).message)
      .toBe('Scene 1: duration must be a number');
    expect(validationFailure({ scenes: { '1': scene({ duration: [1] }) } }).message)
      .toBe('Scene 1: duration must be a number');
    expect(validationFailure({ scenes: { '1': scene({ duration: '  ' }) } }).message)
      .toBe('Scene 1: duration must be a number');
    expect(validateJob({ scenes: { '1': scene({ duration: ' 7.5 ' }) } }).scenes[0]?.duration).toBe(7.5);
  });

  it('requires an image source', () => {
    const { imagePrompt: _omit, ...noImage } = scene();
    expect(validationFailure({ scenes: { '1': noImage } }).message)
      .toBe('Scene 1: an image source (imagePrompt or imagePath) is required');
  });

  it('accepts an existing local image path or an http(s) URL', () => {
    const job = validateJob({
      scenes: {
        '1': scene({ imagePrompt: undefined, imagePath: localImage }),
        '2': scene({ imagePrompt: undefined, imagePath: 'https://cdn.example.com/frame.png' }),
      },
    });
    expect(job.scenes.map((s) => s.imagePath)).toEqual([localImage, 'https://cdn.example.com/frame.png']);
  });

  it('rejects a missing local file', () => {
    const missing = path.join(tmpDir, 'missing.png');
    expect(validationFailure({ scenes: { '3': scene({ imagePath: missing }) } }).message)
      .toBe(`Scene 3: imagePath: file not found "${missing}"`);
  });

  it('rejects unsupported and malformed URLs', () => {
    expect(validationFailure({ scenes: { '1': scene({ audioPath: 'ftp://files.example.com/a.mp3' }) } }).message)
      .toBe('Scene 1: audioPath: unsupported URL scheme "ftp:"');
    expect(validationFailure({ scenes: { '1': scene({ imagePath: 'https://exa mple.com/a.png' }) } }).message)
      .toBe('Scene 1: imagePath: malformed URL "https://exa mple.com/a.png"');
  });

  it('counts additional issues in the summary message', () => {
    const err = validationFailure({
      scenes: { '1': scene({ effect: 'spin' }), '2': scene({ duration: -3 }) },
    });
    expect(err.message).toBe(
      'Scene 1: unknown effect "spin" (expected one of zoom_in, zoom_out, pan_left, pan_right, pan_up, pan_down) (+1 more)',
    );
    expect(err.issues.map((i) => i.sceneId)).toEqual([1, 2]);
  });
});
