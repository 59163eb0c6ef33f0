import { describe, it, expect } from 'vitest';
import { escapeFilterPath, formatSeconds, parseDimensions, parseDuration } from '../media/ffmpeg.js';

describe('parseDuration', () => {
  it('reads the first line of ffprobe output', () => {
    expect(parseDuration('12.480000\n')).toBe(12.48);
  });

  it('rejects empty or non-positive values', () => {
    expect(() => parseDuration('')).toThrow('unreadable duration ""');
    expect(() => parseDuration('N/A')).toThrow('unreadable duration "N/A"');
    expect(() => parseDuration('0.000000')).toThrow('unreadable duration');
  });
});

describe('parseDimensions', () => {
  it('reads width,height csv', () => {
    expect(parseDimensions('1024,1792')).toEqual({ width: 1024, height: 1792 });
  });

  it('rejects malformed output', () => {
    expect(() => parseDimensions('1024')).toThrow('unreadable dimensions "1024"');
  });
});

describe('formatSeconds', () => {
  it('keeps at most millisecond precision without trailing zeros', () => {
    expect(formatSeconds(15)).toBe('15');
    expect(formatSeconds(12.3456789)).toBe('12.346');
    expect(formatSeconds(2.5)).toBe('2.5');
  });
});

describe('escapeFilterPath', () => {
  it('escapes filtergraph separators in option values', () => {
    expect(escapeFilterPath("C:\\jobs\\it's,[1].ass")).toBe("C\\:/jobs/it\\'s\\,\\[1\\].ass");
  });

  it('leaves plain POSIX paths unchanged', () => {
    expect(escapeFilterPath('/tmp/job-abc/tmp/captions_1.ass')).toBe('/tmp/job-abc/tmp/captions_1.ass');
  });
});
