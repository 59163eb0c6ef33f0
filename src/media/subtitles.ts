/**
 * Caption layout and timing.
 *
 * Script text is wrapped on word boundaries, grouped into multi-line chunks and
 * timed by character share. Inside a chunk the word being spoken is highlighted.
 * Output is an ASS document burned in by ffmpeg's `ass` filter.
 */
import type { Dimensions } from './ffmpeg.js';
import type { SubtitleSettings } from '../config.js';

export interface CaptionChunk {
  lines: string[][];
  /** Seconds from clip start */
  start: number;
  end: number;
}

export interface WordTiming {
  /** Index of the word inside its chunk */
  index: number;
  start: number;
  end: number;
}

// ── Layout ────────────────────────────────────────────────────────────────────

/**
 * Greedy word wrap. A line never exceeds `maxChars` unless it holds a single word
 * longer than that; words are never split.
 */
export function wrapWords(text: string, maxChars: number): string[][] {
  const lines: string[][] = [];
  let current: string[] = [];
  let width = 0;

  for (const word of text.split(/\s+/).filter(Boolean)) {
    const next = current.length === 0 ? word.length : width + 1 + word.length;
    if (next <= maxChars || current.length === 0) {
      current.push(word);
      width = next;
    } else {
      lines.push(current);
      current = [word];
      width = word.length;
    }
  }
  if (current.length > 0) lines.push(current);
  return lines;
}

export function chunkLines(lines: string[][], linesPerChunk: number): string[][][] {
  const chunks: string[][][] = [];
  for (let i = 0; i < lines.length; i += linesPerChunk) {
    chunks.push(lines.slice(i, i + linesPerChunk));
  }
  return chunks;
}

const chunkText = (lines: string[][]) => lines.map((l) => l.join(' ')).join(' ');

/**
 * Split `durationSeconds` across weights in whole milliseconds. Every share but the
 * last is floored; the last absorbs the remainder so the parts sum to the total.
 */
export function splitProportionally(weights: number[], durationSeconds: number): number[] {
  const totalMs = Math.round(durationSeconds * 1000);
  const totalWeight = weights.reduce((s, w) => s + w, 0);
  const parts = weights.map((w) => (totalWeight > 0 ? Math.floor((totalMs * w) / totalWeight) : 0));
  const assigned = parts.slice(0, -1).reduce((s, p) => s + p, 0);
  if (parts.length > 0) parts[parts.length - 1] = totalMs - assigned;
  return parts;
}

/**
 * Wrap, chunk and time a script. Chunk boundaries are millisecond-aligned and the
 * final chunk ends exactly at `durationSeconds`.
 */
export function chunkScript(
  script: string,
  durationSeconds: number,
  settings: Pick<SubtitleSettings, 'maxCharsPerLine' | 'linesPerChunk'>,
): CaptionChunk[] {
  const grouped = chunkLines(wrapWords(script, settings.maxCharsPerLine), settings.linesPerChunk);
  const durations = splitProportionally(grouped.map((lines) => chunkText(lines).length), durationSeconds);

  let cursorMs = 0;
  return grouped.map((lines, i) => {
    const startMs = cursorMs;
    cursorMs += durations[i] ?? 0;
    const last = i === grouped.length - 1;
    return { lines, start: startMs / 1000, end: last ? durationSeconds : cursorMs / 1000 };
  });
}

/** Per-word highlight windows inside one chunk, proportional to word length. */
export function timeWords(chunk: CaptionChunk): WordTiming[] {
  const words = chunk.lines.flat();
  const durations = splitProportionally(words.map((w) => w.length), chunk.end - chunk.start);
  const startMs = Math.round(chunk.start * 1000);

  let cursorMs = startMs;
  return words.map((_, index) => {
    const from = cursorMs;
    cursorMs += durations[index] ?? 0;
    const last = index === words.length - 1;
    return { index, start: from / 1000, end: last ? chunk.end : cursorMs / 1000 };
  });
}

// ── ASS document ──────────────────────────────────────────────────────────────

// &HAABBGGRR
const BASE_COLOUR = '&H0000FFFF';      // yellow
const HIGHLIGHT_COLOUR = '&H000000FF'; // red
// Opaque-box border style draws the box in the outline colour: black at ~70% opacity
const BOX_COLOUR = '&H4B000000';
const BOX_PADDING = 12;

/** H:MM:SS.cc */
export function formatAssTime(seconds: number): string {
  const totalCs = Math.round(seconds * 100);
  const cs = totalCs % 100;
  const totalSeconds = Math.floor(totalCs / 100);
  const s = totalSeconds % 60;
  const m = Math.floor(totalSeconds / 60) % 60;
  const h = Math.floor(totalSeconds / 3600);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${h}:${pad(m)}:${pad(s)}.${pad(cs)}`;
}

/** ASS has no escape for override braces or backslashes; substitute them. */
export function sanitizeAssText(word: string): string {
  return word.replace(/\\/g, '/').replace(/\{/g, '(').replace(/\}/g, ')');
}

function renderChunkText(lines: string[][], highlight: number): string {
  let index = 0;
  return lines
    .map((line) =>
      line
        .map((word) => {
          const text = sanitizeAssText(word);
          return index++ === highlight ? `{\\c${HIGHLIGHT_COLOUR}&}${text}{\\r}` : text;
        })
        .join(' '),
    )
    .join('\\N');
}

export function buildCaptionDocument(
  chunks: CaptionChunk[],
  frame: Dimensions,
  settings: Pick<SubtitleSettings, 'font' | 'fontScale' | 'anchorY'>,
): string {
  const fontSize = Math.round(frame.height * settings.fontScale);
  const anchorX = Math.round(frame.width / 2);
  const anchorY = Math.round(frame.height * settings.anchorY);

  const header = [
    '[Script Info]',
    'ScriptType: v4.00+',
    `PlayResX: ${frame.width}`,
    `PlayResY: ${frame.height}`,
    'WrapStyle: 2',
    'ScaledBorderAndShadow: yes',
    '',
    '[V4+ Styles]',
    'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, ' +
      'Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, ' +
      'Alignment, MarginL, MarginR, MarginV, Encoding',
    `Style: Caption,${settings.font},${fontSize},${BASE_COLOUR},${BASE_COLOUR},${BOX_COLOUR},${BOX_COLOUR},` +
      `-1,0,0,0,100,100,0,0,3,${BOX_PADDING},0,8,0,0,0,1`,
    '',
    '[Events]',
    'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text',
  ];

  const events = chunks.flatMap((chunk) =>
    timeWords(chunk).map(
      (word) =>
        `Dialogue: 0,${formatAssTime(word.start)},${formatAssTime(word.end)},Caption,,0,0,0,,` +
        `{\\an8\\pos(${anchorX},${anchorY})}${renderChunkText(chunk.lines, word.index)}`,
    ),
  );

  return [...header, ...events, ''].join('\n');
}
