/**
 * Background-music library — static niche → track lookup.
 *
 * The mapping lives in `library.json` under MUSIC_LIBRARY_PATH, e.g.
 * `{ "news": "news-bg-music.mp3" }`. Paths are resolved against that directory.
 * Niches without an entry get no music.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

export interface MusicLibrary {
  trackFor(niche: string): string | undefined;
}

const LibrarySchema = z.record(z.string().min(1));

const normaliseNiche = (niche: string) => niche.trim().toLowerCase();

export function createMusicLibrary(entries: Record<string, string>, baseDir = '.'): MusicLibrary {
  const tracks = new Map(
    Object.entries(entries).map(([niche, file]) => [normaliseNiche(niche), path.resolve(baseDir, file)]),
  );
  return {
    trackFor: (niche) => tracks.get(normaliseNiche(niche)),
  };
}

export function loadMusicLibrary(libraryDir: string): MusicLibrary {
  const indexPath = path.join(libraryDir, 'library.json');
  if (!fs.existsSync(indexPath)) {
    logger.warn('Music: no library index — jobs will have no music bed', { indexPath });
    return createMusicLibrary({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(indexPath, 'utf-8'));
  } catch (err) {
    throw new Error(`Invalid music library ${indexPath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = LibrarySchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid music library ${indexPath}: ${parsed.error.issues.map((i) => i.message).join(', ')}`);
  }
  logger.debug('Music: library loaded', { niches: Object.keys(parsed.data) });
  return createMusicLibrary(parsed.data, libraryDir);
}

/**
 * Track for a niche if one is listed and present on disk. A listed track that is
 * missing is logged and skipped rather than failing the job.
 */
export function resolveMusicTrack(library: MusicLibrary, niche: string): string | undefined {
  const track = library.trackFor(niche);
  if (!track) return undefined;
  if (!fs.existsSync(track)) {
    logger.warn('Music: listed track missing on disk — continuing without music', { niche, track });
    return undefined;
  }
  return track;
}
