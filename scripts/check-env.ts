#!/usr/bin/env tsx
/**
 * Pre-flight environment validation.
 * Checks provider keys, the ffmpeg toolchain, the output directory and the music library.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { execFileSync } from 'child_process';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

// ── Result tracking ───────────────────────────────────────────────────────────

let anyRequiredFailed = false;

function checkRequired(label: string, value: string | undefined, hint?: string): void {
  if (value && value.trim().length > 0) {
    const display = value.length > 10 ? `${value.slice(0, 6)}…` : '(set)';
    pass(label, display);
  } else {
    fail(label, hint ?? `Set ${label} in .env`);
    anyRequiredFailed = true;
  }
}

function checkBinary(name: string): void {
  try {
    const out = execFileSync(name, ['-version'], { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
    pass(name, out.split('\n')[0] ?? '');
  } catch {
    fail(name, `Install ${name} and make sure it is on PATH`);
    anyRequiredFailed = true;
  }
}

// ── Section: Provider keys ────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Scene compiler — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Provider keys${RESET}`);

checkRequired('FAL_KEY',        process.env['FAL_KEY'],        'Needed for imagePrompt scenes — https://fal.ai/dashboard');
checkRequired('OPENAI_API_KEY', process.env['OPENAI_API_KEY'], 'Needed for narration — https://platform.openai.com/api-keys');

// ── Section: Toolchain ────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Media toolchain${RESET}`);

checkBinary('ffmpeg');
checkBinary('ffprobe');

// ── Section: Directories ──────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Directories${RESET}`);

const outputDir = process.env['OUTPUT_DIR'] ?? './output';
console.log(`  ${YELLOW}○${RESET} OUTPUT_DIR  ${outputDir}${existsSync(outputDir) ? '' : '  (created on first job)'}`);

const musicDir = process.env['MUSIC_LIBRARY_PATH'] ?? './assets/music';
const libraryPath = join(musicDir, 'library.json');
if (!existsSync(libraryPath)) {
  console.log(`  ${YELLOW}○${RESET} music library  (no ${libraryPath} — jobs render without music)`);
} else {
  try {
    const entries: unknown = JSON.parse(readFileSync(libraryPath, 'utf-8'));
    for (const [niche, file] of Object.entries(entries !== null && typeof entries === 'object' ? entries : {})) {
      const trackPath = join(musicDir, String(file));
      if (existsSync(trackPath)) pass(`music: ${niche}`, trackPath);
      else console.log(`  ${YELLOW}○${RESET} music: ${niche}  (listed but missing: ${trackPath})`);
    }
  } catch (err) {
    fail('music library', `${libraryPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    anyRequiredFailed = true;
  }
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm run compile -- examples/job.json${RESET}\n`);
}
