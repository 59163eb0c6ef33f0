#!/usr/bin/env node
/**
 * CLI entry point — routes commands to pipeline handlers.
 *
 *   compile <job.json> [outputDir]   render the job, print the result JSON
 *   validate <job.json>              check the job without touching providers
 */
import { readFile } from 'fs/promises';
import { compileVideo, validateJob } from './pipeline/index.js';
import { CompilationError, describeError } from './errors.js';
import { logger } from './utils/logger.js';

const USAGE = 'Usage: compile <job.json> [outputDir] | validate <job.json>';

const [,, command, jobFile, outputDir] = process.argv;

async function readJob(file: string | undefined): Promise<unknown> {
  if (!file) throw new Error(`Missing job file. ${USAGE}`);
  const raw: unknown = JSON.parse(await readFile(file, 'utf-8'));
  return raw;
}

async function main(): Promise<void> {
  switch (command) {
    case 'compile': {
      const input = await readJob(jobFile);
      const controller = new AbortController();
      const cancel = (sig: NodeJS.Signals) => {
        logger.warn(`Received ${sig} — cancelling job`);
        controller.abort(new Error(`received ${sig}`));
      };
      process.once('SIGINT', cancel);
      process.once('SIGTERM', cancel);

      const result = await compileVideo(input, {
        signal: controller.signal,
        ...(outputDir ? { outputDir } : {}),
      });
      process.stdout.write(JSON.stringify(result, null, 2) + '\n');
      break;
    }
    case 'validate': {
      const job = validateJob(await readJob(jobFile));
      process.stdout.write(JSON.stringify({
        niche: job.niche,
        scenes: job.scenes.map((s) => ({ id: s.id, effect: s.effect, duration: s.duration })),
      }, null, 2) + '\n');
      break;
    }
    default:
      logger.error(`Unknown command: ${command ?? '(none)'}. ${USAGE}`);
      process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  const report = err instanceof CompilationError ? err.toJSON() : { name: 'Error', message: describeError(err) };
  process.stderr.write(JSON.stringify(report) + '\n');
  process.exit(1);
});
