/**
 * Per-job workspace — a uniquely named directory under the output root.
 *
 * Intermediates live in `<root>/tmp`; the final artifact is written to
 * `<root>/final_video.mp4`. Release happens exactly once: success removes `tmp/`
 * and keeps the artifact, failure removes the whole root.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { logger } from '../utils/logger.js';
import { WorkspaceError, describeError } from '../errors.js';

export const FINAL_VIDEO_NAME = 'final_video.mp4';

export interface Workspace {
  /** Short id derived from the directory name */
  readonly id: string;
  readonly root: string;
  readonly tmpDir: string;
  readonly finalPath: string;
  /** Path for an intermediate file */
  file(name: string): string;
}

export async function createWorkspace(outputDir: string): Promise<Workspace> {
  try {
    await fs.mkdir(outputDir, { recursive: true });
    const root = await fs.mkdtemp(path.join(path.resolve(outputDir), 'job-'));
    const tmpDir = path.join(root, 'tmp');
    await fs.mkdir(tmpDir);
    const id = path.basename(root);
    logger.debug('Workspace: created', { id, root });
    return {
      id,
      root,
      tmpDir,
      finalPath: path.join(root, FINAL_VIDEO_NAME),
      file: (name) => path.join(tmpDir, name),
    };
  } catch (err) {
    throw new WorkspaceError(`cannot create workspace under ${outputDir}: ${describeError(err)}`, err);
  }
}

async function release(ws: Workspace, succeeded: boolean): Promise<void> {
  await fs.rm(succeeded ? ws.tmpDir : ws.root, { recursive: true, force: true });
  logger.debug('Workspace: released', { id: ws.id, kept: succeeded ? FINAL_VIDEO_NAME : null });
}

/**
 * Scoped acquisition: create a workspace, run `fn`, release on every exit path.
 * A teardown failure after success is a WorkspaceError (and the artifact is
 * discarded); after a job failure it is logged and the job failure wins.
 */
export async function withWorkspace<T>(outputDir: string, fn: (ws: Workspace) => Promise<T>): Promise<T> {
  const ws = await createWorkspace(outputDir);

  let result: T;
  try {
    result = await fn(ws);
  } catch (err) {
    try {
      await release(ws, false);
    } catch (cleanupErr) {
      logger.error('Workspace: teardown after failure did not complete', { id: ws.id, error: describeError(cleanupErr) });
    }
    throw err;
  }

  try {
    await release(ws, true);
  } catch (err) {
    await fs.rm(ws.root, { recursive: true, force: true }).catch((rmErr: unknown) => {
      logger.error('Workspace: could not discard job directory', { id: ws.id, error: describeError(rmErr) });
    });
    throw new WorkspaceError(`cannot remove intermediates in ${ws.tmpDir}: ${describeError(err)}`, err);
  }
  return result;
}
