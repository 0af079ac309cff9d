/**
 * Per-task scratch directory. Created by the pipeline, handed onward inside TaskOutput,
 * and removed by whoever ends up owning it.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { logger } from '../utils/logger.ts';

const DIR_PREFIX = 'video-relay-';

export class TempStorage {
  private released = false;

  private constructor(public readonly path: string) {}

  static async create(root: string): Promise<TempStorage> {
    const path = await mkdtemp(join(root, DIR_PREFIX));
    return new TempStorage(path);
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** Removes the directory and everything in it. Safe to call more than once. */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await rm(this.path, { recursive: true, force: true });
    logger.debug({ path: this.path }, 'Temp storage released');
  }
}
