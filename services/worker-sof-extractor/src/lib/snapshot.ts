/**
 * Output Snapshot
 *
 * Keeps the most recent extraction outputs in a JSON array file for
 * inspection, then wipes it back to "[]" for privacy once the TTL elapses.
 */

import fs from 'fs';
import { logger, type SofExtractionOutput } from '@sof-extract/shared';

const EMPTY_SNAPSHOT = '[]';

export class OutputSnapshot {
  private wipeTimer: NodeJS.Timeout | null = null;
  // Serializes file access across concurrent jobs
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    readonly ttlMs: number
  ) {}

  /**
   * Append an output to the snapshot file.
   */
  append(output: SofExtractionOutput): Promise<void> {
    return this.enqueue(async () => {
      const outputs = await this.read();
      outputs.push(output);
      await fs.promises.writeFile(this.filePath, JSON.stringify(outputs, null, 2), 'utf-8');

      logger.debug('Output snapshot updated', {
        path: this.filePath,
        output_count: outputs.length,
      });
    });
  }

  /**
   * Start the wipe countdown unless one is already running. The deadline is
   * set by the first output since the last wipe and later jobs keep it.
   */
  scheduleWipe(): void {
    if (this.wipeTimer) return;

    this.wipeTimer = setTimeout(() => {
      this.wipeTimer = null;
      this.wipe().catch((error: unknown) => {
        logger.error('Scheduled snapshot wipe failed', error, { path: this.filePath });
      });
    }, this.ttlMs);
    this.wipeTimer.unref();
  }

  /**
   * Replace the snapshot contents with an empty JSON array. Failures are
   * logged, never thrown.
   */
  wipe(): Promise<void> {
    return this.enqueue(async () => {
      try {
        await fs.promises.writeFile(this.filePath, EMPTY_SNAPSHOT, 'utf-8');
        logger.info('Cleared output snapshot', { path: this.filePath });
      } catch (error) {
        logger.error('Could not clear output snapshot', error, { path: this.filePath });
      }
    });
  }

  /**
   * Cancel the pending countdown and wipe immediately.
   */
  async close(): Promise<void> {
    if (this.wipeTimer) {
      clearTimeout(this.wipeTimer);
      this.wipeTimer = null;
    }
    await this.wipe();
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(task);
    this.queue = run.catch((error: unknown) => {
      logger.warn('Output snapshot task failed', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    });
    return run;
  }

  private async read(): Promise<unknown[]> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return Array.isArray(parsed) ? parsed : [];
    } catch (error) {
      logger.warn('Output snapshot is not valid JSON, starting a new one', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }
}

// fs rejections can come from another realm, so match on shape
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
