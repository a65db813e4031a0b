/**
 * Folder-based frame source
 *
 * Watches a directory where a screen-capture tool drops frame images and hands them
 * out oldest first. The backlog is bounded: when the consumer falls behind, the
 * oldest waiting frames are discarded (and deleted) so analysis stays near live.
 */

import { promises as fs } from 'fs';
import path from 'path';
import chokidar, { type FSWatcher } from 'chokidar';
import type { FrameSource } from '../../core/source/SourcePorts';
import type { Frame } from '../../core/types';
import { DropOldestQueue } from '../../utils/boundedQueue';
import { toErrorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('folder-source');

export interface FolderSourceConfig {
  watchPath: string;
  maxBacklog: number;
  filePattern?: RegExp;
  /** Wait for file writes to settle before queueing. */
  debounceMs?: number;
  deleteConsumed?: boolean;
}

const MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
};

export function frameMimeType(filePath: string): string {
  return MIME_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

export class FolderFrameSource implements FrameSource {
  private static readonly DEFAULT_PATTERN = /\.(png|jpe?g|webp|bmp|tiff?)$/i;

  private readonly config: Required<FolderSourceConfig>;
  private readonly backlog: DropOldestQueue<string>;
  private readonly queued = new Set<string>();
  private watcher?: FSWatcher;
  private stopController?: AbortController;
  private nextIndex = 0;

  constructor(config: FolderSourceConfig) {
    this.config = {
      filePattern: FolderFrameSource.DEFAULT_PATTERN,
      debounceMs: 100,
      deleteConsumed: true,
      ...config,
    };
    this.backlog = new DropOldestQueue<string>(this.config.maxBacklog);
  }

  async start(): Promise<void> {
    if (this.stopController) {
      return;
    }
    const controller = new AbortController();
    this.stopController = controller;

    await fs.mkdir(this.config.watchPath, { recursive: true });
    if (!controller.signal.aborted) {
      await this.scanExistingFiles();
    }
    // stop() ran while we were scanning
    if (controller.signal.aborted) {
      this.backlog.clear();
      this.queued.clear();
      return;
    }

    const watcher = chokidar.watch(this.config.watchPath, {
      ignored: /(^|[/\\])\../,
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      awaitWriteFinish: {
        stabilityThreshold: this.config.debounceMs,
        pollInterval: 50,
      },
    });

    this.watcher = watcher;

    watcher.on('add', (filePath: string) => {
      if (this.config.filePattern.test(filePath)) {
        this.enqueue(filePath);
      }
    });

    watcher.on('error', (error) => {
      logger.warn('Folder watcher error', { watchPath: this.config.watchPath, error: toErrorMessage(error) });
    });

    // Files created before the watcher is ready would count as initial and be ignored
    await new Promise<void>((resolve) => watcher.once('ready', () => resolve()));

    logger.info('Folder frame source started', {
      watchPath: this.config.watchPath,
      backlog: this.backlog.size,
    });
  }

  async stop(): Promise<void> {
    const controller = this.stopController;
    if (!controller) {
      return;
    }
    this.stopController = undefined;
    controller.abort();

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = undefined;
    }
    this.backlog.clear();
    this.queued.clear();
  }

  isRunning(): boolean {
    return this.stopController !== undefined;
  }

  async next(signal?: AbortSignal): Promise<Frame | undefined> {
    const stopSignal = this.stopController?.signal;
    if (!stopSignal) {
      return undefined;
    }

    const local = new AbortController();
    const onAbort = (): void => local.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    stopSignal.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) local.abort();

    try {
      while (!local.signal.aborted) {
        const filePath = await this.backlog.take(local.signal);
        if (!filePath) {
          return undefined;
        }
        this.queued.delete(filePath);

        const frame = await this.readFrame(filePath);
        if (frame) {
          return frame;
        }
      }
      return undefined;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      stopSignal.removeEventListener('abort', onAbort);
    }
  }

  getStatus(): { running: boolean; backlog: number; dropped: number; delivered: number } {
    return {
      running: this.isRunning(),
      backlog: this.backlog.size,
      dropped: this.backlog.droppedCount,
      delivered: this.nextIndex,
    };
  }

  private async readFrame(filePath: string): Promise<Frame | undefined> {
    try {
      const [image, stats] = await Promise.all([fs.readFile(filePath), fs.stat(filePath)]);
      if (this.config.deleteConsumed) {
        await this.remove(filePath);
      }
      return {
        index: this.nextIndex++,
        image,
        mimeType: frameMimeType(filePath),
        capturedAt: stats.mtimeMs,
      };
    } catch (error) {
      logger.warn('Skipping unreadable frame', { filePath, error: toErrorMessage(error) });
      return undefined;
    }
  }

  private async scanExistingFiles(): Promise<void> {
    const files = await fs.readdir(this.config.watchPath);
    const entries: Array<{ filePath: string; name: string; mtimeMs: number }> = [];

    for (const name of files) {
      if (!this.config.filePattern.test(name)) continue;
      const filePath = path.join(this.config.watchPath, name);
      try {
        const stats = await fs.stat(filePath);
        if (stats.isFile()) {
          entries.push({ filePath, name, mtimeMs: stats.mtimeMs });
        }
      } catch (error) {
        logger.debug('Skipping file that vanished during scan', { filePath, error: toErrorMessage(error) });
      }
    }

    entries
      .sort((a, b) => a.mtimeMs - b.mtimeMs || a.name.localeCompare(b.name))
      .forEach((entry) => this.enqueue(entry.filePath));
  }

  private enqueue(filePath: string): void {
    if (this.queued.has(filePath)) {
      return;
    }
    this.queued.add(filePath);

    const evicted = this.backlog.push(filePath);
    if (evicted) {
      this.queued.delete(evicted);
      logger.debug('Backlog full, dropping oldest frame', { filePath: evicted, dropped: this.backlog.droppedCount });
      if (this.config.deleteConsumed) {
        void this.remove(evicted);
      }
    }
  }

  private async remove(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error) {
      logger.debug('Could not delete frame file', { filePath, error: toErrorMessage(error) });
    }
  }
}

