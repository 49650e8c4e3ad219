/**
 * WatchBackend on top of chokidar.
 *
 * Watches are non-recursive: a watched directory reports changes to its
 * direct entries only.
 */

import { watch, type FSWatcher } from 'chokidar';
import { once } from 'events';
import { stat } from 'fs/promises';
import type { WatchOp } from '../protocol/op-flags.js';
import type { WatchBackend, WatchNotification, WatchNotificationListener } from './watch-backend.js';

type ChokidarEvent = 'add' | 'addDir' | 'change' | 'unlink' | 'unlinkDir';

const EVENT_OPS: Readonly<Record<ChokidarEvent, WatchOp[]>> = {
  add: ['create'],
  addDir: ['create'],
  change: ['write'],
  unlink: ['remove'],
  unlinkDir: ['remove'],
};

export class ChokidarBackend implements WatchBackend {
  private watcher: FSWatcher | null = null;
  private readonly watched: Set<string> = new Set();
  private readonly listeners: Set<WatchNotificationListener> = new Set();

  async add(path: string): Promise<void> {
    if (path.length === 0) {
      throw new Error('add_watch requires a path');
    }

    try {
      await stat(path);
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
      throw new Error(code === 'ENOENT' ? `${path}: no such file or directory` : `${path}: ${code ?? 'stat failed'}`);
    }

    if (this.watched.has(path)) {
      return;
    }

    this.watched.add(path);
    if (this.watcher) {
      this.watcher.add(path);
    } else {
      this.watcher = this.createWatcher(path);
      // Changes made before the first scan finishes would be taken for initial entries
      await once(this.watcher, 'ready');
    }
  }

  async remove(path: string): Promise<void> {
    if (!this.watched.has(path)) {
      throw new Error(`can't remove non-existent watch: ${path}`);
    }

    this.watcher?.unwatch(path);
    this.watched.delete(path);
  }

  list(): string[] {
    return [...this.watched];
  }

  subscribe(listener: WatchNotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async close(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    this.watched.clear();
  }

  private createWatcher(path: string): FSWatcher {
    const watcher = watch(path, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      atomic: true,
    });

    watcher
      .on('all', (eventName: ChokidarEvent, filePath: string) => {
        this.notify({ kind: 'event', path: filePath, ops: EVENT_OPS[eventName] });
      })
      .on('error', (error: Error) => {
        this.notify({ kind: 'error', error });
      });

    return watcher;
  }

  private notify(notification: WatchNotification): void {
    for (const listener of this.listeners) {
      listener(notification);
    }
  }
}
