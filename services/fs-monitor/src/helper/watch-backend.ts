import type { WatchOp } from '../protocol/op-flags.js';

export type WatchNotification =
  | { kind: 'event'; path: string; ops: WatchOp[] }
  | { kind: 'error'; error: Error };

export type WatchNotificationListener = (notification: WatchNotification) => void;

/**
 * The OS-level watcher the helper drives. `add` and `remove` reject with an
 * Error whose message is reported back to the host verbatim.
 */
export interface WatchBackend {
  add(path: string): Promise<void>;
  remove(path: string): Promise<void>;
  /** Paths currently watched, in no particular order */
  list(): string[];
  /** Subscribe to change notifications. Returns an unsubscribe function. */
  subscribe(listener: WatchNotificationListener): () => void;
  close(): Promise<void>;
}
