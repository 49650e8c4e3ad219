/**
 * Subscriber Directory
 *
 * Process-wide multimap from monitor name to subscriber handles. Entries are
 * keyed by name, not by monitor instance, so a monitor restarted under the
 * same name reaches the subscribers its predecessor had. The directory is
 * created on first use and is never torn down by a monitor stopping.
 */

import { log, type Logger } from '../utils/logger.js';
import type { MonitorMessage, Subscriber } from './subscriber.js';

export class SubscriberDirectory {
  private readonly groups: Map<string, Set<Subscriber>> = new Map();
  private readonly logger: Logger;

  constructor() {
    this.logger = log.child({ service: 'SubscriberDirectory' });
  }

  /** Join `name`. Joining again is a no-op. */
  subscribe(name: string, subscriber: Subscriber): void {
    let group = this.groups.get(name);
    if (!group) {
      group = new Set();
      this.groups.set(name, group);
    }
    if (!group.has(subscriber)) {
      group.add(subscriber);
      this.logger.debug('Subscriber joined', { monitor: name, subscriber: subscriber.label });
    }
  }

  /** Leave `name`. Leaving a group one is not in is a no-op. */
  unsubscribe(name: string, subscriber: Subscriber): void {
    const group = this.groups.get(name);
    if (!group || !group.delete(subscriber)) {
      return;
    }
    if (group.size === 0) {
      this.groups.delete(name);
    }
    this.logger.debug('Subscriber left', { monitor: name, subscriber: subscriber.label });
  }

  members(name: string): Subscriber[] {
    return [...(this.groups.get(name) ?? [])];
  }

  isSubscribed(name: string, subscriber: Subscriber): boolean {
    return this.groups.get(name)?.has(subscriber) ?? false;
  }

  /**
   * Deliver `message` once to every distinct current member of `name`.
   * Works on a snapshot, so joins and leaves made by a listener take effect
   * from the next dispatch. Returns the number of members reached.
   */
  dispatch(name: string, message: MonitorMessage): number {
    const members = new Set(this.groups.get(name) ?? []);
    for (const subscriber of members) {
      subscriber.deliver(message);
    }
    return members.size;
  }

  /** Names with at least one subscriber. */
  names(): string[] {
    return [...this.groups.keys()];
  }

  clear(): void {
    this.groups.clear();
  }
}

// ============================================================================
// Singleton Instance
// ============================================================================

let directoryInstance: SubscriberDirectory | null = null;

/**
 * Get or create the process-wide SubscriberDirectory
 */
export function getSubscriberDirectory(): SubscriberDirectory {
  if (!directoryInstance) {
    directoryInstance = new SubscriberDirectory();
  }
  return directoryInstance;
}

/**
 * Drop the process-wide directory (for testing)
 */
export function clearSubscriberDirectory(): void {
  directoryInstance?.clear();
  directoryInstance = null;
}
