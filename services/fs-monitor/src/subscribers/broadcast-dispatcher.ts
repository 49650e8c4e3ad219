/**
 * Broadcast Dispatcher
 *
 * Turns one monitor's unsolicited helper payloads into subscriber messages
 * and fans them out through the Subscriber Directory.
 */

import { decodeBroadcast } from '../protocol/messages.js';
import { log, type Logger } from '../utils/logger.js';
import type { MonitorMessage } from './subscriber.js';
import { getSubscriberDirectory, type SubscriberDirectory } from './subscriber-directory.js';

export class BroadcastDispatcher {
  private readonly monitor: string;
  private readonly directory: SubscriberDirectory;
  private readonly logger: Logger;

  constructor(monitor: string, directory: SubscriberDirectory = getSubscriberDirectory()) {
    this.monitor = monitor;
    this.directory = directory;
    this.logger = log.child({ service: 'BroadcastDispatcher', monitor });
  }

  /**
   * Decode an id-0 payload and deliver it. Throws a ProtocolError for a
   * payload that is neither an event nor a watcher error.
   */
  dispatchPayload(payload: Buffer): number {
    const decoded = decodeBroadcast(payload);

    const message: MonitorMessage =
      decoded.kind === 'event'
        ? { type: 'event', monitor: this.monitor, path: decoded.path, ops: decoded.ops }
        : { type: 'error', monitor: this.monitor, message: decoded.message };

    if (message.type === 'error') {
      this.logger.warn('Watcher reported an error', { error: message.message });
    }

    return this.dispatch(message);
  }

  dispatchStop(): number {
    return this.dispatch({ type: 'stop', monitor: this.monitor });
  }

  private dispatch(message: MonitorMessage): number {
    const delivered = this.directory.dispatch(this.monitor, message);
    this.logger.debug('Broadcast delivered', { type: message.type, subscribers: delivered });
    return delivered;
  }
}
