/**
 * Subscriber handle.
 *
 * An addressable inbox that can be registered under one or more monitor
 * names. Delivery never blocks the sender: messages land in a bounded
 * mailbox and are consumed either by pulling (`receive`, `poll`, `drain`,
 * `for await`) or by a listener given at construction, which is fed from
 * the mailbox one message at a time.
 */

import { v4 as uuidv4 } from 'uuid';
import { config } from '../config.js';
import { log, type Logger } from '../utils/logger.js';
import type { WatchOp } from '../protocol/op-flags.js';
import { Mailbox } from './mailbox.js';

export type MonitorMessage =
  | { type: 'event'; monitor: string; path: string; ops: ReadonlySet<WatchOp> }
  | { type: 'error'; monitor: string; message: string }
  | { type: 'stop'; monitor: string };

export type MessageListener = (message: MonitorMessage) => void | Promise<void>;

export interface SubscriberOptions {
  /** Mailbox bound (default: config.mailboxCapacity) */
  capacity?: number;
  /** Push consumer; pull methods are not meant to be mixed with it */
  listener?: MessageListener;
  label?: string;
}

export class Subscriber implements AsyncIterable<MonitorMessage> {
  readonly id: string;
  readonly label: string;
  private readonly mailbox: Mailbox<MonitorMessage>;
  private readonly listener: MessageListener | null;
  private readonly logger: Logger;
  private pumping = false;

  constructor(options: SubscriberOptions = {}) {
    this.id = uuidv4();
    this.label = options.label ?? this.id;
    this.mailbox = new Mailbox(options.capacity ?? config.mailboxCapacity);
    this.listener = options.listener ?? null;
    this.logger = log.child({ service: 'Subscriber', subscriber: this.label });
  }

  /**
   * Hand a message to this subscriber without waiting. Returns false when the
   * mailbox was full and the message was dropped. A stop is never dropped.
   */
  deliver(message: MonitorMessage): boolean {
    let accepted = true;
    if (message.type === 'stop') {
      this.mailbox.force(message);
    } else {
      accepted = this.mailbox.offer(message);
    }

    if (!accepted) {
      this.logger.warn('Mailbox full, dropping message', {
        monitor: message.monitor,
        type: message.type,
        dropped: this.mailbox.dropped,
      });
    }

    if (this.listener && !this.pumping && this.mailbox.size > 0) {
      this.pumping = true;
      setImmediate(() => {
        void this.pump();
      });
    }
    return accepted;
  }

  /** Wait for the next message; abort `signal` to give up waiting. */
  receive(signal?: AbortSignal): Promise<MonitorMessage> {
    return this.mailbox.take(signal);
  }

  poll(): MonitorMessage | undefined {
    return this.mailbox.poll();
  }

  drain(): MonitorMessage[] {
    return this.mailbox.drain();
  }

  get pending(): number {
    return this.mailbox.size;
  }

  get dropped(): number {
    return this.mailbox.dropped;
  }

  [Symbol.asyncIterator](): AsyncIterator<MonitorMessage> {
    return {
      next: async (): Promise<IteratorResult<MonitorMessage>> => ({
        value: await this.mailbox.take(),
        done: false,
      }),
    };
  }

  private async pump(): Promise<void> {
    try {
      let message = this.mailbox.poll();
      while (message !== undefined) {
        try {
          await this.listener?.(message);
        } catch (error) {
          this.logger.error(
            'Subscriber listener threw',
            error instanceof Error ? error : new Error(String(error)),
            { monitor: message.monitor, type: message.type }
          );
        }
        message = this.mailbox.poll();
      }
    } finally {
      this.pumping = false;
    }
  }
}
