/**
 * Helper-side command loop.
 *
 * Reads command frames from the host, applies them to a WatchBackend and
 * answers each one under the id it arrived with. Backend notifications are
 * written as id-0 broadcast frames. Commands are handled one at a time in
 * arrival order.
 *
 * While the host is not draining the output and more than
 * `maxBufferedOutput` bytes are queued, notifications are dropped; once the
 * output drains a single watcher error reports how many were lost.
 */

import type { Readable, Writable } from 'stream';
import {
  BROADCAST_ID,
  encodeFrame,
  FrameReader,
  type CorrelationId,
  type Frame,
} from '../protocol/frame-codec.js';
import {
  encodeErrorPayload,
  encodeEventPayload,
  encodeOkReply,
  encodeValueReply,
  isCommandName,
  parseCommand,
} from '../protocol/messages.js';
import { encodeOps } from '../protocol/op-flags.js';
import { log, type Logger } from '../utils/logger.js';
import { FramingError, handleError, ProtocolError, type MonitorError } from '../utils/errors.js';
import type { WatchBackend, WatchNotification } from './watch-backend.js';

export interface CommandServerOptions {
  /** Queued output, in bytes, above which notifications are dropped (default 1 MiB) */
  maxBufferedOutput?: number;
}

const DEFAULT_MAX_BUFFERED_OUTPUT = 1024 * 1024;

export type CommandServerOutcome =
  | { reason: 'eof' }
  | { reason: 'fatal'; error: MonitorError };

export class CommandServer {
  private readonly reader: FrameReader;
  private readonly output: Writable;
  private readonly backend: WatchBackend;
  private readonly logger: Logger;
  private readonly maxBufferedOutput: number;
  private droppedNotifications = 0;

  constructor(input: Readable, output: Writable, backend: WatchBackend, options: CommandServerOptions = {}) {
    this.reader = new FrameReader(input);
    this.output = output;
    this.backend = backend;
    this.maxBufferedOutput = options.maxBufferedOutput ?? DEFAULT_MAX_BUFFERED_OUTPUT;
    this.logger = log.child({ service: 'CommandServer' });
  }

  /**
   * Serve until the host closes its end (`eof`) or sends something that
   * cannot be handled (`fatal`). The backend is closed either way.
   */
  async run(): Promise<CommandServerOutcome> {
    const unsubscribe = this.backend.subscribe((notification) => this.broadcast(notification));

    try {
      for (;;) {
        const frame = await this.reader.readFrame();
        if (frame === null) {
          this.logger.debug('Host closed the command stream');
          return { reason: 'eof' };
        }
        await this.handle(frame);
      }
    } catch (error) {
      const fatal = handleError(error, 'commandServer');
      this.logger.error('Command loop failed', fatal);
      return { reason: 'fatal', error: fatal };
    } finally {
      unsubscribe();
      await this.backend.close();
    }
  }

  private async handle(frame: Frame): Promise<void> {
    if (frame.id === BROADCAST_ID) {
      throw new ProtocolError('Command sent with the reserved broadcast id', { operation: 'handle' });
    }

    const { name, argument } = parseCommand(frame.payload.toString('utf8'));
    if (!isCommandName(name)) {
      throw new ProtocolError(`unknown command: ${JSON.stringify(name)}`, { operation: 'handle' });
    }

    switch (name) {
      case 'add_watch':
        await this.apply(frame.id, () => this.backend.add(argument));
        return;

      case 'remove':
        await this.apply(frame.id, () => this.backend.remove(argument));
        return;

      case 'watch_list':
        this.reply(frame.id, encodeValueReply(this.backend.list()));
        return;
    }
  }

  private async apply(id: CorrelationId, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.reply(id, encodeErrorPayload(message));
      return;
    }
    this.reply(id, encodeOkReply());
  }

  private reply(id: CorrelationId, payload: string): void {
    let frame: Buffer;
    try {
      frame = encodeFrame(id, payload);
    } catch (error) {
      if (!(error instanceof FramingError)) {
        throw error;
      }
      frame = encodeFrame(id, encodeErrorPayload(error.message));
    }
    this.output.write(frame);
  }

  private broadcast(notification: WatchNotification): void {
    if (this.droppedNotifications > 0 || this.isBackedUp()) {
      if (this.droppedNotifications === 0) {
        this.output.once('drain', () => this.reportDropped());
      }
      this.droppedNotifications++;
      return;
    }

    const payload =
      notification.kind === 'event'
        ? encodeEventPayload(notification.path, encodeOps(notification.ops))
        : encodeErrorPayload(notification.error.message);

    if (notification.kind === 'error') {
      this.logger.warn('Watcher error', { error: notification.error.message });
    }

    try {
      this.output.write(encodeFrame(BROADCAST_ID, payload));
    } catch (error) {
      // Paths too long to frame are reported as a watcher error
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn('Could not frame broadcast', { reason });
      this.output.write(encodeFrame(BROADCAST_ID, encodeErrorPayload(reason)));
    }
  }

  private isBackedUp(): boolean {
    return this.output.writableNeedDrain && this.output.writableLength >= this.maxBufferedOutput;
  }

  private reportDropped(): void {
    const count = this.droppedNotifications;
    this.droppedNotifications = 0;
    this.logger.warn('Dropped notifications while the host was not reading', { count });
    if (this.output.writable) {
      this.output.write(encodeFrame(BROADCAST_ID, encodeErrorPayload(`event queue overflow: dropped ${count} events`)));
    }
  }
}
