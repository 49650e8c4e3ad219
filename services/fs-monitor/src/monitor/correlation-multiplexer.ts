/**
 * Correlation Multiplexer
 *
 * Pairs command frames with their responses over a single helper connection.
 * Every command gets a fresh nonzero correlation id and an entry in the waiter
 * table; the read loop resolves entries as responses arrive and hands frames
 * carrying id 0 to the broadcast callback. A waiter is removed on its first
 * resolution (response, timeout or close), so late responses are dropped.
 */

import type { Writable } from 'stream';
import {
  BROADCAST_ID,
  encodeFrame,
  MAX_CORRELATION_ID,
  type CorrelationId,
  type Frame,
  type FrameReader,
} from '../protocol/frame-codec.js';
import { config } from '../config.js';
import { log, type Logger } from '../utils/logger.js';
import {
  handleError,
  HelperExitError,
  MonitorError,
  TimeoutError,
} from '../utils/errors.js';

export interface MultiplexerOptions {
  /** Monitor name, for logs and error context */
  monitor: string;

  /** Called synchronously from the read loop for every id-0 frame */
  onBroadcast: (payload: Buffer) => void;

  /** Per-command deadline (default: config.commandTimeoutMs) */
  timeoutMs?: number;

  /** First id handed out (default: 1) */
  initialId?: CorrelationId;
}

export interface SentCommand {
  id: CorrelationId;
  /** Settles exactly once: with the response payload, a TimeoutError, or the close reason */
  response: Promise<Buffer>;
}

export type ReadLoopOutcome =
  | { reason: 'eof' }
  | { reason: 'error'; error: MonitorError };

interface PendingCommand {
  id: CorrelationId;
  operation: string;
  timer: NodeJS.Timeout;
  resolve: (payload: Buffer) => void;
  reject: (error: Error) => void;
}

export class CorrelationMultiplexer {
  private readonly output: Writable;
  private readonly reader: FrameReader;
  private readonly onBroadcast: (payload: Buffer) => void;
  private readonly monitor: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly pending: Map<CorrelationId, PendingCommand> = new Map();
  private nextId: CorrelationId;
  private writeChain: Promise<void> = Promise.resolve();
  private readLoop: Promise<ReadLoopOutcome> | null = null;
  private closedWith: MonitorError | null = null;

  constructor(output: Writable, reader: FrameReader, options: MultiplexerOptions) {
    this.output = output;
    this.reader = reader;
    this.onBroadcast = options.onBroadcast;
    this.monitor = options.monitor;
    this.timeoutMs = options.timeoutMs ?? config.commandTimeoutMs;
    this.nextId = options.initialId ?? 1n;
    this.logger = log.child({ service: 'CorrelationMultiplexer', monitor: options.monitor });
  }

  /**
   * Start the read loop. Resolves when the stream ends cleanly or a
   * connection-level error stops the loop; it never rejects.
   */
  start(): Promise<ReadLoopOutcome> {
    if (!this.readLoop) {
      this.readLoop = this.runReadLoop();
    }
    return this.readLoop;
  }

  /**
   * Register a waiter and write the command frame. The deadline starts now.
   */
  send(command: string, operation = command): SentCommand {
    if (this.closedWith) {
      throw this.closedWith;
    }

    const id = this.allocateId();

    const response = new Promise<Buffer>((resolve, reject) => {
      this.pending.set(id, {
        id,
        operation,
        timer: setTimeout(() => this.expire(id), this.timeoutMs),
        resolve,
        reject,
      });
    });

    this.logger.debug('Sending command', { operation, correlationId: id.toString() });

    this.write(encodeFrame(id, command)).catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      this.settle(id, new HelperExitError(`Failed to write to helper: ${reason}`, null, null, {
        operation,
        monitor: this.monitor,
      }));
    });

    return { id, response };
  }

  /** Send a command and wait for its response. */
  async request(command: string, operation = command): Promise<Buffer> {
    return this.send(command, operation).response;
  }

  /**
   * Fail every pending command with `reason` and refuse new ones.
   * Idempotent; the first reason wins.
   */
  close(reason: MonitorError): void {
    if (this.closedWith) {
      return;
    }
    this.closedWith = reason;

    const pending = [...this.pending.values()];
    this.pending.clear();
    for (const entry of pending) {
      clearTimeout(entry.timer);
      entry.reject(reason);
    }

    if (pending.length > 0) {
      this.logger.debug('Failed pending commands on close', { count: pending.length, reason: reason.code });
    }
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get isClosed(): boolean {
    return this.closedWith !== null;
  }

  private async runReadLoop(): Promise<ReadLoopOutcome> {
    try {
      for (;;) {
        const frame = await this.reader.readFrame();
        if (frame === null) {
          return { reason: 'eof' };
        }
        this.route(frame);
      }
    } catch (error) {
      return { reason: 'error', error: handleError(error, 'readLoop') };
    }
  }

  private route(frame: Frame): void {
    if (frame.id === BROADCAST_ID) {
      this.onBroadcast(frame.payload);
      return;
    }

    const entry = this.pending.get(frame.id);
    if (!entry) {
      this.logger.debug('Dropping response for unknown correlation id', {
        correlationId: frame.id.toString(),
      });
      return;
    }

    this.pending.delete(frame.id);
    clearTimeout(entry.timer);
    entry.resolve(frame.payload);
  }

  private expire(id: CorrelationId): void {
    const entry = this.pending.get(id);
    if (!entry) {
      return;
    }

    this.logger.warn('Command timed out', {
      operation: entry.operation,
      correlationId: id.toString(),
      timeoutMs: this.timeoutMs,
    });
    this.settle(id, new TimeoutError(entry.operation, this.timeoutMs, {
      monitor: this.monitor,
      correlationId: id.toString(),
    }));
  }

  private settle(id: CorrelationId, error: Error): void {
    const entry = this.pending.get(id);
    if (!entry) {
      return;
    }
    this.pending.delete(id);
    clearTimeout(entry.timer);
    entry.reject(error);
  }

  private allocateId(): CorrelationId {
    let id = this.nextId;
    while (id === BROADCAST_ID || this.pending.has(id)) {
      id = id >= MAX_CORRELATION_ID ? 1n : id + 1n;
    }
    this.nextId = id >= MAX_CORRELATION_ID ? 1n : id + 1n;
    return id;
  }

  /**
   * Serialize frame writes: each frame is handed to the stream only after the
   * previous one has been flushed.
   */
  private write(frame: Buffer): Promise<void> {
    const next = this.writeChain.then(
      () =>
        new Promise<void>((resolve, reject) => {
          this.output.write(frame, (error) => {
            if (error) {
              reject(error);
            } else {
              resolve();
            }
          });
        })
    );
    // A failed write is reported through `next`; later writes still run
    this.writeChain = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }
}
