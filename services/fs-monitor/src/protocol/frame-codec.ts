/**
 * Frame Codec
 *
 * Length-prefixed frames on the helper's duplex byte stream:
 *
 *   [length: u16 BE][correlation id: u64 BE][payload]
 *
 * where `length` counts the id and the payload (`8 + payload.length`).
 * Correlation id 0 is reserved for unsolicited broadcast frames.
 */

import type { Readable } from 'stream';
import { FramingError } from '../utils/errors.js';

export type CorrelationId = bigint;

export const BROADCAST_ID: CorrelationId = 0n;
export const MAX_CORRELATION_ID: CorrelationId = (1n << 64n) - 1n;

export const LENGTH_PREFIX_SIZE = 2;
export const CORRELATION_ID_SIZE = 8;
export const MAX_FRAME_LENGTH = 0xffff;
export const MAX_PAYLOAD_SIZE = MAX_FRAME_LENGTH - CORRELATION_ID_SIZE;

// Above this many buffered bytes the source stream is paused until the reader catches up
const HIGH_WATER_MARK = 256 * 1024;

export interface Frame {
  id: CorrelationId;
  payload: Buffer;
}

export function encodeFrame(id: CorrelationId, payload: Buffer | string): Buffer {
  if (id < 0n || id > MAX_CORRELATION_ID) {
    throw new FramingError(`Correlation id out of range: ${id}`, { operation: 'encodeFrame' });
  }

  const body = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
  if (body.length > MAX_PAYLOAD_SIZE) {
    throw new FramingError(
      `Payload of ${body.length} bytes exceeds the ${MAX_PAYLOAD_SIZE} byte frame limit`,
      { operation: 'encodeFrame' }
    );
  }

  const frame = Buffer.alloc(LENGTH_PREFIX_SIZE + CORRELATION_ID_SIZE + body.length);
  frame.writeUInt16BE(CORRELATION_ID_SIZE + body.length, 0);
  frame.writeBigUInt64BE(id, LENGTH_PREFIX_SIZE);
  body.copy(frame, LENGTH_PREFIX_SIZE + CORRELATION_ID_SIZE);
  return frame;
}

/**
 * Decode a buffer holding exactly one complete frame.
 */
export function decodeFrame(buffer: Buffer): Frame {
  if (buffer.length < LENGTH_PREFIX_SIZE) {
    throw new FramingError('Frame shorter than its length prefix', { operation: 'decodeFrame' });
  }

  const length = buffer.readUInt16BE(0);
  if (length < CORRELATION_ID_SIZE) {
    throw new FramingError(`Declared frame length ${length} is shorter than a correlation id`, {
      operation: 'decodeFrame',
    });
  }
  if (buffer.length !== LENGTH_PREFIX_SIZE + length) {
    throw new FramingError(
      `Declared frame length ${length} does not match ${buffer.length - LENGTH_PREFIX_SIZE} available bytes`,
      { operation: 'decodeFrame' }
    );
  }

  return splitBody(buffer.subarray(LENGTH_PREFIX_SIZE));
}

function splitBody(body: Buffer): Frame {
  return {
    id: body.readBigUInt64BE(0),
    payload: body.subarray(CORRELATION_ID_SIZE),
  };
}

/**
 * Pull-based frame decoder over a readable stream.
 *
 * Each `readFrame()` call resolves exactly one frame, resolves `null` when the
 * stream ends cleanly on a frame boundary, or rejects with a `FramingError`
 * when the stream ends or fails mid-frame. Only one read may be in flight.
 */
export class FrameReader {
  private readonly stream: Readable;
  private chunks: Buffer[] = [];
  private buffered = 0;
  private streamEnded = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;
  private reading = false;

  constructor(stream: Readable) {
    this.stream = stream;

    stream.on('data', (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      this.chunks.push(buffer);
      this.buffered += buffer.length;
      if (this.buffered > HIGH_WATER_MARK) {
        stream.pause();
      }
      this.notify();
    });
    stream.once('end', () => this.finish());
    stream.once('close', () => this.finish());
    stream.once('error', (error: Error) => {
      this.failure = error;
      this.notify();
    });
  }

  /** True once the underlying stream has ended or closed. */
  get ended(): boolean {
    return this.streamEnded;
  }

  async readFrame(): Promise<Frame | null> {
    if (this.reading) {
      throw new Error('FrameReader already has a read in progress');
    }

    this.reading = true;
    try {
      const prefix = await this.readExactly(LENGTH_PREFIX_SIZE, true);
      if (prefix === null) {
        return null;
      }

      const length = prefix.readUInt16BE(0);
      if (length < CORRELATION_ID_SIZE) {
        throw new FramingError(`Declared frame length ${length} is shorter than a correlation id`, {
          operation: 'readFrame',
        });
      }

      const body = await this.readExactly(length, false);
      if (body === null) {
        throw new FramingError('Stream ended mid-frame', { operation: 'readFrame' });
      }
      return splitBody(body);
    } finally {
      this.reading = false;
    }
  }

  private async readExactly(size: number, atBoundary: boolean): Promise<Buffer | null> {
    while (this.buffered < size) {
      if (this.failure) {
        throw new FramingError(`Stream failed: ${this.failure.message}`, { operation: 'readFrame' });
      }
      if (this.streamEnded) {
        if (atBoundary && this.buffered === 0) {
          return null;
        }
        throw new FramingError(
          `Stream closed mid-frame: expected ${size} bytes, got ${this.buffered}`,
          { operation: 'readFrame' }
        );
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }

    return this.consume(size);
  }

  private consume(size: number): Buffer {
    const out = Buffer.allocUnsafe(size);
    let offset = 0;

    while (offset < size) {
      const head = this.chunks[0];
      const take = Math.min(head.length, size - offset);
      head.copy(out, offset, 0, take);
      offset += take;
      if (take === head.length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = head.subarray(take);
      }
    }

    this.buffered -= size;
    if (this.stream.isPaused() && this.buffered <= HIGH_WATER_MARK) {
      this.stream.resume();
    }
    return out;
  }

  private finish(): void {
    this.streamEnded = true;
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
