import { PassThrough } from 'stream';
import { describe, expect, it } from 'vitest';
import {
  decodeFrame,
  encodeFrame,
  FrameReader,
  MAX_CORRELATION_ID,
  MAX_PAYLOAD_SIZE,
} from '../../src/protocol/frame-codec.js';
import { FramingError } from '../../src/utils/errors.js';

function writeInChunks(stream: PassThrough, bytes: Buffer, chunkSize: number): void {
  for (let offset = 0; offset < bytes.length; offset += chunkSize) {
    stream.write(bytes.subarray(offset, offset + chunkSize));
  }
}

describe('encodeFrame', () => {
  it('writes a big-endian length prefix, correlation id and payload', () => {
    const frame = encodeFrame(258n, 'ok');

    expect([...frame]).toEqual([
      0x00, 0x0a,
      0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x01, 0x02,
      0x6f, 0x6b,
    ]);
  });

  it('accepts a payload that fills the frame exactly', () => {
    const frame = encodeFrame(1n, Buffer.alloc(MAX_PAYLOAD_SIZE));

    expect(frame.readUInt16BE(0)).toBe(0xffff);
    expect(frame.length).toBe(2 + 0xffff);
  });

  it('rejects payloads larger than a frame can carry', () => {
    expect(() => encodeFrame(1n, Buffer.alloc(MAX_PAYLOAD_SIZE + 1))).toThrow(FramingError);
  });

  it('rejects ids outside the unsigned 64-bit range', () => {
    expect(() => encodeFrame(-1n, 'x')).toThrow(FramingError);
    expect(() => encodeFrame(MAX_CORRELATION_ID + 1n, 'x')).toThrow(FramingError);
  });
});

describe('decodeFrame', () => {
  it('recovers the id and payload that were encoded', () => {
    const cases: Array<[bigint, string]> = [
      [1n, 'add_watch /tmp/x'],
      [42n, ''],
      [MAX_CORRELATION_ID, '{"OK":["/a","/b"]}'],
    ];

    for (const [id, payload] of cases) {
      const frame = decodeFrame(encodeFrame(id, payload));
      expect(frame.id).toBe(id);
      expect(frame.payload.toString('utf8')).toBe(payload);
    }
  });

  it('rejects a buffer whose length disagrees with its prefix', () => {
    const frame = encodeFrame(3n, 'abc');

    expect(() => decodeFrame(frame.subarray(0, frame.length - 1))).toThrow(FramingError);
    expect(() => decodeFrame(Buffer.concat([frame, Buffer.from([0])]))).toThrow(FramingError);
  });

  it('rejects a declared length shorter than the correlation id', () => {
    expect(() => decodeFrame(Buffer.from([0x00, 0x04, 1, 2, 3, 4]))).toThrow(FramingError);
  });
});

describe('FrameReader', () => {
  it('reassembles frames split across arbitrary chunks', async () => {
    const stream = new PassThrough();
    const reader = new FrameReader(stream);

    writeInChunks(stream, Buffer.concat([encodeFrame(1n, 'first'), encodeFrame(0n, 'second')]), 3);
    stream.end();

    const first = await reader.readFrame();
    const second = await reader.readFrame();

    expect(first?.id).toBe(1n);
    expect(first?.payload.toString()).toBe('first');
    expect(second?.id).toBe(0n);
    expect(second?.payload.toString()).toBe('second');
    expect(await reader.readFrame()).toBeNull();
  });

  it('reads several frames delivered in a single chunk one at a time', async () => {
    const stream = new PassThrough();
    const reader = new FrameReader(stream);

    stream.write(Buffer.concat([encodeFrame(5n, 'a'), encodeFrame(6n, 'b'), encodeFrame(7n, 'c')]));
    stream.end();

    const ids: bigint[] = [];
    for (let frame = await reader.readFrame(); frame !== null; frame = await reader.readFrame()) {
      ids.push(frame.id);
    }
    expect(ids).toEqual([5n, 6n, 7n]);
  });

  it('signals a clean end of stream at a frame boundary', async () => {
    const stream = new PassThrough();
    const reader = new FrameReader(stream);
    stream.end();

    expect(await reader.readFrame()).toBeNull();
    expect(reader.ended).toBe(true);
  });

  it('fails when the stream ends inside a frame body', async () => {
    const stream = new PassThrough();
    const reader = new FrameReader(stream);

    stream.write(encodeFrame(9n, 'truncated').subarray(0, 5));
    stream.end();

    await expect(reader.readFrame()).rejects.toBeInstanceOf(FramingError);
  });

  it('fails when the stream ends inside a length prefix', async () => {
    const stream = new PassThrough();
    const reader = new FrameReader(stream);

    stream.write(Buffer.from([0x00]));
    stream.end();

    await expect(reader.readFrame()).rejects.toBeInstanceOf(FramingError);
  });

  it('fails on a declared length shorter than the correlation id', async () => {
    const stream = new PassThrough();
    const reader = new FrameReader(stream);

    stream.write(Buffer.from([0x00, 0x02, 0xaa, 0xbb]));

    await expect(reader.readFrame()).rejects.toThrow('shorter than a correlation id');
  });

  it('unblocks a waiting read with end of stream when the stream is destroyed', async () => {
    const stream = new PassThrough();
    const reader = new FrameReader(stream);

    const pending = reader.readFrame();
    stream.destroy();

    expect(await pending).toBeNull();
  });

  it('turns a stream error into a FramingError', async () => {
    const stream = new PassThrough();
    const reader = new FrameReader(stream);

    const pending = reader.readFrame();
    stream.destroy(new Error('pipe broke'));

    await expect(pending).rejects.toThrow('Stream failed: pipe broke');
  });

  it('refuses a second concurrent read', async () => {
    const stream = new PassThrough();
    const reader = new FrameReader(stream);

    const first = reader.readFrame();
    await expect(reader.readFrame()).rejects.toThrow('already has a read in progress');

    stream.end();
    expect(await first).toBeNull();
  });
});
