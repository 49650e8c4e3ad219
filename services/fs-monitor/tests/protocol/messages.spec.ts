import { describe, expect, it } from 'vitest';
import {
  decodeBroadcast,
  decodeReply,
  encodeCommand,
  encodeErrorPayload,
  encodeEventPayload,
  encodeOkReply,
  encodeValueReply,
  isCommandName,
  parseCommand,
} from '../../src/protocol/messages.js';
import { ProtocolError } from '../../src/utils/errors.js';

describe('commands', () => {
  it('joins the name and argument with a single space', () => {
    expect(encodeCommand('add_watch', '/tmp/x')).toBe('add_watch /tmp/x');
    expect(encodeCommand('remove', '/tmp/with space')).toBe('remove /tmp/with space');
  });

  it('sends watch_list without an argument', () => {
    expect(encodeCommand('watch_list')).toBe('watch_list');
  });

  it('splits only at the first space', () => {
    expect(parseCommand('add_watch /tmp/with space')).toEqual({
      name: 'add_watch',
      argument: '/tmp/with space',
    });
    expect(parseCommand('watch_list')).toEqual({ name: 'watch_list', argument: '' });
  });

  it('recognizes the three command names', () => {
    expect(isCommandName('add_watch')).toBe(true);
    expect(isCommandName('watch_list')).toBe(true);
    expect(isCommandName('frobnicate')).toBe(false);
  });
});

describe('decodeReply', () => {
  it('decodes the bare ok reply', () => {
    expect(decodeReply(Buffer.from('"ok"'))).toEqual({ kind: 'ok' });
  });

  it('decodes a value reply, including a null value', () => {
    expect(decodeReply('{"OK":["/a","/b"]}')).toEqual({ kind: 'value', value: ['/a', '/b'] });
    expect(decodeReply('{"OK":null}')).toEqual({ kind: 'value', value: null });
  });

  it('decodes an error reply', () => {
    expect(decodeReply('{"Err":"/nope: no such file or directory"}')).toEqual({
      kind: 'error',
      message: '/nope: no such file or directory',
    });
  });

  it('reports anything else as unrecognized', () => {
    expect(decodeReply('42')).toEqual({ kind: 'unrecognized', raw: 42 });
    expect(decodeReply('{"Err":5}')).toEqual({ kind: 'unrecognized', raw: { Err: 5 } });
    expect(decodeReply('"okay"')).toEqual({ kind: 'unrecognized', raw: 'okay' });
    expect(decodeReply('not json')).toEqual({ kind: 'unrecognized', raw: 'not json' });
  });
});

describe('decodeBroadcast', () => {
  it('decodes a filesystem event with its operations', () => {
    const decoded = decodeBroadcast(Buffer.from('{"Name":"/tmp/x/file","Op":5}'));

    expect(decoded).toEqual({
      kind: 'event',
      path: '/tmp/x/file',
      ops: new Set(['remove', 'create']),
    });
  });

  it('decodes a watcher error', () => {
    expect(decodeBroadcast('{"Err":"queue overflow"}')).toEqual({
      kind: 'error',
      message: 'queue overflow',
    });
  });

  it('rejects payloads that are neither events nor errors', () => {
    expect(() => decodeBroadcast('"ok"')).toThrow(ProtocolError);
    expect(() => decodeBroadcast('{"Name":"/x","Op":32}')).toThrow(ProtocolError);
    expect(() => decodeBroadcast('{"Name":"/x"}')).toThrow('Unrecognized broadcast payload');
  });

  it('rejects payloads that are not JSON', () => {
    expect(() => decodeBroadcast('garbage')).toThrow('Broadcast payload is not valid JSON');
  });
});

describe('helper-side encoders', () => {
  it('produce the payloads the host decodes', () => {
    expect(encodeOkReply()).toBe('"ok"');
    expect(encodeValueReply(['/a'])).toBe('{"OK":["/a"]}');
    expect(encodeErrorPayload('boom')).toBe('{"Err":"boom"}');
    expect(encodeEventPayload('/a', 3)).toBe('{"Name":"/a","Op":3}');
  });
});
