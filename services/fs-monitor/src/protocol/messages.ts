/**
 * Helper protocol payloads.
 *
 * Commands travel host→helper as ASCII `"<name> <argument>"`. Replies and
 * broadcasts travel helper→host as JSON:
 *
 *   "ok"                 success, no value
 *   {"OK": value}        success carrying a value
 *   {"Err": message}     failure (reply) or watcher error (broadcast)
 *   {"Name": p, "Op": n} filesystem event (broadcast only)
 */

import { z } from 'zod';
import { ProtocolError } from '../utils/errors.js';
import { decodeOps, MAX_OP_MASK, type WatchOp } from './op-flags.js';

export type CommandName = 'add_watch' | 'remove' | 'watch_list';

export const COMMAND_NAMES: readonly CommandName[] = ['add_watch', 'remove', 'watch_list'];

export const OK_REPLY = 'ok';

export interface ParsedCommand {
  name: string;
  argument: string;
}

export type CommandReply =
  | { kind: 'ok' }
  | { kind: 'value'; value: unknown }
  | { kind: 'error'; message: string }
  | { kind: 'unrecognized'; raw: unknown };

export type BroadcastPayload =
  | { kind: 'event'; path: string; ops: Set<WatchOp> }
  | { kind: 'error'; message: string };

const ErrPayloadSchema = z.object({ Err: z.string() });

const EventPayloadSchema = z.object({
  Name: z.string(),
  Op: z.number().int().min(0).max(MAX_OP_MASK),
});

export function isCommandName(name: string): name is CommandName {
  return (COMMAND_NAMES as readonly string[]).includes(name);
}

export function encodeCommand(name: CommandName, argument?: string): string {
  return argument === undefined ? name : `${name} ${argument}`;
}

/**
 * Split a command payload at its first space. Everything after that space,
 * including further spaces, is the argument.
 */
export function parseCommand(payload: string): ParsedCommand {
  const separator = payload.indexOf(' ');
  if (separator === -1) {
    return { name: payload, argument: '' };
  }
  return { name: payload.slice(0, separator), argument: payload.slice(separator + 1) };
}

function parseJson(payload: Buffer | string): { ok: true; value: unknown } | { ok: false } {
  const text = typeof payload === 'string' ? payload : payload.toString('utf8');
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function hasKey(value: unknown, key: string): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.hasOwn(value, key);
}

export function decodeReply(payload: Buffer | string): CommandReply {
  const parsed = parseJson(payload);
  if (!parsed.ok) {
    return { kind: 'unrecognized', raw: payload.toString() };
  }

  const data = parsed.value;
  if (data === OK_REPLY) {
    return { kind: 'ok' };
  }
  if (hasKey(data, 'OK')) {
    return { kind: 'value', value: data.OK };
  }

  const err = ErrPayloadSchema.safeParse(data);
  if (err.success) {
    return { kind: 'error', message: err.data.Err };
  }

  return { kind: 'unrecognized', raw: data };
}

/**
 * Decode an unsolicited (correlation id 0) payload. Anything other than an
 * event or a watcher error is a protocol violation.
 */
export function decodeBroadcast(payload: Buffer | string): BroadcastPayload {
  const parsed = parseJson(payload);
  if (!parsed.ok) {
    throw new ProtocolError('Broadcast payload is not valid JSON', {
      operation: 'decodeBroadcast',
      payload: payload.toString(),
    });
  }

  const event = EventPayloadSchema.safeParse(parsed.value);
  if (event.success) {
    return { kind: 'event', path: event.data.Name, ops: decodeOps(event.data.Op) };
  }

  const err = ErrPayloadSchema.safeParse(parsed.value);
  if (err.success) {
    return { kind: 'error', message: err.data.Err };
  }

  throw new ProtocolError('Unrecognized broadcast payload', {
    operation: 'decodeBroadcast',
    payload: parsed.value,
  });
}

// Helper-side encoders

export function encodeOkReply(): string {
  return JSON.stringify(OK_REPLY);
}

export function encodeValueReply(value: unknown): string {
  return JSON.stringify({ OK: value });
}

export function encodeErrorPayload(message: string): string {
  return JSON.stringify({ Err: message });
}

export function encodeEventPayload(path: string, opMask: number): string {
  return JSON.stringify({ Name: path, Op: opMask });
}
