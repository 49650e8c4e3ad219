/**
 * Watch Command Interface
 *
 * Typed add_watch / remove / watch_list calls over a CorrelationMultiplexer.
 */

import { z } from 'zod';
import { decodeReply, encodeCommand, type CommandName } from '../protocol/messages.js';
import { CommandError, UnrecognizedReplyError } from '../utils/errors.js';
import type { CorrelationMultiplexer } from './correlation-multiplexer.js';

const WatchListSchema = z.array(z.string());

export class WatchCommands {
  private readonly multiplexer: CorrelationMultiplexer;
  private readonly monitor: string;

  constructor(multiplexer: CorrelationMultiplexer, monitor: string) {
    this.multiplexer = multiplexer;
    this.monitor = monitor;
  }

  /** Rejects with CommandError when the helper cannot watch `path`. */
  async addWatch(path: string): Promise<void> {
    await this.call('add_watch', path);
  }

  /** Rejects with CommandError when `path` is not being watched. */
  async remove(path: string): Promise<void> {
    await this.call('remove', path);
  }

  /** Watched paths, in no particular order. */
  async watchList(): Promise<string[]> {
    const value = await this.call('watch_list');
    if (value === undefined) {
      return [];
    }

    const paths = WatchListSchema.safeParse(value);
    if (!paths.success) {
      throw new UnrecognizedReplyError(value, { operation: 'watch_list', monitor: this.monitor });
    }
    return paths.data;
  }

  /**
   * Run one command. Resolves with the reply's value (undefined for a bare
   * "ok"); rejects with CommandError, UnrecognizedReplyError, or whatever the
   * multiplexer failed the command with.
   */
  private async call(name: CommandName, argument?: string): Promise<unknown> {
    const payload = await this.multiplexer.request(encodeCommand(name, argument), name);
    const reply = decodeReply(payload);

    switch (reply.kind) {
      case 'ok':
        return undefined;
      case 'value':
        return reply.value;
      case 'error':
        throw new CommandError(reply.message, { operation: name, monitor: this.monitor, argument });
      case 'unrecognized':
        throw new UnrecognizedReplyError(reply.raw, { operation: name, monitor: this.monitor, argument });
    }
  }
}
