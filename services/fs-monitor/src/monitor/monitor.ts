/**
 * Monitor - one helper connection and its watch set
 *
 * Lifecycle:
 *   starting → running → stopping → stopped
 *
 * - starting: spawn the helper, start the read loop, apply the initial
 *   watches in order. Any failure tears the helper down and rejects start().
 * - running: commands and broadcasts flow.
 * - stopping: pending commands fail, current subscribers receive one stop
 *   message, then the stream closes and the helper is terminated.
 * - stopped: terminal.
 *
 * An explicit stop() and an unexpected helper exit take the same path;
 * whichever comes first wins and later triggers are no-ops.
 */

import { EventEmitter } from 'events';
import { FrameReader } from '../protocol/frame-codec.js';
import { log, type Logger } from '../utils/logger.js';
import {
  handleError,
  HelperExitError,
  MonitorError,
  MonitorStartupError,
  MonitorStoppedError,
} from '../utils/errors.js';
import { BroadcastDispatcher } from '../subscribers/broadcast-dispatcher.js';
import { getSubscriberDirectory, type SubscriberDirectory } from '../subscribers/subscriber-directory.js';
import { CorrelationMultiplexer, type ReadLoopOutcome } from './correlation-multiplexer.js';
import { spawnHelper, type HelperExitStatus, type HelperSpawner, type HelperTransport } from './helper-process.js';
import { WatchCommands } from './watch-commands.js';

export type MonitorState = 'starting' | 'running' | 'stopping' | 'stopped';

export interface MonitorOptions {
  name: string;
  /** Initial watch set; failure to add any of them is fatal to startup */
  watches?: string[];
  spawnHelper?: HelperSpawner;
  /** Per-command deadline (default: config.commandTimeoutMs) */
  timeoutMs?: number;
  directory?: SubscriberDirectory;
}

export interface MonitorStats {
  name: string;
  state: MonitorState;
  pendingCommands: number;
  subscribers: number;
  startedAt: string;
  stoppedAt?: string;
  stopReason?: string;
}

export class Monitor extends EventEmitter {
  readonly name: string;
  private state: MonitorState = 'starting';
  private readonly logger: Logger;
  private readonly directory: SubscriberDirectory;
  private readonly dispatcher: BroadcastDispatcher;
  private readonly transport: HelperTransport;
  private readonly multiplexer: CorrelationMultiplexer;
  private readonly commands: WatchCommands;
  private readonly startedAt = new Date();
  private stoppedAt: Date | null = null;
  private stopReason: MonitorError | null = null;
  private stopping: Promise<void> | null = null;

  /**
   * Start a monitor and apply its initial watches. Rejects with
   * MonitorStartupError if the helper cannot be reached or any watch fails.
   */
  static async start(options: MonitorOptions): Promise<Monitor> {
    const monitor = new Monitor(options);
    await monitor.applyInitialWatches(options.watches ?? []);
    return monitor;
  }

  private constructor(options: MonitorOptions) {
    super();
    this.name = options.name;
    this.logger = log.child({ service: 'Monitor', monitor: options.name });
    this.directory = options.directory ?? getSubscriberDirectory();
    this.dispatcher = new BroadcastDispatcher(options.name, this.directory);

    const spawner = options.spawnHelper ?? ((name: string) => spawnHelper(name));
    this.transport = spawner(options.name);

    this.multiplexer = new CorrelationMultiplexer(
      this.transport.input,
      new FrameReader(this.transport.output),
      {
        monitor: options.name,
        timeoutMs: options.timeoutMs,
        onBroadcast: (payload) => {
          // Nothing follows the stop message
          if (this.state === 'starting' || this.state === 'running') {
            this.dispatcher.dispatchPayload(payload);
          }
        },
      }
    );
    this.commands = new WatchCommands(this.multiplexer, options.name);

    this.multiplexer
      .start()
      .then((outcome) => this.handleReadLoopEnd(outcome))
      .catch((error: unknown) => {
        this.logger.error('Read loop handler failed', handleError(error, 'readLoop'));
      });

    this.transport.exited
      .then((status) => this.handleHelperExit(status))
      .catch((error: unknown) => {
        this.logger.error('Helper exit handler failed', handleError(error, 'helperExit'));
      });
  }

  private async applyInitialWatches(watches: string[]): Promise<void> {
    this.logger.info('Starting monitor', { watches });

    for (const watch of watches) {
      try {
        await this.commands.addWatch(watch);
      } catch (error) {
        const cause = handleError(error, 'add_watch');
        this.logger.error('Initial watch failed, aborting startup', cause, { path: watch });
        await this.shutdown(cause);
        throw new MonitorStartupError(this.name, `add_watch ${watch}: ${cause.message}`, {
          operation: 'start',
          path: watch,
          cause: cause.code,
        });
      }
    }

    if (this.state !== 'starting') {
      const reason = this.stopReason?.message ?? 'helper went away during startup';
      throw new MonitorStartupError(this.name, reason, { operation: 'start' });
    }

    this.state = 'running';
    this.logger.info('Monitor running', { watches: watches.length });
    this.emit('running');
  }

  async addWatch(path: string): Promise<void> {
    this.assertRunning('add_watch');
    await this.commands.addWatch(path);
  }

  async remove(path: string): Promise<void> {
    this.assertRunning('remove');
    await this.commands.remove(path);
  }

  async watchList(): Promise<string[]> {
    this.assertRunning('watch_list');
    return this.commands.watchList();
  }

  /**
   * Stop the monitor. Safe to call any number of times; every call resolves
   * once the monitor is stopped.
   */
  stop(): Promise<void> {
    return this.shutdown(null);
  }

  getState(): MonitorState {
    return this.state;
  }

  getStats(): MonitorStats {
    return {
      name: this.name,
      state: this.state,
      pendingCommands: this.multiplexer.pendingCount,
      subscribers: this.directory.members(this.name).length,
      startedAt: this.startedAt.toISOString(),
      stoppedAt: this.stoppedAt?.toISOString(),
      stopReason: this.stopReason?.message,
    };
  }

  private assertRunning(operation: string): void {
    if (this.state !== 'running') {
      throw new MonitorStoppedError(this.name, { operation, state: this.state });
    }
  }

  private handleReadLoopEnd(outcome: ReadLoopOutcome): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }

    if (outcome.reason === 'eof') {
      this.logger.warn('Helper closed its output unexpectedly');
      return this.shutdown(new HelperExitError('Helper closed its output', null, null, {
        operation: 'readLoop',
        monitor: this.name,
      }));
    }

    this.logger.error('Connection failed', outcome.error);
    return this.shutdown(outcome.error);
  }

  private handleHelperExit(status: HelperExitStatus): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }

    const description = status.error
      ? `Helper failed: ${status.error.message}`
      : `Helper exited with code ${status.code ?? 'null'}${status.signal ? ` (${status.signal})` : ''}`;
    this.logger.warn(description);

    return this.shutdown(new HelperExitError(description, status.code, status.signal, {
      operation: 'helperExit',
      monitor: this.name,
    }));
  }

  private shutdown(reason: MonitorError | null): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.teardown(reason);
    }
    return this.stopping;
  }

  private async teardown(reason: MonitorError | null): Promise<void> {
    const wasRunning = this.state === 'running';
    this.state = 'stopping';
    this.stopReason = reason;
    this.emit('stopping', reason);

    this.logger.info('Stopping monitor', { reason: reason?.message ?? 'requested' });

    this.multiplexer.close(reason ?? new MonitorStoppedError(this.name, { operation: 'stop' }));

    // Must precede terminate(): the name can be restarted once this monitor
    // leaves the registry. A monitor that never ran announces nothing.
    if (wasRunning) {
      this.dispatcher.dispatchStop();
    }

    const status = await this.transport.terminate();
    this.logger.debug('Helper terminated', { code: status.code, signal: status.signal });

    this.state = 'stopped';
    this.stoppedAt = new Date();
    this.logger.info('Monitor stopped');
    this.emit('stopped', reason);
  }
}
