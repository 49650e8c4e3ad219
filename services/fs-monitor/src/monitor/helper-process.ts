/**
 * Helper Process
 *
 * Spawns the helper subprocess and exposes its stdin/stdout as the duplex
 * frame stream. stderr is forwarded line by line to the logger. Termination
 * closes stdin, sends SIGTERM, and escalates to SIGKILL after a grace period.
 */

import { spawn } from 'child_process';
import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';
import { config } from '../config.js';
import { log } from '../utils/logger.js';

export interface HelperExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned at all */
  error?: Error;
}

/**
 * The duplex byte stream to one helper plus its exit signal. Monitors only
 * talk to helpers through this interface.
 */
export interface HelperTransport {
  /** host → helper */
  readonly input: Writable;
  /** helper → host */
  readonly output: Readable;
  /** Settles once when the helper is gone; never rejects */
  readonly exited: Promise<HelperExitStatus>;
  /** Close the stream and stop the helper. Resolves with its exit status. */
  terminate(): Promise<HelperExitStatus>;
}

export type HelperSpawner = (monitor: string) => HelperTransport;

export interface HelperProcessConfig {
  command: string;
  args: string[];
  killGraceMs: number;
  cwd?: string;
  env?: Record<string, string>;
}

export function spawnHelper(
  monitor: string,
  overrides: Partial<HelperProcessConfig> = {}
): HelperTransport {
  const options: HelperProcessConfig = {
    command: config.helper.command,
    args: config.helper.args,
    killGraceMs: config.helper.killGraceMs,
    ...overrides,
  };
  const logger = log.child({ service: 'HelperProcess', monitor });

  logger.info('Spawning helper', { command: options.command, args: options.args });

  const child = spawn(options.command, options.args, {
    cwd: options.cwd,
    env: {
      ...process.env,
      ...options.env,
      FS_MONITOR_LOG_STDERR: 'true',
    },
    stdio: ['pipe', 'pipe', 'pipe'],
  });

  const exited = new Promise<HelperExitStatus>((resolve) => {
    child.once('exit', (code, signal) => {
      logger.info('Helper exited', { code, signal, pid: child.pid });
      resolve({ code, signal });
    });
    child.once('error', (error) => {
      logger.error('Helper process error', error);
      resolve({ code: null, signal: null, error });
    });
  });

  // A helper that dies mid-write surfaces as EPIPE here; the exit path handles it
  child.stdin.on('error', (error: Error) => {
    logger.debug('Helper stdin error', { error: error.message });
  });

  createInterface({ input: child.stderr }).on('line', (line) => {
    logger.debug(line, { source: 'helper-stderr' });
  });

  let terminating: Promise<HelperExitStatus> | null = null;

  const terminate = (): Promise<HelperExitStatus> => {
    if (!terminating) {
      terminating = (async () => {
        if (!child.stdin.writableEnded) {
          child.stdin.end();
        }

        if (child.exitCode === null && child.signalCode === null) {
          child.kill('SIGTERM');
        }

        const escalation = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            logger.warn('Helper ignored SIGTERM, sending SIGKILL', { killGraceMs: options.killGraceMs });
            child.kill('SIGKILL');
          }
        }, options.killGraceMs);
        escalation.unref();

        try {
          return await exited;
        } finally {
          clearTimeout(escalation);
        }
      })();
    }
    return terminating;
  };

  return {
    input: child.stdin,
    output: child.stdout,
    exited,
    terminate,
  };
}
