/**
 * Monitor Registry
 *
 * Process-wide table of live monitors by name. A name is taken from the
 * moment its monitor starts until it begins stopping, so commands issued
 * after stop() fail with MonitorNotFoundError.
 */

import { z } from 'zod';
import { log, type Logger } from '../utils/logger.js';
import {
  MonitorAlreadyRunningError,
  MonitorNotFoundError,
  MonitorStartupError,
  ValidationError,
} from '../utils/errors.js';
import type { SubscriberDirectory } from '../subscribers/subscriber-directory.js';
import type { HelperSpawner } from './helper-process.js';
import { Monitor, type MonitorStats } from './monitor.js';

const StartOptionsSchema = z.object({
  name: z.string().min(1),
  watches: z.array(z.string().min(1)).default([]),
});

export type StartMonitorOptions = z.input<typeof StartOptionsSchema>;

export interface MonitorRegistryOptions {
  spawnHelper?: HelperSpawner;
  timeoutMs?: number;
  directory?: SubscriberDirectory;
}

export class MonitorRegistry {
  private readonly monitors: Map<string, Monitor> = new Map();
  private readonly starting: Set<string> = new Set();
  private readonly options: MonitorRegistryOptions;
  private readonly logger: Logger;

  constructor(options: MonitorRegistryOptions = {}) {
    this.options = options;
    this.logger = log.child({ service: 'MonitorRegistry' });
  }

  async start(options: StartMonitorOptions): Promise<Monitor> {
    const parsed = StartOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ValidationError(`Invalid monitor options: ${parsed.error.message}`, {
        operation: 'startMonitor',
        issues: parsed.error.issues,
      });
    }

    const { name, watches } = parsed.data;
    if (this.monitors.has(name) || this.starting.has(name)) {
      throw new MonitorAlreadyRunningError(name, { operation: 'startMonitor' });
    }

    this.starting.add(name);
    try {
      const monitor = await Monitor.start({
        name,
        watches,
        spawnHelper: this.options.spawnHelper,
        timeoutMs: this.options.timeoutMs,
        directory: this.options.directory,
      });

      if (monitor.getState() !== 'running') {
        // Went down between its last startup command and registration
        throw new MonitorStartupError(name, 'helper went away during startup', { operation: 'startMonitor' });
      }

      this.monitors.set(name, monitor);
      monitor.once('stopping', () => {
        if (this.monitors.get(name) === monitor) {
          this.monitors.delete(name);
        }
      });
      return monitor;
    } finally {
      this.starting.delete(name);
    }
  }

  /** The running monitor under `name`; throws MonitorNotFoundError otherwise. */
  get(name: string): Monitor {
    const monitor = this.monitors.get(name);
    if (!monitor) {
      throw new MonitorNotFoundError(name, { operation: 'lookup' });
    }
    return monitor;
  }

  has(name: string): boolean {
    return this.monitors.has(name);
  }

  names(): string[] {
    return [...this.monitors.keys()];
  }

  /**
   * Stop the monitor under `name` in the background. Unknown names are ignored.
   */
  stop(name: string): void {
    const monitor = this.monitors.get(name);
    if (!monitor) {
      return;
    }
    this.monitors.delete(name);
    monitor.stop().catch((error: unknown) => {
      this.logger.error('Monitor failed to stop', error instanceof Error ? error : undefined, { monitor: name });
    });
  }

  /** Stop `name` and wait for it. Resolves immediately for unknown names. */
  async stopAndWait(name: string): Promise<void> {
    const monitor = this.monitors.get(name);
    if (!monitor) {
      return;
    }
    this.monitors.delete(name);
    await monitor.stop();
  }

  async stopAll(): Promise<void> {
    await Promise.all(this.names().map((name) => this.stopAndWait(name)));
  }

  getStats(name: string): MonitorStats {
    return this.get(name).getStats();
  }
}

// ============================================================================
// Singleton Instance
// ============================================================================

let registryInstance: MonitorRegistry | null = null;

/**
 * Get or create the process-wide MonitorRegistry
 */
export function getMonitorRegistry(options?: MonitorRegistryOptions): MonitorRegistry {
  if (!registryInstance) {
    registryInstance = new MonitorRegistry(options);
  }
  return registryInstance;
}

/**
 * Stop every monitor and drop the process-wide registry (for testing)
 */
export async function clearMonitorRegistry(): Promise<void> {
  if (registryInstance) {
    const registry = registryInstance;
    registryInstance = null;
    await registry.stopAll();
  }
}
