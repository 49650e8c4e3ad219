/**
 * FS Monitor
 *
 * Named filesystem monitors backed by a helper subprocess. Commands
 * (addWatch / remove / watchList) are answered synchronously by the helper;
 * change events and watcher errors are fanned out to every subscriber of the
 * monitor's name.
 *
 * ```ts
 * const inbox = subscribe('workspace');
 * await startMonitor({ name: 'workspace', watches: ['/srv/data'] });
 *
 * for await (const message of inbox) {
 *   if (message.type === 'event') console.log(message.path, [...message.ops]);
 *   if (message.type === 'stop') break;
 * }
 * ```
 *
 * Subscriptions belong to the name, not to a monitor instance: subscribers
 * of a stopped monitor hear from the next monitor started under that name.
 */

import { getMonitorRegistry, type StartMonitorOptions } from './monitor/monitor-registry.js';
import type { Monitor, MonitorStats } from './monitor/monitor.js';
import { Subscriber } from './subscribers/subscriber.js';
import { getSubscriberDirectory } from './subscribers/subscriber-directory.js';

/**
 * Start a monitor. Rejects with MonitorAlreadyRunningError when the name is
 * taken and MonitorStartupError when any initial watch fails.
 */
export async function startMonitor(options: StartMonitorOptions): Promise<Monitor> {
  return getMonitorRegistry().start(options);
}

/**
 * Registers a path to be watched by the monitor.
 */
export async function addWatch(name: string, path: string): Promise<void> {
  return getMonitorRegistry().get(name).addWatch(path);
}

/**
 * Removes a path that was previously registered to be watched by the monitor.
 */
export async function remove(name: string, path: string): Promise<void> {
  return getMonitorRegistry().get(name).remove(path);
}

/**
 * Returns, in no particular order, all paths watched by the monitor.
 */
export async function watchList(name: string): Promise<string[]> {
  return getMonitorRegistry().get(name).watchList();
}

/**
 * Stops the monitor in the background. Subscribers receive a `stop` message.
 */
export function stop(name: string): void {
  getMonitorRegistry().stop(name);
}

/**
 * Subscribes to messages from the monitor called `name`. Pass an existing
 * subscriber to follow several monitors with one inbox. Subscribing twice has
 * no effect.
 */
export function subscribe(name: string, subscriber: Subscriber = new Subscriber()): Subscriber {
  getSubscriberDirectory().subscribe(name, subscriber);
  return subscriber;
}

export function unsubscribe(name: string, subscriber: Subscriber): void {
  getSubscriberDirectory().unsubscribe(name, subscriber);
}

export function getMonitorStats(name: string): MonitorStats {
  return getMonitorRegistry().getStats(name);
}

export { Monitor } from './monitor/monitor.js';
export type { MonitorOptions, MonitorState, MonitorStats } from './monitor/monitor.js';
export {
  MonitorRegistry,
  getMonitorRegistry,
  clearMonitorRegistry,
} from './monitor/monitor-registry.js';
export type { MonitorRegistryOptions, StartMonitorOptions } from './monitor/monitor-registry.js';
export { spawnHelper } from './monitor/helper-process.js';
export type { HelperExitStatus, HelperSpawner, HelperTransport } from './monitor/helper-process.js';
export { Subscriber } from './subscribers/subscriber.js';
export type { MessageListener, MonitorMessage, SubscriberOptions } from './subscribers/subscriber.js';
export {
  SubscriberDirectory,
  getSubscriberDirectory,
  clearSubscriberDirectory,
} from './subscribers/subscriber-directory.js';
export { decodeOps, encodeOps, WATCH_OPS } from './protocol/op-flags.js';
export type { WatchOp } from './protocol/op-flags.js';
export * from './utils/errors.js';
