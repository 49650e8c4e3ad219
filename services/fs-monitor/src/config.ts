/**
 * FS Monitor - Configuration
 *
 * Centralized configuration management with environment variable support
 */

import { fileURLToPath } from 'url';
import { z } from 'zod';

const DEFAULT_HELPER_ENTRY = fileURLToPath(new URL('./helper/main.js', import.meta.url));

const ConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  // The helper subprocess owns stdout for frames, so it logs to stderr only
  logToStderr: z.boolean().default(false),
  serviceName: z.string().default('fs-monitor'),
  version: z.string().default('1.0.0'),

  // Per-deployment deadline for a single helper command
  commandTimeoutMs: z.number().int().positive().default(1000),

  // Bound of each subscriber's mailbox
  mailboxCapacity: z.number().int().positive().default(1024),

  helper: z.object({
    command: z.string().min(1),
    args: z.array(z.string()),
    killGraceMs: z.number().int().nonnegative().default(2000),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  return Number(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const helperArgs = env.FS_MONITOR_HELPER_ARGS;

  const rawConfig = {
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    logToStderr: env.FS_MONITOR_LOG_STDERR === 'true',
    serviceName: env.FS_MONITOR_SERVICE_NAME || 'fs-monitor',
    version: env.FS_MONITOR_VERSION || '1.0.0',

    commandTimeoutMs: parseInteger(env.FS_MONITOR_COMMAND_TIMEOUT_MS, 1000),
    mailboxCapacity: parseInteger(env.FS_MONITOR_MAILBOX_CAPACITY, 1024),

    helper: {
      command: env.FS_MONITOR_HELPER_COMMAND || process.execPath,
      args: helperArgs !== undefined
        ? helperArgs.split(',').filter((arg) => arg.length > 0)
        : [DEFAULT_HELPER_ENTRY],
      killGraceMs: parseInteger(env.FS_MONITOR_KILL_GRACE_MS, 2000),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

export const config = loadConfig();
