import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.nodeEnv).toBe('development');
    expect(config.logLevel).toBe('info');
    expect(config.logToStderr).toBe(false);
    expect(config.commandTimeoutMs).toBe(1000);
    expect(config.mailboxCapacity).toBe(1024);
    expect(config.helper.command).toBe(process.execPath);
    expect(config.helper.args).toHaveLength(1);
    expect(config.helper.args[0]).toMatch(/helper[\\/]main\.js$/);
    expect(config.helper.killGraceMs).toBe(2000);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
      FS_MONITOR_LOG_STDERR: 'true',
      FS_MONITOR_COMMAND_TIMEOUT_MS: '250',
      FS_MONITOR_MAILBOX_CAPACITY: '16',
      FS_MONITOR_HELPER_COMMAND: '/usr/local/bin/fs-helper',
      FS_MONITOR_HELPER_ARGS: '--quiet,--depth=0',
      FS_MONITOR_KILL_GRACE_MS: '0',
    });

    expect(config.nodeEnv).toBe('production');
    expect(config.logLevel).toBe('debug');
    expect(config.logToStderr).toBe(true);
    expect(config.commandTimeoutMs).toBe(250);
    expect(config.mailboxCapacity).toBe(16);
    expect(config.helper).toEqual({
      command: '/usr/local/bin/fs-helper',
      args: ['--quiet', '--depth=0'],
      killGraceMs: 0,
    });
  });

  it('allows an empty helper argument list', () => {
    expect(loadConfig({ FS_MONITOR_HELPER_ARGS: '' }).helper.args).toEqual([]);
  });

  it('rejects values it cannot use', () => {
    expect(() => loadConfig({ FS_MONITOR_COMMAND_TIMEOUT_MS: 'soon' })).toThrow();
    expect(() => loadConfig({ FS_MONITOR_MAILBOX_CAPACITY: '0' })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow();
  });
});
