import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/utils/config.js';

describe('loadConfig', () => {
  it('fills in defaults', () => {
    const config = loadConfig({ DATA_DIR: '/tmp/deadline-sync' });

    expect(config.google).toEqual({
      clientId: undefined,
      clientSecret: undefined,
      redirectUri: 'urn:ietf:wg:oauth:2.0:oob',
      calendarId: 'primary',
    });
    expect(config.sync).toEqual({
      intervalMs: 10_800_000,
      initialDelayMs: 10_000,
      requestTimeoutMs: 30_000,
      watchIntervalMs: 15_000,
      leaseMs: 900_000,
      lookaroundDays: 90,
      utcOffsetMinutes: 210,
      timeZone: 'Asia/Tehran',
    });
    expect(config.server.port).toBe(8080);
    expect(config.log).toEqual({ level: 'info', toFile: true });
    expect(config.paths.database).toBe(path.join('/tmp/deadline-sync', 'state.db'));
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      DATA_DIR: '/tmp/deadline-sync',
      GOOGLE_CLIENT_ID: 'test-client',
      GOOGLE_CLIENT_SECRET: 'test-secret',
      SYNC_INTERVAL_MS: '60000',
      PORT: '3000',
      LOG_LEVEL: 'debug',
      LOG_TO_FILE: 'false',
    });

    expect(config.google.clientId).toBe('test-client');
    expect(config.google.clientSecret).toBe('test-secret');
    expect(config.sync.intervalMs).toBe(60_000);
    expect(config.server.port).toBe(3000);
    expect(config.log).toEqual({ level: 'debug', toFile: false });
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ DATA_DIR: '/tmp/deadline-sync', GOOGLE_CLIENT_ID: '  ', SYNC_LEASE_MS: '', PORT: ' ' });

    expect(config.google.clientId).toBeUndefined();
    expect(config.sync.leaseMs).toBe(900_000);
    expect(config.server.port).toBe(8080);
  });

  it('trims text settings', () => {
    const config = loadConfig({ DATA_DIR: '/tmp/deadline-sync', GOOGLE_CALENDAR_ID: '  team@example.test ' });

    expect(config.google.calendarId).toBe('team@example.test');
  });

  it('rejects a malformed number', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid configuration: PORT: /);
  });

  it('rejects a negative interval', () => {
    expect(() => loadConfig({ SYNC_INTERVAL_MS: '-5' })).toThrow(/^Invalid configuration: SYNC_INTERVAL_MS: /);
  });

  it('lists every invalid setting', () => {
    expect(() => loadConfig({ PORT: 'eighty', SYNC_WATCH_INTERVAL_MS: '1.5' })).toThrow(
      /SYNC_WATCH_INTERVAL_MS: .*; PORT: /
    );
  });
});
