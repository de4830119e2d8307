import { beforeEach, describe, expect, it } from 'vitest';
import { SqlKeyValueStore } from '../../src/storage/database.js';
import { SyncLeaseStore } from '../../src/storage/leases.js';
import { createSilentLogger } from '../../src/utils/logger.js';

const TTL = 60_000;

describe('SyncLeaseStore', () => {
  let kv: SqlKeyValueStore;
  let now: number;
  let leases: SyncLeaseStore;

  beforeEach(async () => {
    kv = await SqlKeyValueStore.open(null);
    now = Date.UTC(2024, 4, 1);
    leases = new SyncLeaseStore(kv, createSilentLogger(), () => now);
  });

  it('gives the lease to one owner at a time', async () => {
    expect(await leases.acquire('tenant-1', 'serve', TTL)).toBe(true);
    expect(await leases.acquire('tenant-1', 'cli', TTL)).toBe(false);
    expect(await leases.acquire('tenant-2', 'cli', TTL)).toBe(true);
  });

  it('lets the holder renew its own lease', async () => {
    await leases.acquire('tenant-1', 'serve', TTL);
    now += TTL / 2;

    expect(await leases.acquire('tenant-1', 'serve', TTL)).toBe(true);
    expect(await kv.get('sync_leases', 'tenant-1')).toEqual({ owner: 'serve', expiresAt: now + TTL });
  });

  it('frees the lease on release', async () => {
    await leases.acquire('tenant-1', 'serve', TTL);
    await leases.release('tenant-1', 'serve');

    expect(await kv.get('sync_leases', 'tenant-1')).toBeUndefined();
    expect(await leases.acquire('tenant-1', 'cli', TTL)).toBe(true);
  });

  it('leaves a lease held by someone else in place on release', async () => {
    await leases.acquire('tenant-1', 'serve', TTL);
    await leases.release('tenant-1', 'cli');

    expect(await leases.acquire('tenant-1', 'cli', TTL)).toBe(false);
  });

  it('hands over an expired lease', async () => {
    await leases.acquire('tenant-1', 'crashed', TTL);
    now += TTL + 1;

    expect(await leases.acquire('tenant-1', 'cli', TTL)).toBe(true);
  });

  it('overwrites a malformed lease record', async () => {
    await kv.put('sync_leases', 'tenant-1', 'garbage');
    expect(await leases.acquire('tenant-1', 'cli', TTL)).toBe(true);
  });
});
