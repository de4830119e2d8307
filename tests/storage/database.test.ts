import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { SqlKeyValueStore, WriteLock } from '../../src/storage/database.js';

describe('WriteLock', () => {
  it('runs tasks one after another in call order', async () => {
    const lock = new WriteLock();
    const order: string[] = [];

    const slow = lock.run(async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push('slow');
    });
    const fast = lock.run(() => {
      order.push('fast');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['slow', 'fast']);
  });

  it('keeps running after a task fails', async () => {
    const lock = new WriteLock();
    await expect(lock.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(lock.run(() => 'next')).resolves.toBe('next');
  });
});

describe('SqlKeyValueStore', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('stores JSON values per namespace', async () => {
    const store = await SqlKeyValueStore.open(null);

    await store.put('a', 'k1', { n: 1 });
    await store.put('b', 'k1', ['x']);
    await store.put('a', 'k1', { n: 2 });

    expect(await store.get('a', 'k1')).toEqual({ n: 2 });
    expect(await store.get('b', 'k1')).toEqual(['x']);
    expect(await store.get('a', 'missing')).toBeUndefined();
    await store.close();
  });

  it('lists a namespace in key order and deletes entries', async () => {
    const store = await SqlKeyValueStore.open(null);
    await store.put('ns', 'b', 2);
    await store.put('ns', 'a', 1);
    await store.put('other', 'c', 3);

    expect(await store.list('ns')).toEqual([
      { key: 'a', value: 1 },
      { key: 'b', value: 2 },
    ]);

    await store.delete('ns', 'a');
    expect(await store.list('ns')).toEqual([{ key: 'b', value: 2 }]);
    expect(await store.list('empty')).toEqual([]);
    await store.close();
  });

  it('keeps every concurrent write', async () => {
    const store = await SqlKeyValueStore.open(null);
    await Promise.all(Array.from({ length: 10 }, (_, i) => store.put('ns', `tenant-${i}`, { i })));
    expect(await store.list('ns')).toHaveLength(10);
    await store.close();
  });

  it('survives a reopen from disk', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'deadline-sync-'));
    dirs.push(dir);
    const file = path.join(dir, 'nested', 'state.db');

    const first = await SqlKeyValueStore.open(file);
    await first.put('tenant_state', 'tenant-1', { autoSync: true });
    await first.close();

    expect(fs.existsSync(file)).toBe(true);
    expect(fs.existsSync(`${file}.tmp`)).toBe(false);

    const second = await SqlKeyValueStore.open(file);
    expect(await second.get('tenant_state', 'tenant-1')).toEqual({ autoSync: true });
    await second.close();
  });

  it('applies update as one read-modify-write', async () => {
    const store = await SqlKeyValueStore.open(null);

    const stored = await store.update('ns', 'count', (current) => (typeof current === 'number' ? current + 1 : 1));
    expect(stored).toBe(1);
    await Promise.all(
      Array.from({ length: 5 }, () => store.update('ns', 'count', (current) => (typeof current === 'number' ? current + 1 : 1)))
    );
    expect(await store.get('ns', 'count')).toBe(6);

    await store.update('ns', 'count', () => undefined);
    expect(await store.get('ns', 'count')).toBeUndefined();
    await store.close();
  });

  describe('two stores on one file', () => {
    async function openPair(): Promise<[SqlKeyValueStore, SqlKeyValueStore, string]> {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'deadline-sync-'));
      dirs.push(dir);
      const file = path.join(dir, 'state.db');
      return [await SqlKeyValueStore.open(file), await SqlKeyValueStore.open(file), file];
    }

    it('keeps writes from both', async () => {
      const [a, b] = await openPair();

      await a.put('tenant_state', 't1', { autoSync: true });
      await a.put('tenant_state', 't2', { autoSync: true });
      await b.put('tenant_state', 't3', { autoSync: false });

      expect(await a.list('tenant_state')).toEqual([
        { key: 't1', value: { autoSync: true } },
        { key: 't2', value: { autoSync: true } },
        { key: 't3', value: { autoSync: false } },
      ]);
      await a.close();
      await b.close();
    });

    it('sees a delete made by the other store', async () => {
      const [a, b] = await openPair();

      await a.put('tenant_state', 't1', { autoSync: true });
      expect(await b.get('tenant_state', 't1')).toEqual({ autoSync: true });

      await b.delete('tenant_state', 't1');
      expect(await a.get('tenant_state', 't1')).toBeUndefined();
      await a.close();
      await b.close();
    });

    it('never loses an interleaved update', async () => {
      const [a, b, file] = await openPair();
      const increment = (current: unknown) => (typeof current === 'number' ? current + 1 : 1);

      await Promise.all([
        ...Array.from({ length: 5 }, () => a.update('ns', 'count', increment)),
        ...Array.from({ length: 5 }, () => b.update('ns', 'count', increment)),
      ]);

      expect(await a.get('ns', 'count')).toBe(10);
      expect(fs.existsSync(`${file}.lock`)).toBe(false);
      await a.close();
      await b.close();
    });
  });
});
