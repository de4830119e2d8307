import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic } from 'sql.js';
import fs from 'fs';
import path from 'path';
import { FileLock } from './fileLock.js';

/**
 * Minimal interface the credential, tenant-state and lease stores are written
 * against. Values are JSON documents.
 */
export interface KeyValueStore {
  get(namespace: string, key: string): Promise<unknown>;
  put(namespace: string, key: string, value: unknown): Promise<void>;
  delete(namespace: string, key: string): Promise<void>;
  list(namespace: string): Promise<Array<{ key: string; value: unknown }>>;
  /**
   * Atomic read-modify-write of one entry. `change` gets the current value
   * (undefined when absent); returning undefined deletes the entry. Resolves
   * to what was stored.
   */
  update(namespace: string, key: string, change: (current: unknown) => unknown): Promise<unknown>;
}

/** Serializes async critical sections in call order. */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

interface BackingFile {
  path: string;
  lock: FileLock;
}

function createDatabase(SQL: SqlJsStatic, data?: Uint8Array): Database {
  const database = new SQL.Database(data);
  database.run(`
    CREATE TABLE IF NOT EXISTS kv (
      namespace TEXT NOT NULL,
      key TEXT NOT NULL,
      value TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (namespace, key)
    )
  `);
  return database;
}

/**
 * sql.js keeps the whole database in memory, so a file shared by several
 * processes (the long-running `serve` and one-shot CLI commands) is reloaded
 * before every operation and written back after every change, all under a
 * lock file next to it.
 */
export class SqlKeyValueStore implements KeyValueStore {
  private readonly queue = new WriteLock();

  private constructor(
    private readonly SQL: SqlJsStatic,
    private database: Database,
    private readonly file: BackingFile | null
  ) {}

  /**
   * Opens (or creates) the database file. With `filePath` null the database
   * lives only in memory.
   */
  static async open(filePath: string | null): Promise<SqlKeyValueStore> {
    const SQL = await initSqlJs();
    if (!filePath) {
      return new SqlKeyValueStore(SQL, createDatabase(SQL), null);
    }

    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    const store = new SqlKeyValueStore(SQL, createDatabase(SQL), {
      path: filePath,
      lock: new FileLock(`${filePath}.lock`),
    });
    await store.transact(true, () => undefined);
    return store;
  }

  get(namespace: string, key: string): Promise<unknown> {
    return this.transact(false, () => this.read(namespace, key));
  }

  list(namespace: string): Promise<Array<{ key: string; value: unknown }>> {
    return this.transact(false, () => {
      const result = this.database.exec('SELECT key, value FROM kv WHERE namespace = ? ORDER BY key ASC', [
        namespace,
      ]);
      if (result.length === 0) return [];

      const entries: Array<{ key: string; value: unknown }> = [];
      for (const [key, value] of result[0].values) {
        if (typeof key === 'string' && typeof value === 'string') {
          entries.push({ key, value: JSON.parse(value) });
        }
      }
      return entries;
    });
  }

  put(namespace: string, key: string, value: unknown): Promise<void> {
    return this.transact(true, () => this.write(namespace, key, value));
  }

  delete(namespace: string, key: string): Promise<void> {
    return this.transact(true, () => this.write(namespace, key, undefined));
  }

  update(namespace: string, key: string, change: (current: unknown) => unknown): Promise<unknown> {
    return this.transact(true, () => {
      const next = change(this.read(namespace, key));
      this.write(namespace, key, next);
      return next;
    });
  }

  close(): Promise<void> {
    return this.queue.run(() => this.database.close());
  }

  private read(namespace: string, key: string): unknown {
    const result = this.database.exec('SELECT value FROM kv WHERE namespace = ? AND key = ?', [namespace, key]);
    const cell = result[0]?.values[0]?.[0];
    return typeof cell === 'string' ? JSON.parse(cell) : undefined;
  }

  private write(namespace: string, key: string, value: unknown): void {
    if (value === undefined) {
      this.database.run('DELETE FROM kv WHERE namespace = ? AND key = ?', [namespace, key]);
      return;
    }
    this.database.run(
      `INSERT INTO kv (namespace, key, value, updated_at) VALUES (?, ?, ?, ?)
       ON CONFLICT (namespace, key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
      [namespace, key, JSON.stringify(value), new Date().toISOString()]
    );
  }

  private transact<T>(write: boolean, task: () => T): Promise<T> {
    return this.queue.run(async () => {
      const file = this.file;
      if (!file) return task();

      return file.lock.withLock(async () => {
        this.reload(file.path);
        const result = task();
        if (write) await this.persist(file.path);
        return result;
      });
    });
  }

  private reload(filePath: string): void {
    if (!fs.existsSync(filePath)) return;
    const next = createDatabase(this.SQL, fs.readFileSync(filePath));
    this.database.close();
    this.database = next;
  }

  // Whole-file replace through a temp file so a reader never sees a torn database.
  private async persist(filePath: string): Promise<void> {
    const tempPath = `${filePath}.tmp`;
    await fs.promises.writeFile(tempPath, Buffer.from(this.database.export()));
    await fs.promises.rename(tempPath, filePath);
  }
}
