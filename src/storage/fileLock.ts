import fs from 'fs';
import { setTimeout as delay } from 'timers/promises';

export interface FileLockOptions {
  retryMs: number;
  timeoutMs: number;
  /** A lock file older than this was left by a crashed process and is taken over. */
  staleMs: number;
}

const DEFAULT_OPTIONS: FileLockOptions = {
  retryMs: 25,
  timeoutMs: 10_000,
  staleMs: 30_000,
};

function hasCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * Advisory lock shared by every process that opens the same database file.
 * Held by whoever managed to create `lockPath` exclusively.
 */
export class FileLock {
  private readonly options: FileLockOptions;

  constructor(
    private readonly lockPath: string,
    options: Partial<FileLockOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async withLock<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      await fs.promises.rm(this.lockPath, { force: true });
    }
  }

  private async acquire(): Promise<void> {
    const deadline = Date.now() + this.options.timeoutMs;

    for (;;) {
      try {
        const handle = await fs.promises.open(this.lockPath, 'wx');
        try {
          await handle.writeFile(String(process.pid));
        } finally {
          await handle.close();
        }
        return;
      } catch (error) {
        if (!hasCode(error, 'EEXIST')) throw error;
      }

      if (await this.isStale()) {
        await fs.promises.rm(this.lockPath, { force: true });
        continue;
      }
      if (Date.now() >= deadline) {
        throw new Error(`Timed out waiting for lock ${this.lockPath}`);
      }
      await delay(this.options.retryMs);
    }
  }

  private async isStale(): Promise<boolean> {
    try {
      const stat = await fs.promises.stat(this.lockPath);
      return Date.now() - stat.mtimeMs > this.options.staleMs;
    } catch (error) {
      // Released between our open and stat; just retry.
      if (hasCode(error, 'ENOENT')) return false;
      throw error;
    }
  }
}
