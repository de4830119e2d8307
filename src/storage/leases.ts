import { Logger } from '../utils/logger.js';
import { KeyValueStore } from './database.js';
import { SyncLeaseSchema } from './schemas.js';

const NAMESPACE = 'sync_leases';

/**
 * Time-limited claim on a tenant's sync, shared through the store file so a
 * CLI run and the long-running service never reconcile one tenant together.
 * An expired lease is free to take; that covers a process that died mid-pass.
 */
export class SyncLeaseStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  async acquire(tenantId: string, owner: string, ttlMs: number): Promise<boolean> {
    const stored = await this.store.update(NAMESPACE, tenantId, (current) => {
      const lease = SyncLeaseSchema.safeParse(current);
      if (lease.success && lease.data.owner !== owner && lease.data.expiresAt > this.now()) {
        return lease.data;
      }
      return { owner, expiresAt: this.now() + ttlMs };
    });

    const lease = SyncLeaseSchema.safeParse(stored);
    const acquired = lease.success && lease.data.owner === owner;
    if (!acquired) {
      this.logger.debug(`[${tenantId}] Sync lease held by another process`);
    }
    return acquired;
  }

  async release(tenantId: string, owner: string): Promise<void> {
    await this.store.update(NAMESPACE, tenantId, (current) => {
      const lease = SyncLeaseSchema.safeParse(current);
      if (lease.success && lease.data.owner !== owner) return lease.data;
      return undefined;
    });
  }
}
