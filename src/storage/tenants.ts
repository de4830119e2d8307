import { TenantSyncState } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { KeyValueStore } from './database.js';
import { TenantSyncStateSchema } from './schemas.js';

const NAMESPACE = 'tenant_state';

export function emptyState(tenantId: string): TenantSyncState {
  return { tenantId, autoSync: false };
}

/** Per-tenant connection flags, source session and autosync switch. */
export class TenantStateStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly logger: Logger
  ) {}

  async get(tenantId: string): Promise<TenantSyncState> {
    return this.parse(tenantId, await this.store.get(NAMESPACE, tenantId));
  }

  /** Read-modify-write under the store's lock, so another process's change is never overwritten. */
  async update(tenantId: string, change: (state: TenantSyncState) => TenantSyncState): Promise<TenantSyncState> {
    let next = emptyState(tenantId);
    await this.store.update(NAMESPACE, tenantId, (current) => {
      next = { ...change(this.parse(tenantId, current)), tenantId };
      return next;
    });
    return next;
  }

  async remove(tenantId: string): Promise<void> {
    await this.store.delete(NAMESPACE, tenantId);
  }

  async listAutoSync(): Promise<string[]> {
    const entries = await this.store.list(NAMESPACE);
    return entries
      .map(({ key, value }) => this.parse(key, value))
      .filter((state) => state.autoSync)
      .map((state) => state.tenantId);
  }

  private parse(tenantId: string, value: unknown): TenantSyncState {
    if (value === undefined) return emptyState(tenantId);

    const parsed = TenantSyncStateSchema.safeParse(value);
    if (!parsed.success || parsed.data.tenantId !== tenantId) {
      this.logger.warn(`Ignoring malformed state record for tenant ${tenantId}`);
      return emptyState(tenantId);
    }
    return parsed.data;
  }
}
