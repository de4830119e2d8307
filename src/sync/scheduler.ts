import { TenantStateStore } from '../storage/tenants.js';
import { describeError, isRetryable } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { SyncRunResult } from './orchestrator.js';

export type SyncResultListener = (tenantId: string, result: SyncRunResult) => void | Promise<void>;

export interface SchedulerOptions {
  intervalMs: number;
  initialDelayMs: number;
}

export interface SyncRunner {
  runOnce(tenantId: string): Promise<SyncRunResult>;
}

/** Cancellation handle for one tenant's recurring sync. */
class RecurringSync {
  private initial: NodeJS.Timeout | null;
  private repeating: NodeJS.Timeout | null = null;

  constructor(fire: () => void, options: SchedulerOptions) {
    this.initial = setTimeout(() => {
      this.initial = null;
      this.repeating = setInterval(fire, options.intervalMs);
      fire();
    }, options.initialDelayMs);
  }

  cancel(): void {
    if (this.initial) clearTimeout(this.initial);
    if (this.repeating) clearInterval(this.repeating);
    this.initial = null;
    this.repeating = null;
  }
}

/**
 * Owns the recurring sync timers, at most one per tenant. Cancelling a timer
 * only prevents future firings; a pass that already started runs to the end.
 * The persisted autosync flags are the source of truth: `watch` keeps the
 * timers in line with flags another process changed.
 */
export class Scheduler {
  private readonly timers = new Map<string, RecurringSync>();
  private watcher: NodeJS.Timeout | null = null;
  private polling = false;

  constructor(
    private readonly runner: SyncRunner,
    private readonly tenants: TenantStateStore,
    private readonly options: SchedulerOptions,
    private readonly logger: Logger,
    private readonly listener: SyncResultListener = logResult(logger)
  ) {}

  isScheduled(tenantId: string): boolean {
    return this.timers.has(tenantId);
  }

  scheduledTenants(): string[] {
    return [...this.timers.keys()];
  }

  /** Persists the autosync flag and arms the timer. No-op when already enabled. */
  async enable(tenantId: string): Promise<void> {
    await this.tenants.update(tenantId, (state) => ({ ...state, autoSync: true }));
    this.arm(tenantId);
  }

  /** Cancels the timer and clears the persisted autosync flag. */
  async disable(tenantId: string): Promise<void> {
    this.cancel(tenantId);
    await this.tenants.update(tenantId, (state) => ({ ...state, autoSync: false }));
  }

  /** Re-arms every tenant whose persisted state has autosync on. */
  async restore(): Promise<number> {
    const count = await this.refresh();
    this.logger.info(`Restored auto-sync for ${count} tenants`);
    return count;
  }

  /** Arms flagged tenants and cancels timers whose flag was cleared. Returns the number armed. */
  async refresh(): Promise<number> {
    const flagged = new Set(await this.tenants.listAutoSync());
    for (const tenantId of this.scheduledTenants()) {
      if (!flagged.has(tenantId)) this.cancel(tenantId);
    }
    for (const tenantId of flagged) {
      this.arm(tenantId);
    }
    return flagged.size;
  }

  /** Re-reads the persisted flags every `intervalMs` until `stopAll`. */
  watch(intervalMs: number): void {
    if (this.watcher) return;
    this.watcher = setInterval(() => void this.poll(), intervalMs);
  }

  cancel(tenantId: string): void {
    const timer = this.timers.get(tenantId);
    if (!timer) return;
    timer.cancel();
    this.timers.delete(tenantId);
    this.logger.info(`[${tenantId}] Auto-sync timer cancelled`);
  }

  stopAll(): void {
    if (this.watcher) {
      clearInterval(this.watcher);
      this.watcher = null;
    }
    for (const tenantId of [...this.timers.keys()]) {
      this.cancel(tenantId);
    }
  }

  private arm(tenantId: string): void {
    if (this.timers.has(tenantId)) return;
    this.timers.set(
      tenantId,
      new RecurringSync(() => void this.tick(tenantId), this.options)
    );
    this.logger.info(`[${tenantId}] Auto-sync armed every ${Math.round(this.options.intervalMs / 60000)} minutes`);
  }

  private async poll(): Promise<void> {
    if (this.polling) return;
    this.polling = true;
    try {
      await this.refresh();
    } catch (error) {
      this.logger.error(`Failed to reload auto-sync flags: ${describeError(error)}`);
    } finally {
      this.polling = false;
    }
  }

  private async tick(tenantId: string): Promise<void> {
    try {
      const state = await this.tenants.get(tenantId);
      if (!state.autoSync) {
        this.cancel(tenantId);
        return;
      }

      this.logger.info(`[${tenantId}] Starting periodic sync`);
      const result = await this.runner.runOnce(tenantId);
      if (!result.ok && !isRetryable(result.error)) {
        this.logger.warn(`[${tenantId}] Auto-sync turned off until the tenant reconnects: ${result.error.message}`);
        await this.disable(tenantId);
      }
      await this.listener(tenantId, result);
    } catch (error) {
      this.logger.error(`[${tenantId}] Error during periodic sync: ${describeError(error)}`);
    }
  }
}

/** Default listener: quiet unless something changed or went wrong. */
export function logResult(logger: Logger): SyncResultListener {
  return (tenantId, result) => {
    if (!result.ok) {
      logger.warn(`[${tenantId}] Auto-sync skipped: ${result.error.message}`);
      return;
    }
    const { created, updated, failed } = result.value;
    if (created > 0 || updated > 0) {
      logger.info(`[${tenantId}] Auto-sync complete: ${created} new, ${updated} updated`);
    }
    if (failed > 0) {
      logger.warn(`[${tenantId}] Auto-sync had ${failed} failures`);
    }
  };
}
