import { randomBytes } from 'crypto';
import { buildAssignmentRecord } from '../assignments/record.js';
import { addFailure, emptyBatchResult, Reconciler } from '../calendar/reconciler.js';
import { AssignmentSource } from '../scraper/quera.js';
import { CredentialStore } from '../storage/credentials.js';
import { SyncLeaseStore } from '../storage/leases.js';
import { TenantStateStore } from '../storage/tenants.js';
import { AssignmentRecord, RawAssignment, SyncBatchResult, SyncFailure } from '../types/index.js';
import { AuthError, SourceError, sourceError, SyncBusyError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { err, ok, Result } from '../utils/result.js';

export type SyncRunResult = Result<SyncBatchResult, AuthError | SourceError | SyncBusyError>;

export interface AssignmentPreview {
  records: AssignmentRecord[];
  failures: SyncFailure[];
}

export interface OrchestratorDeps {
  credentials: CredentialStore;
  tenants: TenantStateStore;
  source: AssignmentSource;
  reconciler: Reconciler;
  leases: SyncLeaseStore;
}

export interface OrchestratorOptions {
  utcOffsetMinutes: number;
  leaseMs: number;
}

export class SyncOrchestrator {
  private readonly running = new Map<string, Promise<SyncRunResult>>();
  private readonly owner = `${process.pid}:${randomBytes(4).toString('hex')}`;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  isRunning(tenantId: string): boolean {
    return this.running.has(tenantId);
  }

  /**
   * Runs one reconciliation pass for the tenant. While a pass is in flight,
   * further calls for the same tenant join it instead of starting another, so
   * two passes can never race each other into duplicate creates. Across
   * processes the tenant's sync lease plays the same role; a pass that cannot
   * take it ends with `SyncInProgress`.
   */
  runOnce(tenantId: string): Promise<SyncRunResult> {
    const inFlight = this.running.get(tenantId);
    if (inFlight) {
      this.logger.info(`[${tenantId}] Sync already running; joining it`);
      return inFlight;
    }

    const pass = this.pass(tenantId).finally(() => {
      this.running.delete(tenantId);
    });
    this.running.set(tenantId, pass);
    return pass;
  }

  /** Fetches and validates the tenant's assignments without touching the calendar. */
  async preview(tenantId: string): Promise<Result<AssignmentPreview, SourceError>> {
    const state = await this.deps.tenants.get(tenantId);
    if (!state.sourceSession) {
      return err(sourceError('not_connected', 'Quera account is not connected'));
    }

    const raw = await this.fetchRaw(tenantId, state.sourceSession);
    if (!raw.ok) return raw;
    return ok(this.buildRecords(raw.value));
  }

  private async pass(tenantId: string): Promise<SyncRunResult> {
    const { leases } = this.deps;
    if (!(await leases.acquire(tenantId, this.owner, this.options.leaseMs))) {
      this.logger.info(`[${tenantId}] Sync already running in another process`);
      return err({ code: 'SyncInProgress', message: 'A sync for this tenant is already running elsewhere' });
    }

    try {
      return await this.leasedPass(tenantId);
    } finally {
      await leases.release(tenantId, this.owner);
    }
  }

  private async leasedPass(tenantId: string): Promise<SyncRunResult> {
    this.logger.info(`[${tenantId}] Starting sync`);

    const state = await this.deps.tenants.get(tenantId);
    if (!state.sourceSession) {
      return err(sourceError('not_connected', 'Quera account is not connected'));
    }

    const credential = await this.deps.credentials.ensureFresh(tenantId);
    if (!credential.ok) {
      this.logger.warn(`[${tenantId}] Calendar credential unavailable: ${credential.error.message}`);
      return credential;
    }

    const raw = await this.fetchRaw(tenantId, state.sourceSession);
    if (!raw.ok) return raw;

    if (raw.value.length === 0) {
      this.logger.info(`[${tenantId}] No assignments found`);
      return ok(emptyBatchResult());
    }

    const { records, failures } = this.buildRecords(raw.value);
    const result = await this.deps.reconciler.reconcileBatch(credential.value, records);
    for (const failure of failures) {
      addFailure(result, failure);
    }
    return ok(result);
  }

  private async fetchRaw(tenantId: string, session: string): Promise<Result<RawAssignment[], SourceError>> {
    const raw = await this.deps.source.fetchAssignments(session);
    if (!raw.ok) {
      this.logger.warn(`[${tenantId}] Source unavailable: ${raw.error.message}`);
    }
    return raw;
  }

  private buildRecords(raw: RawAssignment[]): AssignmentPreview {
    const now = this.now();
    const records: AssignmentRecord[] = [];
    const failures: SyncFailure[] = [];

    for (const item of raw) {
      const built = buildAssignmentRecord(item, now, this.options.utcOffsetMinutes);
      if (built.ok) {
        records.push(built.value);
      } else {
        this.logger.warn(`Skipping "${item.title}": ${built.error.message}`);
        failures.push({ title: `${item.title} | ${item.course}`, error: built.error });
      }
    }
    return { records, failures };
  }
}
