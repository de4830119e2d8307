import { AssignmentSource } from '../scraper/quera.js';
import { CredentialStore, RefreshedToken } from '../storage/credentials.js';
import { TenantStateStore } from '../storage/tenants.js';
import { ConnectionTarget, TenantStatus } from '../types/index.js';
import { AuthError, authError, describeError, SourceError, sourceError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { err, ok, Result } from '../utils/result.js';
import { AssignmentPreview, SyncOrchestrator, SyncRunResult } from './orchestrator.js';
import { Scheduler } from './scheduler.js';

/** The OAuth handshake as the command layer needs it. */
export interface AuthorizationFlow {
  isConfigured(): boolean;
  getAuthUrl(): string;
  exchangeCode(code: string): Promise<RefreshedToken>;
}

export interface ServiceDeps {
  auth: AuthorizationFlow;
  credentials: CredentialStore;
  tenants: TenantStateStore;
  source: AssignmentSource;
  orchestrator: SyncOrchestrator;
  scheduler: Scheduler;
}

// A consent page left open longer than this must be started again.
const PENDING_AUTH_TTL_MS = 60 * 60 * 1000;

/**
 * Commands exposed to whatever front-end drives the engine. Every method is
 * keyed by tenant and returns a result value; none throws for expected failures.
 */
export class DeadlineSyncService {
  constructor(
    private readonly deps: ServiceDeps,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  async startAuth(tenantId: string): Promise<Result<string, AuthError>> {
    if (!this.deps.auth.isConfigured()) {
      return err(authError('not_configured', 'Google OAuth client is not configured'));
    }

    await this.deps.tenants.update(tenantId, (current) => ({
      ...current,
      pendingAuth: { startedAt: new Date(this.now()).toISOString() },
    }));
    this.logger.info(`[${tenantId}] Started calendar authorization`);
    return ok(this.deps.auth.getAuthUrl());
  }

  async completeAuth(tenantId: string, code: string): Promise<Result<void, AuthError>> {
    const current = await this.deps.tenants.get(tenantId);
    if (!current.pendingAuth) {
      return err(authError('exchange_failed', 'Authentication flow not started'));
    }
    const startedAt = Date.parse(current.pendingAuth.startedAt);
    if (Number.isNaN(startedAt) || this.now() - startedAt > PENDING_AUTH_TTL_MS) {
      await this.deps.tenants.update(tenantId, ({ pendingAuth: _stale, ...rest }) => rest);
      return err(authError('exchange_failed', 'Authentication flow expired; start it again'));
    }

    let token: RefreshedToken;
    try {
      token = await this.deps.auth.exchangeCode(code.trim());
    } catch (error) {
      this.logger.error(`[${tenantId}] Error fetching token: ${describeError(error)}`);
      return err(authError('exchange_failed', 'The authorization code was rejected'));
    }

    await this.deps.credentials.save(tenantId, { tenantId, ...token });
    await this.deps.tenants.update(tenantId, ({ pendingAuth: _done, ...rest }) => rest);
    this.logger.info(`[${tenantId}] Google Calendar connected`);
    return ok(undefined);
  }

  async connectSource(tenantId: string, sessionToken: string): Promise<Result<void, SourceError>> {
    const session = sessionToken.trim();
    this.logger.info(`[${tenantId}] Validating Quera session`);

    const valid = await this.deps.source.validateSession(session);
    if (!valid.ok) return valid;

    await this.deps.tenants.update(tenantId, (current) => ({ ...current, sourceSession: session }));
    this.logger.info(`[${tenantId}] Stored valid Quera session`);
    return ok(undefined);
  }

  async disconnect(tenantId: string, which: ConnectionTarget): Promise<void> {
    this.deps.scheduler.cancel(tenantId);

    switch (which) {
      case 'source':
        await this.deps.tenants.update(tenantId, ({ sourceSession: _removed, ...rest }) => ({
          ...rest,
          autoSync: false,
        }));
        break;
      case 'calendar':
        await this.deps.credentials.remove(tenantId);
        await this.deps.tenants.update(tenantId, (current) => ({ ...current, autoSync: false }));
        break;
      case 'all':
        await this.deps.credentials.remove(tenantId);
        await this.deps.tenants.remove(tenantId);
        break;
    }
    this.logger.info(`[${tenantId}] Disconnected ${which}`);
  }

  syncNow(tenantId: string): Promise<SyncRunResult> {
    return this.deps.orchestrator.runOnce(tenantId);
  }

  preview(tenantId: string): Promise<Result<AssignmentPreview, SourceError>> {
    return this.deps.orchestrator.preview(tenantId);
  }

  async setAutoSync(tenantId: string, enabled: boolean): Promise<Result<void, AuthError | SourceError>> {
    if (!enabled) {
      await this.deps.scheduler.disable(tenantId);
      return ok(undefined);
    }

    const state = await this.deps.tenants.get(tenantId);
    if (!state.sourceSession) {
      return err(sourceError('not_connected', 'Connect your Quera account before enabling auto-sync'));
    }
    const credential = await this.deps.credentials.load(tenantId);
    if (!credential) {
      return err(authError('missing', 'Connect Google Calendar before enabling auto-sync'));
    }
    if (this.deps.credentials.isRevoked(credential)) {
      return err(authError('refresh_failed', 'Google Calendar authorization was revoked; connect it again'));
    }

    await this.deps.scheduler.enable(tenantId);
    return ok(undefined);
  }

  async status(tenantId: string): Promise<TenantStatus> {
    const state = await this.deps.tenants.get(tenantId);
    const credential = await this.deps.credentials.load(tenantId);
    return {
      tenantId,
      sourceConnected: Boolean(state.sourceSession),
      calendarConnected: credential !== undefined && !this.deps.credentials.isRevoked(credential),
      calendarRevoked: credential !== undefined && this.deps.credentials.isRevoked(credential),
      calendarExpiry: credential?.expiry !== undefined ? new Date(credential.expiry).toISOString() : undefined,
      autoSync: state.autoSync,
      scheduled: this.deps.scheduler.isScheduled(tenantId),
    };
  }
}
