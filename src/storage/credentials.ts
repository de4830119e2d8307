import { TenantCredential } from '../types/index.js';
import { AuthError, authError, describeError, errorStatus } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { err, ok, Result } from '../utils/result.js';
import { KeyValueStore } from './database.js';
import { TenantCredentialSchema } from './schemas.js';

const NAMESPACE = 'calendar_credentials';

// Refresh slightly early so a token does not expire mid-pass.
const EXPIRY_SKEW_MS = 60 * 1000;

export interface RefreshedToken {
  accessToken: string;
  refreshToken?: string;
  expiry?: number;
}

export interface TokenRefresher {
  refresh(refreshToken: string): Promise<RefreshedToken>;
}

/** Google answers a revoked or expired grant with 400/401 `invalid_grant`. */
export function isRevokedGrant(error: unknown): boolean {
  const status = errorStatus(error);
  return status === 400 || status === 401 || describeError(error).includes('invalid_grant');
}

export class CredentialStore {
  private readonly refreshing = new Map<string, Promise<Result<TenantCredential, AuthError>>>();

  constructor(
    private readonly store: KeyValueStore,
    private readonly refresher: TokenRefresher,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  async load(tenantId: string): Promise<TenantCredential | undefined> {
    const value = await this.store.get(NAMESPACE, tenantId);
    if (value === undefined) return undefined;

    const parsed = TenantCredentialSchema.safeParse(value);
    if (!parsed.success) {
      this.logger.warn(`Ignoring malformed credential record for tenant ${tenantId}: ${parsed.error.message}`);
      return undefined;
    }
    return parsed.data;
  }

  async save(tenantId: string, credential: TenantCredential): Promise<void> {
    await this.store.put(NAMESPACE, tenantId, { ...credential, tenantId });
  }

  async remove(tenantId: string): Promise<void> {
    await this.store.delete(NAMESPACE, tenantId);
  }

  isExpired(credential: TenantCredential): boolean {
    return credential.expiry !== undefined && credential.expiry - EXPIRY_SKEW_MS <= this.now();
  }

  isRevoked(credential: TenantCredential): boolean {
    return credential.revokedAt !== undefined;
  }

  /**
   * Returns a credential that is usable right now, refreshing and persisting
   * it first when it has expired. Concurrent callers for one tenant share a
   * single refresh. A grant Google rejected is marked revoked and never
   * refreshed again until the tenant authorizes anew.
   */
  ensureFresh(tenantId: string): Promise<Result<TenantCredential, AuthError>> {
    const inFlight = this.refreshing.get(tenantId);
    if (inFlight) return inFlight;

    const pending = this.loadFresh(tenantId).finally(() => {
      this.refreshing.delete(tenantId);
    });
    this.refreshing.set(tenantId, pending);
    return pending;
  }

  private async loadFresh(tenantId: string): Promise<Result<TenantCredential, AuthError>> {
    const credential = await this.load(tenantId);
    if (!credential) {
      return err(authError('missing', 'Google Calendar is not connected'));
    }
    if (this.isRevoked(credential)) {
      return err(authError('refresh_failed', 'Google Calendar authorization was revoked; connect it again'));
    }
    if (!this.isExpired(credential)) {
      return ok(credential);
    }
    if (!credential.refreshToken) {
      return err(authError('expired', 'Google Calendar authorization expired and cannot be refreshed'));
    }

    let refreshed: RefreshedToken;
    try {
      refreshed = await this.refresher.refresh(credential.refreshToken);
    } catch (error) {
      this.logger.error(`Token refresh failed for tenant ${tenantId}: ${describeError(error)}`);
      if (!isRevokedGrant(error)) {
        return err(authError('refresh_unavailable', 'Google Calendar token could not be refreshed right now'));
      }

      const { refreshToken: _rejected, ...rest } = credential;
      await this.save(tenantId, { ...rest, revokedAt: new Date(this.now()).toISOString() });
      return err(authError('refresh_failed', 'Google Calendar authorization was revoked; connect it again'));
    }

    const next: TenantCredential = {
      tenantId,
      accessToken: refreshed.accessToken,
      refreshToken: refreshed.refreshToken ?? credential.refreshToken,
      expiry: refreshed.expiry,
    };
    await this.save(tenantId, next);
    this.logger.info(`Refreshed calendar credential for tenant ${tenantId}`);
    return ok(next);
  }
}
