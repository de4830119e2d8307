import { z } from 'zod';

/**
 * Persisted record formats. Everything read back from the store goes through
 * these before the rest of the code sees it.
 */

export const TenantCredentialSchema = z.object({
  tenantId: z.string(),
  accessToken: z.string(),
  refreshToken: z.string().optional(),
  /** Epoch milliseconds. Absent means the token never expires as far as we know. */
  expiry: z.number().optional(),
  /** Set once Google rejected the refresh token; the tenant has to authorize again. */
  revokedAt: z.string().optional(),
});

export const PendingAuthSchema = z.object({
  startedAt: z.string(),
});

export const TenantSyncStateSchema = z.object({
  tenantId: z.string(),
  sourceSession: z.string().optional(),
  autoSync: z.boolean().default(false),
  pendingAuth: PendingAuthSchema.optional(),
});

export const SyncLeaseSchema = z.object({
  owner: z.string(),
  expiresAt: z.number(),
});
