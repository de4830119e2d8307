// Core data types used throughout the application

import type { z } from 'zod';
import type {
  PendingAuthSchema,
  SyncLeaseSchema,
  TenantCredentialSchema,
  TenantSyncStateSchema,
} from '../storage/schemas.js';
import type { SyncError } from '../utils/errors.js';

/** One row as harvested from the course page, before any parsing. */
export interface RawAssignment {
  title: string;
  course: string;
  dateText: string;
  link: string;
}

export interface AssignmentRecord {
  title: string;
  stableId: string;
  dueInstant: Date;
  windowStart: Date;
  sourceLink: string;
  description: string;
}

export interface JalaliDate {
  year: number;
  month: number;
  day: number;
}

export interface NormalizedDeadline {
  jalali: JalaliDate;
  /** Gregorian civil date of the due day, `YYYY-MM-DD`. */
  gregorianDate: string;
  dueInstant: Date;
  windowStart: Date;
}

export type TenantCredential = z.infer<typeof TenantCredentialSchema>;

export type PendingAuth = z.infer<typeof PendingAuthSchema>;

export type TenantSyncState = z.infer<typeof TenantSyncStateSchema>;

export type SyncLease = z.infer<typeof SyncLeaseSchema>;

export type SyncOutcome = 'created' | 'updated' | 'unchanged' | 'failed';

export interface SyncFailure {
  title: string;
  stableId?: string;
  error: SyncError;
}

export interface SyncBatchResult {
  created: number;
  updated: number;
  unchanged: number;
  failed: number;
  duplicatesRemoved: number;
  failures: SyncFailure[];
}

export type ConnectionTarget = 'source' | 'calendar' | 'all';

export interface TenantStatus {
  tenantId: string;
  sourceConnected: boolean;
  calendarConnected: boolean;
  /** Google rejected the stored grant; the tenant has to connect the calendar again. */
  calendarRevoked: boolean;
  calendarExpiry?: string;
  autoSync: boolean;
  scheduled: boolean;
}

export interface Config {
  google: {
    clientId?: string;
    clientSecret?: string;
    redirectUri: string;
    calendarId: string;
  };
  quera: {
    baseUrl: string;
  };
  sync: {
    intervalMs: number;
    initialDelayMs: number;
    requestTimeoutMs: number;
    lookaroundDays: number;
    utcOffsetMinutes: number;
    timeZone: string;
    /** How often `serve` re-reads the autosync flags other processes may have changed. */
    watchIntervalMs: number;
    /** Longest a pass may hold a tenant's sync lease before another process may take over. */
    leaseMs: number;
  };
  server: {
    port: number;
  };
  log: {
    level: string;
    toFile: boolean;
  };
  paths: {
    dataDir: string;
    database: string;
  };
}
