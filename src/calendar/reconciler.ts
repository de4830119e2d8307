import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import { deriveStableId } from '../assignments/record.js';
import { AssignmentRecord, SyncBatchResult, SyncFailure, TenantCredential } from '../types/index.js';
import { describeError, errorStatus, RemoteError, SyncError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { err, ok, Result } from '../utils/result.js';
import { CalendarEventBody, CalendarGateway, RemoteCalendarEntry, TimeWindow } from './gateway.js';

dayjs.extend(utc);

export type ReconcileResult =
  | {
      outcome: 'created' | 'updated' | 'unchanged';
      stableId: string;
      eventId: string;
      duplicatesRemoved: number;
    }
  | { outcome: 'failed'; stableId?: string; error: SyncError };

export interface ReconcilerOptions {
  utcOffsetMinutes: number;
  lookaroundDays: number;
}

export function emptyBatchResult(): SyncBatchResult {
  return { created: 0, updated: 0, unchanged: 0, failed: 0, duplicatesRemoved: 0, failures: [] };
}

export function addFailure(result: SyncBatchResult, failure: SyncFailure): void {
  result.failed++;
  result.failures.push(failure);
}

/**
 * Decides create / update / skip for each assignment against the tenant's
 * calendar. The private `queraAssignmentId` property on the remote entry is the
 * only dedup key; the entry's own id is never assumed in advance.
 */
export class Reconciler {
  constructor(
    private readonly gateway: CalendarGateway,
    private readonly options: ReconcilerOptions,
    private readonly logger: Logger
  ) {}

  /** Full-day range `[start, end)` in the calendar's date convention. */
  eventDates(record: AssignmentRecord): { startDate: string; endDate: string } {
    const offset = this.options.utcOffsetMinutes;
    return {
      startDate: dayjs(record.windowStart).utcOffset(offset).format('YYYY-MM-DD'),
      endDate: dayjs(record.dueInstant).utcOffset(offset).add(1, 'day').format('YYYY-MM-DD'),
    };
  }

  searchWindow(record: AssignmentRecord): TimeWindow {
    const days = this.options.lookaroundDays;
    return {
      timeMin: dayjs.utc(record.windowStart).subtract(days, 'day').toDate(),
      timeMax: dayjs.utc(record.dueInstant).add(days, 'day').toDate(),
    };
  }

  async reconcile(credential: TenantCredential, record: AssignmentRecord): Promise<ReconcileResult> {
    const tenantId = credential.tenantId;
    const stableId = deriveStableId(record.sourceLink);
    if (!stableId.ok) {
      this.logger.warn(`[${tenantId}] Skipping "${record.title}": ${stableId.error.message}`);
      return { outcome: 'failed', error: stableId.error };
    }

    const id = stableId.value;
    const body: CalendarEventBody = {
      title: record.title,
      description: record.description,
      stableId: id,
      ...this.eventDates(record),
    };
    const context = `[${tenantId}] "${record.title}" (assignment ${id}, ${body.startDate})`;

    const found = await this.attempt('RemoteQueryError', () =>
      this.gateway.findByStableId(credential, id, this.searchWindow(record))
    );
    if (!found.ok) {
      this.logger.error(`${context}: calendar lookup failed: ${found.error.message}`);
      return { outcome: 'failed', stableId: id, error: found.error };
    }

    const [primary, ...extras] = found.value;

    if (!primary) {
      const created = await this.attempt('RemoteWriteError', () => this.gateway.createEvent(credential, body));
      if (!created.ok) {
        this.logger.error(`${context}: create failed: ${created.error.message}`);
        return { outcome: 'failed', stableId: id, error: created.error };
      }
      this.logger.info(`${context}: added new event`);
      return { outcome: 'created', stableId: id, eventId: created.value.id, duplicatesRemoved: 0 };
    }

    let outcome: 'updated' | 'unchanged' = 'unchanged';
    if (primary.startDate !== body.startDate) {
      const updated = await this.attempt('RemoteWriteError', () =>
        this.gateway.updateEvent(credential, primary.id, body)
      );
      if (!updated.ok) {
        this.logger.error(`${context}: update of event ${primary.id} failed: ${updated.error.message}`);
        return { outcome: 'failed', stableId: id, error: updated.error };
      }
      this.logger.info(`${context}: moved from ${primary.startDate ?? 'unknown date'}`);
      outcome = 'updated';
    } else {
      this.logger.debug(`${context}: already up to date`);
    }

    const duplicatesRemoved = await this.removeDuplicates(credential, extras, context);
    return { outcome, stableId: id, eventId: primary.id, duplicatesRemoved };
  }

  /** Reconciles records in order; a failing record never stops the rest. */
  async reconcileBatch(credential: TenantCredential, records: AssignmentRecord[]): Promise<SyncBatchResult> {
    const result = emptyBatchResult();
    this.logger.info(`[${credential.tenantId}] Starting sync of ${records.length} events to calendar`);

    for (const record of records) {
      const reconciled = await this.reconcile(credential, record);
      if (reconciled.outcome === 'failed') {
        addFailure(result, { title: record.title, stableId: reconciled.stableId, error: reconciled.error });
        continue;
      }
      result[reconciled.outcome]++;
      result.duplicatesRemoved += reconciled.duplicatesRemoved;
    }

    this.logger.info(
      `[${credential.tenantId}] Sync complete: ${result.created} created, ${result.updated} updated, ` +
        `${result.unchanged} unchanged, ${result.failed} failed`
    );
    return result;
  }

  // Extra entries carrying the same assignment id are leftovers of earlier
  // races or manual copies; the first match is authoritative.
  private async removeDuplicates(
    credential: TenantCredential,
    extras: RemoteCalendarEntry[],
    context: string
  ): Promise<number> {
    let removed = 0;
    for (const extra of extras) {
      const deleted = await this.attempt('RemoteWriteError', () => this.gateway.deleteEvent(credential, extra.id));
      if (deleted.ok) {
        removed++;
        this.logger.warn(`${context}: removed duplicate event ${extra.id}`);
      } else {
        this.logger.warn(`${context}: could not remove duplicate event ${extra.id}: ${deleted.error.message}`);
      }
    }
    return removed;
  }

  private async attempt<T>(code: RemoteError['code'], call: () => Promise<T>): Promise<Result<T, RemoteError>> {
    try {
      return ok(await call());
    } catch (error) {
      return err({ code, message: describeError(error), status: errorStatus(error) });
    }
  }
}
