import { TenantCredential } from '../types/index.js';

export const STABLE_ID_PROPERTY = 'queraAssignmentId';
export const SOURCE_PROPERTY = 'source';
export const SOURCE_TAG = 'quera-automation';

/** Everything written to a full-day calendar entry. Dates are `YYYY-MM-DD`, end exclusive. */
export interface CalendarEventBody {
  title: string;
  description: string;
  startDate: string;
  endDate: string;
  stableId: string;
}

export interface RemoteCalendarEntry {
  id: string;
  startDate?: string;
  endDate?: string;
}

export interface TimeWindow {
  timeMin: Date;
  timeMax: Date;
}

/**
 * The remote calendar as the reconciler sees it. Implementations throw on
 * transport or service errors.
 */
export interface CalendarGateway {
  findByStableId(credential: TenantCredential, stableId: string, window: TimeWindow): Promise<RemoteCalendarEntry[]>;
  createEvent(credential: TenantCredential, body: CalendarEventBody): Promise<RemoteCalendarEntry>;
  updateEvent(credential: TenantCredential, eventId: string, body: CalendarEventBody): Promise<RemoteCalendarEntry>;
  deleteEvent(credential: TenantCredential, eventId: string): Promise<void>;
}
