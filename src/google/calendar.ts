import { google } from 'googleapis';
import type { Auth, calendar_v3 } from 'googleapis';
import {
  CalendarEventBody,
  CalendarGateway,
  RemoteCalendarEntry,
  SOURCE_PROPERTY,
  SOURCE_TAG,
  STABLE_ID_PROPERTY,
  TimeWindow,
} from '../calendar/gateway.js';
import { TenantCredential } from '../types/index.js';
import { GoogleAuth } from './auth.js';

export interface GoogleCalendarOptions {
  calendarId: string;
  timeZone: string;
  requestTimeoutMs: number;
}

export function toGoogleEvent(body: CalendarEventBody, timeZone: string): calendar_v3.Schema$Event {
  return {
    summary: body.title,
    description: body.description,
    start: { date: body.startDate, timeZone },
    end: { date: body.endDate, timeZone },
    extendedProperties: {
      private: {
        [STABLE_ID_PROPERTY]: body.stableId,
        [SOURCE_PROPERTY]: SOURCE_TAG,
      },
    },
  };
}

/**
 * Only the access token reaches the API client. Refreshing is left to
 * `CredentialStore`, which persists the new token; a client holding the
 * refresh token would renew silently and the result would be lost.
 */
export function toClientCredentials(credential: TenantCredential): Auth.Credentials {
  return {
    access_token: credential.accessToken,
    expiry_date: credential.expiry,
  };
}

function toEntry(event: calendar_v3.Schema$Event): RemoteCalendarEntry | null {
  if (!event.id) return null;
  return {
    id: event.id,
    startDate: event.start?.date ?? undefined,
    endDate: event.end?.date ?? undefined,
  };
}

function requireEntry(event: calendar_v3.Schema$Event): RemoteCalendarEntry {
  const entry = toEntry(event);
  if (!entry) {
    throw new Error('Google did not return an event ID');
  }
  return entry;
}

export class GoogleCalendarGateway implements CalendarGateway {
  constructor(
    private readonly auth: GoogleAuth,
    private readonly options: GoogleCalendarOptions
  ) {}

  private client(credential: TenantCredential): calendar_v3.Calendar {
    const oauth = this.auth.createClient();
    oauth.setCredentials(toClientCredentials(credential));
    return google.calendar({ version: 'v3', auth: oauth });
  }

  async findByStableId(
    credential: TenantCredential,
    stableId: string,
    window: TimeWindow
  ): Promise<RemoteCalendarEntry[]> {
    const response = await this.client(credential).events.list(
      {
        calendarId: this.options.calendarId,
        timeMin: window.timeMin.toISOString(),
        timeMax: window.timeMax.toISOString(),
        privateExtendedProperty: [`${STABLE_ID_PROPERTY}=${stableId}`],
        showDeleted: false,
      },
      { timeout: this.options.requestTimeoutMs }
    );

    const entries: RemoteCalendarEntry[] = [];
    for (const item of response.data.items ?? []) {
      const entry = toEntry(item);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  async createEvent(credential: TenantCredential, body: CalendarEventBody): Promise<RemoteCalendarEntry> {
    const response = await this.client(credential).events.insert(
      {
        calendarId: this.options.calendarId,
        requestBody: toGoogleEvent(body, this.options.timeZone),
      },
      { timeout: this.options.requestTimeoutMs }
    );
    return requireEntry(response.data);
  }

  async updateEvent(
    credential: TenantCredential,
    eventId: string,
    body: CalendarEventBody
  ): Promise<RemoteCalendarEntry> {
    const response = await this.client(credential).events.update(
      {
        calendarId: this.options.calendarId,
        eventId,
        requestBody: toGoogleEvent(body, this.options.timeZone),
      },
      { timeout: this.options.requestTimeoutMs }
    );
    return requireEntry(response.data);
  }

  async deleteEvent(credential: TenantCredential, eventId: string): Promise<void> {
    await this.client(credential).events.delete(
      { calendarId: this.options.calendarId, eventId },
      { timeout: this.options.requestTimeoutMs }
    );
  }
}
