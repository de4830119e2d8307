import { beforeEach, describe, expect, it } from 'vitest';
import { Reconciler } from '../../src/calendar/reconciler.js';
import { isRetryable } from '../../src/utils/errors.js';
import { createSilentLogger } from '../../src/utils/logger.js';
import { credential, FakeCalendar, OFFSET, record } from '../helpers/fakes.js';

describe('Reconciler', () => {
  let calendar: FakeCalendar;
  let reconciler: Reconciler;
  const tenant = credential();

  beforeEach(() => {
    calendar = new FakeCalendar();
    reconciler = new Reconciler(calendar, { utcOffsetMinutes: OFFSET, lookaroundDays: 90 }, createSilentLogger());
  });

  it('maps a deadline to a full-day entry on its local date', () => {
    expect(reconciler.eventDates(record('1', '2024-05-14'))).toEqual({
      startDate: '2024-05-14',
      endDate: '2024-05-15',
    });
  });

  it('searches ninety days either side of the deadline', () => {
    expect(reconciler.searchWindow(record('1', '2024-05-14'))).toEqual({
      timeMin: new Date('2024-02-13T20:30:00.000Z'),
      timeMax: new Date('2024-08-12T20:29:59.000Z'),
    });
  });

  it('creates a missing entry carrying the record fields', async () => {
    const result = await reconciler.reconcile(tenant, record('85830', '2024-05-14'));

    expect(result).toEqual({ outcome: 'created', stableId: '85830', eventId: 'evt-1', duplicatesRemoved: 0 });
    expect(calendar.entriesFor('85830').map((event) => event.body)).toEqual([
      {
        title: 'Assignment 85830 | Algorithms',
        description: 'Assignment Link: https://quera.org/course/assignments/85830/problems',
        stableId: '85830',
        startDate: '2024-05-14',
        endDate: '2024-05-15',
      },
    ]);
  });

  it('is idempotent across passes', async () => {
    const records = [record('1', '2024-05-14'), record('2', '2024-05-20'), record('3', '2024-06-01')];

    const first = await reconciler.reconcileBatch(tenant, records);
    expect(first).toMatchObject({ created: 3, updated: 0, unchanged: 0, failed: 0 });
    const mutations = calendar.mutations;

    const second = await reconciler.reconcileBatch(tenant, records);
    expect(second).toMatchObject({ created: 0, updated: 0, unchanged: 3, failed: 0 });
    expect(calendar.mutations).toBe(mutations);
    expect(calendar.events.size).toBe(3);
  });

  it('moves an entry whose deadline changed', async () => {
    const eventId = calendar.seed('42', '2024-05-10', '2024-05-11');

    const result = await reconciler.reconcile(tenant, record('42', '2024-05-14'));

    expect(result).toEqual({ outcome: 'updated', stableId: '42', eventId, duplicatesRemoved: 0 });
    expect(calendar.entriesFor('42')).toHaveLength(1);
    expect(calendar.events.get(eventId)?.body).toMatchObject({ startDate: '2024-05-14', endDate: '2024-05-15' });
    expect(calendar.calls.create).toBe(0);
  });

  it('leaves an entry on the right date alone', async () => {
    calendar.seed('42', '2024-05-14', '2024-05-15', 'Renamed by hand');

    const result = await reconciler.reconcile(tenant, record('42', '2024-05-14'));

    expect(result.outcome).toBe('unchanged');
    expect(calendar.mutations).toBe(0);
    expect(calendar.entriesFor('42')[0].body.title).toBe('Renamed by hand');
  });

  it('keeps the first match and deletes the extras', async () => {
    const first = calendar.seed('42', '2024-05-14', '2024-05-15');
    calendar.seed('42', '2024-05-14', '2024-05-15');
    calendar.seed('42', '2024-05-01', '2024-05-02');

    const batch = await reconciler.reconcileBatch(tenant, [record('42', '2024-05-14')]);

    expect(batch).toMatchObject({ unchanged: 1, duplicatesRemoved: 2 });
    expect(calendar.entriesFor('42').map((event) => event.id)).toEqual([first]);
  });

  it('fails a record without an assignment id without calling the calendar', async () => {
    const result = await reconciler.reconcile(tenant, record('x', '2024-05-14', 'https://quera.org/course/'));

    expect(result).toEqual({
      outcome: 'failed',
      error: {
        code: 'MissingStableId',
        message: 'Could not extract assignment ID from https://quera.org/course/',
        link: 'https://quera.org/course/',
      },
    });
    expect(calendar.calls.find).toBe(0);
  });

  it('keeps going after a bad record in the middle of a batch', async () => {
    const records = [
      record('1', '2024-05-14'),
      record('2', '2024-05-15'),
      record('3', '2024-05-16', ''),
      record('4', '2024-05-17'),
      record('5', '2024-05-18'),
    ];

    const result = await reconciler.reconcileBatch(tenant, records);

    expect(result).toMatchObject({ created: 4, updated: 0, unchanged: 0, failed: 1, duplicatesRemoved: 0 });
    expect(result.failures).toEqual([
      {
        title: 'Assignment 3 | Algorithms',
        stableId: undefined,
        error: { code: 'MissingStableId', message: 'Could not extract assignment ID from (empty link)', link: '' },
      },
    ]);
    expect(calendar.calls.find).toBe(4);
    expect(calendar.events.size).toBe(4);
  });

  it('reports a rejected create as a retryable write error', async () => {
    calendar.failCreateFor.add('2');

    const result = await reconciler.reconcileBatch(tenant, [record('1', '2024-05-14'), record('2', '2024-05-15')]);

    expect(result).toMatchObject({ created: 1, failed: 1 });
    const error = result.failures[0].error;
    expect(error).toEqual({ code: 'RemoteWriteError', message: 'Backend Error', status: 503 });
    expect(isRetryable(error)).toBe(true);
  });

  it('reports a failed lookup as a query error', async () => {
    calendar.failQueryWith = Object.assign(new Error('Forbidden'), { code: 403 });

    const result = await reconciler.reconcile(tenant, record('1', '2024-05-14'));

    expect(result).toEqual({
      outcome: 'failed',
      stableId: '1',
      error: { code: 'RemoteQueryError', message: 'Forbidden', status: 403 },
    });
    expect(calendar.mutations).toBe(0);
  });
});
