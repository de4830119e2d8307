import { describe, expect, it } from 'vitest';
import { toClientCredentials, toGoogleEvent } from '../../src/google/calendar.js';

describe('toGoogleEvent', () => {
  it('writes an all-day event tagged with the assignment id', () => {
    const event = toGoogleEvent(
      {
        title: 'Graph Traversal | Algorithms',
        description: 'Assignment Link: https://quera.org/course/assignments/85830/problems',
        startDate: '2024-05-14',
        endDate: '2024-05-15',
        stableId: '85830',
      },
      'Asia/Tehran'
    );

    expect(event).toEqual({
      summary: 'Graph Traversal | Algorithms',
      description: 'Assignment Link: https://quera.org/course/assignments/85830/problems',
      start: { date: '2024-05-14', timeZone: 'Asia/Tehran' },
      end: { date: '2024-05-15', timeZone: 'Asia/Tehran' },
      extendedProperties: {
        private: { queraAssignmentId: '85830', source: 'quera-automation' },
      },
    });
  });
});

describe('toClientCredentials', () => {
  it('hands the API client the access token only', () => {
    const credentials = toClientCredentials({
      tenantId: 'tenant-1',
      accessToken: 'test-access',
      refreshToken: 'test-refresh',
      expiry: Date.UTC(2030, 0, 1),
    });

    expect(credentials).toEqual({ access_token: 'test-access', expiry_date: Date.UTC(2030, 0, 1) });
    expect('refresh_token' in credentials).toBe(false);
  });
});
