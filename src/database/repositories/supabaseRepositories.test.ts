import { createClient } from '@supabase/supabase-js';
import { TranscriptionRepository } from './transcriptionRepository';
import { ActionItemCreationRepository } from './actionItemCreationRepository';
import { UserSettingsRepository } from './userSettingsRepository';

jest.mock('@supabase/supabase-js');
jest.mock('uuid', () => ({ v4: () => 'generated-id' }));

interface QueryResult {
  data: unknown;
  error: { code?: string; message: string } | null;
}

// Every builder method returns the same query; awaiting it (or calling single) yields `result`.
function createQueryMock(result: QueryResult) {
  const query = {
    select: jest.fn(),
    insert: jest.fn(),
    update: jest.fn(),
    eq: jest.fn(),
    in: jest.fn(),
    order: jest.fn(),
    limit: jest.fn(),
    single: jest.fn().mockResolvedValue(result),
    then: (resolve: (value: QueryResult) => unknown, reject?: (reason: unknown) => unknown) =>
      Promise.resolve(result).then(resolve, reject)
  };
  [query.select, query.insert, query.update, query.eq, query.in, query.order, query.limit].forEach(method =>
    method.mockReturnValue(query)
  );
  return query;
}

describe('Supabase repositories', () => {
  let from: jest.Mock;

  const respondWith = (result: QueryResult) => {
    const query = createQueryMock(result);
    from.mockReturnValue(query);
    return query;
  };

  beforeEach(() => {
    jest.clearAllMocks();
    from = jest.fn();
    (createClient as jest.Mock).mockReturnValue({ from });
  });

  describe('TranscriptionRepository', () => {
    let repository: TranscriptionRepository;

    beforeEach(() => {
      repository = new TranscriptionRepository('https://test.supabase.co', 'test-key');
    });

    it('should create the client with the given credentials', () => {
      expect(createClient).toHaveBeenCalledWith('https://test.supabase.co', 'test-key');
    });

    it('should insert a received record', async () => {
      const query = respondWith({ data: { id: 'generated-id' }, error: null });

      await repository.create({
        provider: 'fireflies',
        meetingId: 'm1',
        platform: 'google_meet',
        eventType: 'transcription_completed',
        rawPayload: '{"meetingId":"m1"}',
        clientReferenceId: 'u1',
        receivedAt: '2024-01-08T09:00:00.000Z'
      });

      expect(from).toHaveBeenCalledWith('transcription_records');
      expect(query.insert).toHaveBeenCalledWith({
        id: 'generated-id',
        provider: 'fireflies',
        event_type: 'transcription_completed',
        meeting_id: 'm1',
        client_reference_id: 'u1',
        meeting_platform: 'google_meet',
        raw_payload: '{"meetingId":"m1"}',
        enrichment_status: 'received',
        received_at: '2024-01-08T09:00:00.000Z'
      });
    });

    it('should return null when a record does not exist', async () => {
      respondWith({ data: null, error: { code: 'PGRST116', message: 'No rows found' } });

      await expect(repository.getById('missing')).resolves.toBeNull();
    });

    it('should surface other database errors', async () => {
      respondWith({ data: null, error: { code: '500', message: 'connection refused' } });

      await expect(repository.getById('r1')).rejects.toThrow(
        'Failed to get transcription record: connection refused'
      );
    });

    it('should list meeting records newest first', async () => {
      const query = respondWith({ data: [{ id: 'r2' }, { id: 'r1' }], error: null });

      const records = await repository.listByMeetingId('m1');

      expect(records).toEqual([{ id: 'r2' }, { id: 'r1' }]);
      expect(query.eq).toHaveBeenCalledWith('meeting_id', 'm1');
      expect(query.order).toHaveBeenCalledWith('received_at', { ascending: false });
    });

    it('should return null when a meeting has no records', async () => {
      respondWith({ data: [], error: null });

      await expect(repository.getLatestByMeetingId('m1')).resolves.toBeNull();
    });

    it('should count the records updated for a meeting', async () => {
      const query = respondWith({ data: [{ id: 'r1' }, { id: 'r2' }], error: null });

      const count = await repository.updateByMeetingId('m1', { enrichment_status: 'fetching_transcript' });

      expect(count).toBe(2);
      expect(query.update).toHaveBeenCalledWith({
        enrichment_status: 'fetching_transcript',
        updated_at: expect.any(String)
      });
      expect(query.select).toHaveBeenCalledWith('id');
    });
  });

  describe('ActionItemCreationRepository', () => {
    it('should update calendar sync for the given rows', async () => {
      const repository = new ActionItemCreationRepository('https://test.supabase.co', 'test-key');
      const query = respondWith({ data: null, error: null });

      await repository.updateCalendarSync(['a1', 'a2'], {
        calendar_sync_status: 'synced',
        calendar_event_ref: 'event-1',
        calendar_error: null,
        calendar_syncs: { google_calendar: { status: 'synced', event_ref: 'event-1', error: null } }
      });

      expect(from).toHaveBeenCalledWith('action_item_creations');
      expect(query.update).toHaveBeenCalledWith({
        calendar_sync_status: 'synced',
        calendar_event_ref: 'event-1',
        calendar_error: null,
        calendar_syncs: { google_calendar: { status: 'synced', event_ref: 'event-1', error: null } },
        updated_at: expect.any(String)
      });
      expect(query.in).toHaveBeenCalledWith('id', ['a1', 'a2']);
    });

    it('should skip the update when there are no rows', async () => {
      const repository = new ActionItemCreationRepository('https://test.supabase.co', 'test-key');

      await repository.updateCalendarSync([], {
        calendar_sync_status: 'failed',
        calendar_event_ref: null,
        calendar_error: 'down',
        calendar_syncs: { outlook_calendar: { status: 'failed', event_ref: null, error: 'down' } }
      });

      expect(from).not.toHaveBeenCalled();
    });

    it('should surface unique constraint violations', async () => {
      const repository = new ActionItemCreationRepository('https://test.supabase.co', 'test-key');
      const query = respondWith({ data: null, error: { code: '23505', message: 'duplicate key value' } });

      await expect(
        repository.create({
          meeting_id: 'm1',
          transcription_record_id: 'r1',
          client_reference_id: 'u1',
          task_key: 'send the deck|',
          title: 'Send the deck',
          destination_kind: 'notion',
          destination_ref: 'page-1',
          due_date: null,
          calendar_sync_status: 'not_applicable'
        })
      ).rejects.toThrow('Failed to create action item creation: duplicate key value');
      expect(query.insert).toHaveBeenCalledWith(
        expect.objectContaining({ id: 'generated-id', calendar_event_ref: null, calendar_syncs: {} })
      );
    });
  });

  describe('UserSettingsRepository', () => {
    let repository: UserSettingsRepository;

    beforeEach(() => {
      repository = new UserSettingsRepository('https://test.supabase.co', 'test-key', 'America/New_York');
    });

    it('should map a settings row and keep only complete destinations', async () => {
      respondWith({
        data: {
          client_reference_id: 'u1',
          timezone: null,
          autosync_enabled: true,
          notion: { api_token: 'test-token', database_id: '' },
          monday: { api_token: 'test-token', board_id: 12345, group_id: 'topics' },
          google_calendar: { refresh_token: 'test-refresh-token' },
          outlook_calendar: { access_token: '', refresh_token: 'test-outlook-refresh' }
        },
        error: null
      });

      await expect(repository.getSettings('u1')).resolves.toEqual({
        clientReferenceId: 'u1',
        timezone: 'America/New_York',
        autosyncEnabled: true,
        monday: {
          apiToken: 'test-token',
          boardId: '12345',
          groupId: 'topics',
          statusColumnId: undefined,
          dateColumnId: undefined,
          todoStatusLabel: undefined
        },
        googleCalendar: { accessToken: undefined, refreshToken: 'test-refresh-token', calendarId: undefined },
        outlookCalendar: { accessToken: undefined, refreshToken: 'test-outlook-refresh' }
      });
    });

    it('should return null for an unknown tenant', async () => {
      respondWith({ data: null, error: { code: 'PGRST116', message: 'No rows found' } });

      await expect(repository.getSettings('ghost')).resolves.toBeNull();
    });

    it('should reject rows that cannot be parsed', async () => {
      respondWith({ data: { timezone: 'UTC' }, error: null });

      await expect(repository.getSettings('u1')).rejects.toThrow('Invalid integration settings for u1');
    });
  });
});
