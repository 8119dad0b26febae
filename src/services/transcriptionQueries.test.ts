import { clampLimit, TranscriptionQueries } from './transcriptionQueries';
import {
  InMemoryActionItemCreationStore,
  InMemoryTranscriptionStore,
  InMemoryUserSettingsStore
} from '../database/memory/inMemoryStores';
import { NotFoundError } from '../errors';
import { MeetingEvent } from '../types';
import { buildSettings } from '../test/fakes';

describe('TranscriptionQueries', () => {
  let transcriptions: InMemoryTranscriptionStore;
  let actionItems: InMemoryActionItemCreationStore;
  let queries: TranscriptionQueries;

  const event = (meetingId: string): MeetingEvent => ({
    provider: 'fireflies',
    meetingId,
    platform: 'unknown',
    eventType: 'transcription_completed',
    rawPayload: '{}',
    clientReferenceId: 'u1',
    receivedAt: '2024-01-08T09:00:00.000Z'
  });

  beforeEach(() => {
    transcriptions = new InMemoryTranscriptionStore();
    actionItems = new InMemoryActionItemCreationStore();
    const userSettings = new InMemoryUserSettingsStore([
      buildSettings({
        timezone: 'Europe/Paris',
        monday: { apiToken: 'test-token', boardId: 'b1', groupId: 'topics' },
        googleCalendar: { accessToken: 'test-access-token', refreshToken: 'test-refresh-token' }
      })
    ]);
    queries = new TranscriptionQueries(transcriptions, actionItems, userSettings);
  });

  describe('clampLimit', () => {
    it('should default and clamp the page size', () => {
      expect(clampLimit(undefined)).toBe(50);
      expect(clampLimit('abc')).toBe(50);
      expect(clampLimit('0')).toBe(1);
      expect(clampLimit('-5')).toBe(1);
      expect(clampLimit('10')).toBe(10);
      expect(clampLimit(1000)).toBe(200);
    });
  });

  it('should list the newest records first', async () => {
    await transcriptions.create(event('m1'));
    await transcriptions.create(event('m2'));
    await transcriptions.create(event('m3'));

    const records = await queries.listRecent('2');

    expect(records.map(record => record.meeting_id)).toEqual(['m3', 'm2']);
  });

  it('should return the latest record for a meeting', async () => {
    await transcriptions.create(event('m1'));
    const latest = await transcriptions.create({ ...event('m1'), eventType: 'meeting_ended' });

    await expect(queries.getLatestByMeetingId('m1')).resolves.toEqual(latest);
  });

  it('should raise NotFoundError for missing records', async () => {
    await expect(queries.getById('nope')).rejects.toBeInstanceOf(NotFoundError);
    await expect(queries.getLatestByMeetingId('nope')).rejects.toThrow(
      'Transcription record for meeting nope not found'
    );
  });

  it('should list action item creations for a meeting', async () => {
    await actionItems.create({
      meeting_id: 'm1',
      transcription_record_id: 'r1',
      client_reference_id: 'u1',
      task_key: 'send the deck|',
      title: 'Send the deck',
      destination_kind: 'notion',
      destination_ref: 'page-1',
      due_date: null,
      calendar_sync_status: 'not_applicable'
    });

    const rows = await queries.listActionItems('m1');

    expect(rows.map(row => row.destination_ref)).toEqual(['page-1']);
    expect(await queries.listActionItems('m2')).toEqual([]);
  });

  it('should describe destinations without credentials', async () => {
    await expect(queries.describeDestinations('u1')).resolves.toEqual({
      client_reference_id: 'u1',
      timezone: 'Europe/Paris',
      autosync_enabled: true,
      destinations: {
        notion: { configured: true, database_id: 'db-1', status_property: null, api_token: null },
        monday: { configured: true, board_id: 'b1', group_id: 'topics', api_token: null },
        google_calendar: { configured: true, calendar_id: 'primary', access_token: null, refresh_token: null },
        outlook_calendar: { configured: false, access_token: null, refresh_token: null }
      }
    });
  });

  it('should report nothing configured while autosync is off', async () => {
    const userSettings = new InMemoryUserSettingsStore([
      buildSettings({ clientReferenceId: 'u2', autosyncEnabled: false, outlookCalendar: { refreshToken: 'test-refresh-token' } })
    ]);
    queries = new TranscriptionQueries(transcriptions, actionItems, userSettings);

    const summary = await queries.describeDestinations('u2');

    expect(summary.autosync_enabled).toBe(false);
    expect(Object.values(summary.destinations).map(destination => destination.configured)).toEqual([
      false,
      false,
      false,
      false
    ]);
    expect(summary.destinations.notion.database_id).toBe('db-1');
  });

  it('should not report incomplete credentials as configured', async () => {
    const userSettings = new InMemoryUserSettingsStore([
      buildSettings({
        clientReferenceId: 'u3',
        notion: { apiToken: ' ', databaseId: 'db-1' },
        googleCalendar: { calendarId: 'team@example.com' },
        outlookCalendar: { accessToken: 'test-access-token' }
      })
    ]);
    queries = new TranscriptionQueries(transcriptions, actionItems, userSettings);

    const { destinations } = await queries.describeDestinations('u3');

    expect(destinations.notion.configured).toBe(false);
    expect(destinations.google_calendar).toEqual({
      configured: false,
      calendar_id: 'team@example.com',
      access_token: null,
      refresh_token: null
    });
    expect(destinations.outlook_calendar.configured).toBe(true);
  });

  it('should raise NotFoundError for an unknown tenant', async () => {
    await expect(queries.describeDestinations('ghost')).rejects.toThrow('Client reference id ghost not found');
  });
});
