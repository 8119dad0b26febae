import {
  addDays,
  buildTaskKey,
  normalizeExtractedTasks,
  summarizeCalendarSyncs,
  toIsoDate,
  toLocalIsoDate
} from './actionItems';

describe('actionItems', () => {
  describe('toIsoDate', () => {
    it('should accept real calendar days only', () => {
      expect(toIsoDate('2024-01-10')).toBe('2024-01-10');
      expect(toIsoDate(' 2024-02-29 ')).toBe('2024-02-29');
      expect(toIsoDate('2023-02-29')).toBeNull();
      expect(toIsoDate('10/01/2024')).toBeNull();
      expect(toIsoDate(null)).toBeNull();
    });
  });

  describe('addDays', () => {
    it('should roll over month and year boundaries', () => {
      expect(addDays('2024-01-10', 1)).toBe('2024-01-11');
      expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
    });
  });

  describe('toLocalIsoDate', () => {
    it('should give the calendar day in the tenant timezone', () => {
      expect(toLocalIsoDate('2024-01-08T23:30:00.000Z', 'Asia/Tokyo')).toBe('2024-01-09');
      expect(toLocalIsoDate('2024-01-08T23:30:00.000Z', 'America/New_York')).toBe('2024-01-08');
      expect(toLocalIsoDate('2024-01-08T23:30:00.000Z', 'UTC')).toBe('2024-01-08');
    });

    it('should use the UTC day for unknown timezones', () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

      expect(toLocalIsoDate('2024-01-08T23:30:00.000Z', 'Mars/Olympus')).toBe('2024-01-08');
      warn.mockRestore();
    });

    it('should return null for missing or unparseable instants', () => {
      expect(toLocalIsoDate(null, 'UTC')).toBeNull();
      expect(toLocalIsoDate('yesterday', 'UTC')).toBeNull();
    });
  });

  describe('buildTaskKey', () => {
    it('should ignore case, accents and spacing in titles', () => {
      expect(buildTaskKey({ title: '  Envoyer   le Résumé ', dueDate: '2024-01-10' })).toBe(
        'envoyer le resume|2024-01-10'
      );
      expect(buildTaskKey({ title: 'Send recap', dueDate: null })).toBe('send recap|');
    });
  });

  describe('summarizeCalendarSyncs', () => {
    it('should be pending before any calendar has been tried', () => {
      expect(summarizeCalendarSyncs({})).toEqual({
        calendar_sync_status: 'pending',
        calendar_event_ref: null,
        calendar_error: null,
        calendar_syncs: {}
      });
    });

    it('should report a failure while keeping the event ref of the calendar that synced', () => {
      const syncs = {
        outlook_calendar: { status: 'failed' as const, event_ref: null, error: 'outlook_calendar error: down' },
        google_calendar: { status: 'synced' as const, event_ref: 'event-1', error: null }
      };

      expect(summarizeCalendarSyncs(syncs)).toEqual({
        calendar_sync_status: 'failed',
        calendar_event_ref: 'event-1',
        calendar_error: 'outlook_calendar error: down',
        calendar_syncs: syncs
      });
    });

    it('should prefer the Google event ref once every calendar synced', () => {
      const summary = summarizeCalendarSyncs({
        outlook_calendar: { status: 'synced', event_ref: 'AAMkAD-1', error: null },
        google_calendar: { status: 'synced', event_ref: 'event-1', error: null }
      });

      expect([summary.calendar_sync_status, summary.calendar_event_ref]).toEqual(['synced', 'event-1']);
    });
  });

  describe('normalizeExtractedTasks', () => {
    it('should clean fields and drop untitled or duplicate items', () => {
      const tasks = normalizeExtractedTasks([
        {
          title: ' Send   the deck ',
          assignee_email: ' Ana@Example.com ',
          assignee_name: 'Ana',
          due_date: '2024-01-10',
          details: '',
          source_sentence: 'I will send the deck by Wednesday.'
        },
        { title: 'send the deck', due_date: '2024-01-10' },
        { title: '   ' },
        { title: 'Book venue', assignee_email: 'not-an-email', due_date: 'next week' }
      ]);

      expect(tasks).toEqual([
        {
          title: 'Send the deck',
          assigneeEmail: 'ana@example.com',
          assigneeName: 'Ana',
          dueDate: '2024-01-10',
          details: null,
          sourceSentence: 'I will send the deck by Wednesday.'
        },
        {
          title: 'Book venue',
          assigneeEmail: null,
          assigneeName: null,
          dueDate: null,
          details: null,
          sourceSentence: null
        }
      ]);
    });
  });
});
