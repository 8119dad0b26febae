export type TranscriptionProvider = 'fireflies' | 'read_ai';

export const TRANSCRIPTION_PROVIDERS: readonly TranscriptionProvider[] = ['fireflies', 'read_ai'];

export type MeetingPlatform = 'google_meet' | 'other' | 'unknown';

export type EnrichmentStatus =
  | 'received'
  | 'fetching_transcript'
  | 'transcript_ready'
  | 'extracting_tasks'
  | 'dispatched'
  | 'failed_partial'
  | 'failed';

export type KanbanDestinationKind = 'notion' | 'monday';
export type CalendarDestinationKind = 'google_calendar' | 'outlook_calendar';
export type DestinationKind = KanbanDestinationKind | CalendarDestinationKind;

export const KANBAN_DESTINATION_KINDS: readonly KanbanDestinationKind[] = ['notion', 'monday'];
// Order decides which event ref a row reports when several calendars hold the task.
export const CALENDAR_DESTINATION_KINDS: readonly CalendarDestinationKind[] = [
  'google_calendar',
  'outlook_calendar'
];

export function isKanbanDestination(kind: DestinationKind): kind is KanbanDestinationKind {
  return KANBAN_DESTINATION_KINDS.some(candidate => candidate === kind);
}

export type CalendarSyncStatus = 'not_applicable' | 'pending' | 'synced' | 'failed';

export interface MeetingEvent {
  provider: TranscriptionProvider;
  meetingId: string;
  platform: MeetingPlatform;
  eventType: string;
  rawPayload: string;
  clientReferenceId: string;
  receivedAt: string;
}

export interface TranscriptSentence {
  speaker: string;
  start_time: number | null;
  end_time: number | null;
  text: string;
}

export type DestinationResultStatus = 'created' | 'skipped_existing' | 'failed';

export interface DestinationResult {
  destination: DestinationKind;
  task_key: string;
  task_title: string;
  status: DestinationResultStatus;
  ref: string | null;
  error: string | null;
}

export interface TranscriptionRecord {
  id: string;
  provider: TranscriptionProvider;
  event_type: string;
  meeting_id: string;
  client_reference_id: string;
  meeting_platform: MeetingPlatform;
  raw_payload: string;
  enrichment_status: EnrichmentStatus;
  enrichment_error: string | null;
  transcript_id: string | null;
  transcript_text: string | null;
  transcript_sentences: TranscriptSentence[] | null;
  participant_emails: string[] | null;
  dispatch_results: DestinationResult[] | null;
  received_at: string;
  created_at: string;
  updated_at: string;
}

// Fields the pipeline may change after a record is created.
export type TranscriptionUpdate = Partial<
  Pick<
    TranscriptionRecord,
    | 'enrichment_status'
    | 'enrichment_error'
    | 'transcript_id'
    | 'transcript_text'
    | 'transcript_sentences'
    | 'participant_emails'
    | 'dispatch_results'
  >
>;

export interface ActionItemCreation {
  id: string;
  meeting_id: string;
  transcription_record_id: string;
  client_reference_id: string;
  task_key: string;
  title: string;
  destination_kind: KanbanDestinationKind;
  destination_ref: string;
  due_date: string | null;
  /** Summary across `calendar_syncs`: failed if any calendar failed, synced once every one has. */
  calendar_sync_status: CalendarSyncStatus;
  calendar_event_ref: string | null;
  calendar_error: string | null;
  calendar_syncs: CalendarSyncMap;
  created_at: string;
  updated_at: string;
}

export type NewActionItemCreation = Omit<
  ActionItemCreation,
  'id' | 'calendar_event_ref' | 'calendar_error' | 'calendar_syncs' | 'created_at' | 'updated_at'
>;

export interface CalendarSyncEntry {
  status: 'synced' | 'failed';
  event_ref: string | null;
  error: string | null;
}

export type CalendarSyncMap = Partial<Record<CalendarDestinationKind, CalendarSyncEntry>>;

export interface CalendarSyncUpdate {
  calendar_sync_status: CalendarSyncStatus;
  calendar_event_ref: string | null;
  calendar_error: string | null;
  calendar_syncs: CalendarSyncMap;
}

export interface NotionSettings {
  apiToken: string;
  databaseId: string;
  statusProperty?: string;
  todoStatus?: string;
}

export interface MondaySettings {
  apiToken: string;
  boardId: string;
  groupId?: string;
  statusColumnId?: string;
  dateColumnId?: string;
  todoStatusLabel?: string;
}

export interface GoogleCalendarSettings {
  accessToken?: string;
  refreshToken?: string;
  calendarId?: string;
}

export interface OutlookCalendarSettings {
  accessToken?: string;
  refreshToken?: string;
}

/**
 * Read-only snapshot of one tenant's destinations, fetched once per request
 * and passed down the pipeline.
 */
export interface UserIntegrationSettings {
  clientReferenceId: string;
  timezone: string;
  autosyncEnabled: boolean;
  notion?: NotionSettings;
  monday?: MondaySettings;
  googleCalendar?: GoogleCalendarSettings;
  outlookCalendar?: OutlookCalendarSettings;
}

export interface ExtractedTask {
  title: string;
  assigneeEmail: string | null;
  assigneeName: string | null;
  dueDate: string | null;
  details: string | null;
  sourceSentence: string | null;
}

export interface WebhookAcceptance {
  status: 'accepted';
  provider: TranscriptionProvider;
  event_type: string;
  meeting_id: string;
  client_reference_id: string;
  meeting_platform: MeetingPlatform;
  stored_record_id: string;
  enrichment_status: EnrichmentStatus;
  enrichment_error: string | null;
  received_at: string;
}

export interface BackfillResult {
  meeting_id: string;
  updated_count: number;
  record: TranscriptionRecord;
}
