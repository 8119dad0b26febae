import {
  ActionItemCreation,
  CalendarSyncUpdate,
  MeetingEvent,
  NewActionItemCreation,
  TranscriptionRecord,
  TranscriptionUpdate,
  UserIntegrationSettings
} from '../types';

export interface TranscriptionStore {
  create(event: MeetingEvent): Promise<TranscriptionRecord>;
  getById(id: string): Promise<TranscriptionRecord | null>;
  /** Newest first. */
  listByMeetingId(meetingId: string): Promise<TranscriptionRecord[]>;
  getLatestByMeetingId(meetingId: string): Promise<TranscriptionRecord | null>;
  listRecent(limit: number): Promise<TranscriptionRecord[]>;
  update(id: string, patch: TranscriptionUpdate): Promise<TranscriptionRecord>;
  /** Applies one patch to every record of the meeting and returns how many matched. */
  updateByMeetingId(meetingId: string, patch: TranscriptionUpdate): Promise<number>;
}

export interface ActionItemCreationStore {
  create(input: NewActionItemCreation): Promise<ActionItemCreation>;
  listByMeetingId(meetingId: string): Promise<ActionItemCreation[]>;
  updateCalendarSync(ids: string[], update: CalendarSyncUpdate): Promise<void>;
}

export interface UserSettingsStore {
  getSettings(clientReferenceId: string): Promise<UserIntegrationSettings | null>;
}
