import { v4 as uuidv4 } from 'uuid';
import {
  ActionItemCreation,
  CalendarSyncUpdate,
  MeetingEvent,
  NewActionItemCreation,
  TranscriptionRecord,
  TranscriptionUpdate,
  UserIntegrationSettings
} from '../../types';
import { ActionItemCreationStore, TranscriptionStore, UserSettingsStore } from '../stores';

// Records are cloned on the way in and out so callers never share state with the store.

export class InMemoryTranscriptionStore implements TranscriptionStore {
  private records: TranscriptionRecord[] = [];

  async create(event: MeetingEvent): Promise<TranscriptionRecord> {
    const now = new Date().toISOString();
    const record: TranscriptionRecord = {
      id: uuidv4(),
      provider: event.provider,
      event_type: event.eventType,
      meeting_id: event.meetingId,
      client_reference_id: event.clientReferenceId,
      meeting_platform: event.platform,
      raw_payload: event.rawPayload,
      enrichment_status: 'received',
      enrichment_error: null,
      transcript_id: null,
      transcript_text: null,
      transcript_sentences: null,
      participant_emails: null,
      dispatch_results: null,
      received_at: event.receivedAt,
      created_at: now,
      updated_at: now
    };
    this.records.push(record);
    return structuredClone(record);
  }

  async getById(id: string): Promise<TranscriptionRecord | null> {
    const record = this.records.find(candidate => candidate.id === id);
    return record ? structuredClone(record) : null;
  }

  async listByMeetingId(meetingId: string): Promise<TranscriptionRecord[]> {
    return this.records
      .filter(record => record.meeting_id === meetingId)
      .reverse()
      .map(record => structuredClone(record));
  }

  async getLatestByMeetingId(meetingId: string): Promise<TranscriptionRecord | null> {
    const [latest] = await this.listByMeetingId(meetingId);
    return latest ?? null;
  }

  async listRecent(limit: number): Promise<TranscriptionRecord[]> {
    return this.records
      .slice()
      .reverse()
      .slice(0, limit)
      .map(record => structuredClone(record));
  }

  async update(id: string, patch: TranscriptionUpdate): Promise<TranscriptionRecord> {
    const index = this.records.findIndex(record => record.id === id);
    if (index === -1) {
      throw new Error(`Failed to update transcription record ${id}: not found`);
    }
    const updated: TranscriptionRecord = {
      ...this.records[index],
      ...structuredClone(patch),
      updated_at: new Date().toISOString()
    };
    this.records[index] = updated;
    return structuredClone(updated);
  }

  async updateByMeetingId(meetingId: string, patch: TranscriptionUpdate): Promise<number> {
    let count = 0;
    this.records = this.records.map(record => {
      if (record.meeting_id !== meetingId) {
        return record;
      }
      count += 1;
      return { ...record, ...structuredClone(patch), updated_at: new Date().toISOString() };
    });
    return count;
  }
}

export class InMemoryActionItemCreationStore implements ActionItemCreationStore {
  private rows: ActionItemCreation[] = [];

  async create(input: NewActionItemCreation): Promise<ActionItemCreation> {
    const duplicate = this.rows.some(
      row =>
        row.meeting_id === input.meeting_id &&
        row.destination_kind === input.destination_kind &&
        row.task_key === input.task_key
    );
    if (duplicate) {
      throw new Error(
        `Failed to create action item creation: duplicate ${input.destination_kind} row for ${input.task_key}`
      );
    }

    const now = new Date().toISOString();
    const row: ActionItemCreation = {
      id: uuidv4(),
      ...input,
      calendar_event_ref: null,
      calendar_error: null,
      calendar_syncs: {},
      created_at: now,
      updated_at: now
    };
    this.rows.push(row);
    return structuredClone(row);
  }

  async listByMeetingId(meetingId: string): Promise<ActionItemCreation[]> {
    return this.rows.filter(row => row.meeting_id === meetingId).map(row => structuredClone(row));
  }

  async updateCalendarSync(ids: string[], update: CalendarSyncUpdate): Promise<void> {
    this.rows = this.rows.map(row =>
      ids.includes(row.id) ? { ...row, ...update, updated_at: new Date().toISOString() } : row
    );
  }
}

export class InMemoryUserSettingsStore implements UserSettingsStore {
  private settings = new Map<string, UserIntegrationSettings>();

  constructor(initial: UserIntegrationSettings[] = []) {
    initial.forEach(entry => this.put(entry));
  }

  put(settings: UserIntegrationSettings): void {
    this.settings.set(settings.clientReferenceId, structuredClone(settings));
  }

  async getSettings(clientReferenceId: string): Promise<UserIntegrationSettings | null> {
    const settings = this.settings.get(clientReferenceId);
    return settings ? structuredClone(settings) : null;
  }
}
