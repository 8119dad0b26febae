import { ActionItemCreationStore, TranscriptionStore, UserSettingsStore } from '../database/stores';
import { NotFoundError } from '../errors';
import { configuredDestinationKinds } from '../integrations/destinationFactory';
import { ActionItemCreation, TranscriptionRecord } from '../types';

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 200;

export interface DestinationSummary {
  client_reference_id: string;
  timezone: string;
  autosync_enabled: boolean;
  destinations: {
    notion: { configured: boolean; database_id: string | null; status_property: string | null; api_token: null };
    monday: { configured: boolean; board_id: string | null; group_id: string | null; api_token: null };
    google_calendar: {
      configured: boolean;
      calendar_id: string | null;
      access_token: null;
      refresh_token: null;
    };
    outlook_calendar: { configured: boolean; access_token: null; refresh_token: null };
  };
}

export function clampLimit(value: unknown): number {
  const parsed = typeof value === 'number' ? value : parseInt(String(value ?? ''), 10);
  if (!Number.isFinite(parsed)) {
    return DEFAULT_LIST_LIMIT;
  }
  return Math.min(Math.max(Math.trunc(parsed), 1), MAX_LIST_LIMIT);
}

export class TranscriptionQueries {
  constructor(
    private transcriptions: TranscriptionStore,
    private actionItems: ActionItemCreationStore,
    private userSettings: UserSettingsStore
  ) {}

  async listRecent(limit?: unknown): Promise<TranscriptionRecord[]> {
    return this.transcriptions.listRecent(clampLimit(limit));
  }

  async getById(id: string): Promise<TranscriptionRecord> {
    const record = await this.transcriptions.getById(id);
    if (!record) {
      throw new NotFoundError(`Transcription record ${id}`);
    }
    return record;
  }

  async getLatestByMeetingId(meetingId: string): Promise<TranscriptionRecord> {
    const record = await this.transcriptions.getLatestByMeetingId(meetingId);
    if (!record) {
      throw new NotFoundError(`Transcription record for meeting ${meetingId}`);
    }
    return record;
  }

  async listActionItems(meetingId: string): Promise<ActionItemCreation[]> {
    return this.actionItems.listByMeetingId(meetingId);
  }

  /**
   * Which destinations a tenant has, with every credential masked. `configured`
   * means the pipeline would dispatch there right now.
   */
  async describeDestinations(clientReferenceId: string): Promise<DestinationSummary> {
    const settings = await this.userSettings.getSettings(clientReferenceId);
    if (!settings) {
      throw new NotFoundError(`Client reference id ${clientReferenceId}`);
    }
    const configured = configuredDestinationKinds(settings);

    return {
      client_reference_id: settings.clientReferenceId,
      timezone: settings.timezone,
      autosync_enabled: settings.autosyncEnabled,
      destinations: {
        notion: {
          configured: configured.has('notion'),
          database_id: settings.notion?.databaseId ?? null,
          status_property: settings.notion?.statusProperty ?? null,
          api_token: null
        },
        monday: {
          configured: configured.has('monday'),
          board_id: settings.monday?.boardId ?? null,
          group_id: settings.monday?.groupId ?? null,
          api_token: null
        },
        google_calendar: {
          configured: configured.has('google_calendar'),
          calendar_id: settings.googleCalendar ? settings.googleCalendar.calendarId || 'primary' : null,
          access_token: null,
          refresh_token: null
        },
        outlook_calendar: {
          configured: configured.has('outlook_calendar'),
          access_token: null,
          refresh_token: null
        }
      }
    };
  }
}
