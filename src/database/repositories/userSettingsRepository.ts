import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { UserIntegrationSettings } from '../../types';
import { UserSettingsStore } from '../stores';

const optionalText = z.string().trim().min(1).optional().catch(undefined);

// Destination blocks are written by the settings service as snake_case JSONB.
const settingsRowSchema = z.object({
  client_reference_id: z.string(),
  timezone: z.string().nullish(),
  autosync_enabled: z.boolean().nullish(),
  notion: z
    .object({
      api_token: optionalText,
      database_id: optionalText,
      status_property: optionalText,
      todo_status: optionalText
    })
    .nullish(),
  monday: z
    .object({
      api_token: optionalText,
      board_id: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
      group_id: optionalText,
      status_column_id: optionalText,
      date_column_id: optionalText,
      todo_status_label: optionalText
    })
    .nullish(),
  google_calendar: z
    .object({
      access_token: optionalText,
      refresh_token: optionalText,
      calendar_id: optionalText
    })
    .nullish(),
  outlook_calendar: z
    .object({
      access_token: optionalText,
      refresh_token: optionalText
    })
    .nullish()
});

type SettingsRow = z.infer<typeof settingsRowSchema>;

export function toUserIntegrationSettings(row: SettingsRow, defaultTimezone: string): UserIntegrationSettings {
  const settings: UserIntegrationSettings = {
    clientReferenceId: row.client_reference_id,
    timezone: row.timezone || defaultTimezone,
    autosyncEnabled: row.autosync_enabled ?? true
  };

  if (row.notion?.api_token && row.notion.database_id) {
    settings.notion = {
      apiToken: row.notion.api_token,
      databaseId: row.notion.database_id,
      statusProperty: row.notion.status_property,
      todoStatus: row.notion.todo_status
    };
  }

  if (row.monday?.api_token && row.monday.board_id) {
    settings.monday = {
      apiToken: row.monday.api_token,
      boardId: row.monday.board_id,
      groupId: row.monday.group_id,
      statusColumnId: row.monday.status_column_id,
      dateColumnId: row.monday.date_column_id,
      todoStatusLabel: row.monday.todo_status_label
    };
  }

  const calendar = row.google_calendar;
  if (calendar && (calendar.access_token || calendar.refresh_token)) {
    settings.googleCalendar = {
      accessToken: calendar.access_token,
      refreshToken: calendar.refresh_token,
      calendarId: calendar.calendar_id
    };
  }

  const outlook = row.outlook_calendar;
  if (outlook && (outlook.access_token || outlook.refresh_token)) {
    settings.outlookCalendar = {
      accessToken: outlook.access_token,
      refreshToken: outlook.refresh_token
    };
  }

  return settings;
}

export class UserSettingsRepository implements UserSettingsStore {
  private supabase: SupabaseClient;

  constructor(
    supabaseUrl?: string,
    supabaseKey?: string,
    private defaultTimezone: string = 'UTC'
  ) {
    const url = supabaseUrl || process.env.SUPABASE_URL;
    const key = supabaseKey || process.env.SUPABASE_SERVICE_KEY;

    if (!url || !key) {
      throw new Error('Missing Supabase URL or service key');
    }

    this.supabase = createClient(url, key);
  }

  async getSettings(clientReferenceId: string): Promise<UserIntegrationSettings | null> {
    const { data, error } = await this.supabase
      .from('user_integration_settings')
      .select('*')
      .eq('client_reference_id', clientReferenceId)
      .single();

    if (error) {
      if (error.code === 'PGRST116') {
        return null; // Unknown tenant
      }
      throw new Error(`Failed to load integration settings: ${error.message}`);
    }

    const parsed = settingsRowSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(
        `Invalid integration settings for ${clientReferenceId}: ${fromZodError(parsed.error).message}`
      );
    }

    return toUserIntegrationSettings(parsed.data, this.defaultTimezone);
  }
}
