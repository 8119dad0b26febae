import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';
import { ActionItemCreation, CalendarSyncUpdate, NewActionItemCreation } from '../../types';
import { ActionItemCreationStore } from '../stores';

const TABLE = 'action_item_creations';

export class ActionItemCreationRepository implements ActionItemCreationStore {
  private supabase: SupabaseClient;

  constructor(supabaseUrl?: string, supabaseKey?: string) {
    const url = supabaseUrl || process.env.SUPABASE_URL;
    const key = supabaseKey || process.env.SUPABASE_SERVICE_KEY;

    if (!url || !key) {
      throw new Error('Missing Supabase URL or service key');
    }

    this.supabase = createClient(url, key);
  }

  async create(input: NewActionItemCreation): Promise<ActionItemCreation> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .insert({
        id: uuidv4(),
        ...input,
        calendar_event_ref: null,
        calendar_error: null,
        calendar_syncs: {}
      })
      .select()
      .single();

    if (error) {
      throw new Error(`Failed to create action item creation: ${error.message}`);
    }

    return data;
  }

  async listByMeetingId(meetingId: string): Promise<ActionItemCreation[]> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .select('*')
      .eq('meeting_id', meetingId)
      .order('created_at', { ascending: true });

    if (error) {
      throw new Error(`Failed to list action item creations for meeting ${meetingId}: ${error.message}`);
    }

    return data || [];
  }

  async updateCalendarSync(ids: string[], update: CalendarSyncUpdate): Promise<void> {
    if (ids.length === 0) {
      return;
    }

    const { error } = await this.supabase
      .from(TABLE)
      .update({
        ...update,
        updated_at: new Date().toISOString()
      })
      .in('id', ids);

    if (error) {
      throw new Error(`Failed to update calendar sync status: ${error.message}`);
    }
  }
}
