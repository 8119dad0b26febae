import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';
import { MeetingEvent, TranscriptionRecord, TranscriptionUpdate } from '../../types';
import { TranscriptionStore } from '../stores';

const TABLE = 'transcription_records';

export class TranscriptionRepository implements TranscriptionStore {
  private supabase: SupabaseClient;

  constructor(supabaseUrl?: string, supabaseKey?: string) {
    const url = supabaseUrl || process.env.SUPABASE_URL;
    const key = supabaseKey || process.env.SUPABASE_SERVICE_KEY;

    if (!url || !key) {
      throw new Error('Missing Supabase URL or service key');
    }

    this.supabase = createClient(url, key);
  }

  async create(event: MeetingEvent): Promise<TranscriptionRecord> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .insert({
        id: uuidv4(),
        provider: event.provider,
        event_type: event.eventType,
        meeting_id: event.meetingId,
        client_reference_id: event.clientReferenceId,
        meeting_platform: event.platform,
        raw_payload: event.rawPayload,
        enrichment_status: 'received',
        received_at: event.receivedAt
      })
      .select()
      .single();

    if (error) {
      throw new Error(`Failed to create transcription record: ${error.message}`);
    }

    return data;
  }

  async getById(id: string): Promise<TranscriptionRecord | null> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .select('*')
      .eq('id', id)
      .single();

    if (error) {
      if (error.code === 'PGRST116') {
        return null; // Not found
      }
      throw new Error(`Failed to get transcription record: ${error.message}`);
    }

    return data;
  }

  async listByMeetingId(meetingId: string): Promise<TranscriptionRecord[]> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .select('*')
      .eq('meeting_id', meetingId)
      .order('received_at', { ascending: false });

    if (error) {
      throw new Error(`Failed to list transcription records for meeting ${meetingId}: ${error.message}`);
    }

    return data || [];
  }

  async getLatestByMeetingId(meetingId: string): Promise<TranscriptionRecord | null> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .select('*')
      .eq('meeting_id', meetingId)
      .order('received_at', { ascending: false })
      .limit(1);

    if (error) {
      throw new Error(`Failed to get latest transcription record for meeting ${meetingId}: ${error.message}`);
    }

    return data && data.length > 0 ? data[0] : null;
  }

  async listRecent(limit: number): Promise<TranscriptionRecord[]> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .select('*')
      .order('received_at', { ascending: false })
      .limit(limit);

    if (error) {
      throw new Error(`Failed to list transcription records: ${error.message}`);
    }

    return data || [];
  }

  async update(id: string, patch: TranscriptionUpdate): Promise<TranscriptionRecord> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .update({
        ...patch,
        updated_at: new Date().toISOString()
      })
      .eq('id', id)
      .select()
      .single();

    if (error) {
      throw new Error(`Failed to update transcription record ${id}: ${error.message}`);
    }

    return data;
  }

  async updateByMeetingId(meetingId: string, patch: TranscriptionUpdate): Promise<number> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .update({
        ...patch,
        updated_at: new Date().toISOString()
      })
      .eq('meeting_id', meetingId)
      .select('id');

    if (error) {
      throw new Error(`Failed to update transcription records for meeting ${meetingId}: ${error.message}`);
    }

    return data ? data.length : 0;
  }
}
