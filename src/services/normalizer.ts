import { ValidationError } from '../errors';
import {
  MeetingEvent,
  MeetingPlatform,
  TRANSCRIPTION_PROVIDERS,
  TranscriptionProvider
} from '../types';
import { firstString, isJsonObject, JsonObject } from '../utils/json';

export interface NormalizeContext {
  clientReferenceId: string;
  rawPayload: string;
  receivedAt: string;
}

type NormalizedFields = Pick<MeetingEvent, 'meetingId' | 'eventType' | 'platform'>;

type ProviderNormalizer = (body: JsonObject) => NormalizedFields;

const FIREFLIES_MEETING_ID_PATHS = ['meetingId', 'meeting_id', 'meeting.id', 'transcriptId', 'transcript_id'];
const FIREFLIES_EVENT_PATHS = ['eventType', 'event_type', 'event'];

const READ_AI_MEETING_ID_PATHS = ['session_id', 'meeting.id', 'meeting_id', 'meetingId', 'id'];
const READ_AI_EVENT_PATHS = ['trigger', 'event_type', 'eventType', 'event'];

const GOOGLE_MEET_PLATFORM_NAMES = new Set(['google_meet', 'google meet', 'googlemeet', 'meet', 'google-meet']);

/** Event types that mean the provider has a finished transcript to fetch. */
const COMPLETION_EVENTS: Record<TranscriptionProvider, readonly string[]> = {
  fireflies: ['transcription_completed'],
  read_ai: ['meeting_end']
};

export function isTranscriptionProvider(value: string): value is TranscriptionProvider {
  return TRANSCRIPTION_PROVIDERS.some(provider => provider === value);
}

export function normalizeEventType(value: string | null): string {
  if (!value) {
    return 'unknown';
  }
  const normalized = value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return normalized || 'unknown';
}

export function isCompletionEvent(provider: TranscriptionProvider, eventType: string): boolean {
  return COMPLETION_EVENTS[provider].includes(eventType);
}

export function detectPlatform(body: JsonObject): MeetingPlatform {
  const platform = firstString(body, ['meeting.platform']);
  if (platform) {
    return GOOGLE_MEET_PLATFORM_NAMES.has(platform.toLowerCase()) ? 'google_meet' : 'other';
  }

  const url = firstString(body, ['meeting.url', 'meeting.join_url']);
  if (url && url.toLowerCase().includes('meet.google.com')) {
    return 'google_meet';
  }

  return 'unknown';
}

function requireMeetingId(provider: TranscriptionProvider, body: JsonObject, paths: string[]): string {
  const meetingId = firstString(body, paths);
  if (!meetingId) {
    throw new ValidationError(`Missing meeting id in ${provider} payload`);
  }
  return meetingId;
}

const normalizeFireflies: ProviderNormalizer = body => ({
  meetingId: requireMeetingId('fireflies', body, FIREFLIES_MEETING_ID_PATHS),
  eventType: normalizeEventType(firstString(body, FIREFLIES_EVENT_PATHS)),
  platform: detectPlatform(body)
});

const normalizeReadAi: ProviderNormalizer = body => ({
  meetingId: requireMeetingId('read_ai', body, READ_AI_MEETING_ID_PATHS),
  eventType: normalizeEventType(firstString(body, READ_AI_EVENT_PATHS)),
  platform: detectPlatform(body)
});

const NORMALIZERS: Record<TranscriptionProvider, ProviderNormalizer> = {
  fireflies: normalizeFireflies,
  read_ai: normalizeReadAi
};

/**
 * Maps a provider's webhook body onto the canonical MeetingEvent.
 *
 * The tenant always comes from the route via `context`; payload fields such as
 * `clientReferenceId` are never used to pick one.
 */
export function normalizeWebhook(provider: string, body: unknown, context: NormalizeContext): MeetingEvent {
  if (!isTranscriptionProvider(provider)) {
    throw new ValidationError(`Unsupported provider: ${provider}`);
  }
  if (!isJsonObject(body)) {
    throw new ValidationError('Webhook payload must be a JSON object');
  }

  const fields = NORMALIZERS[provider](body);

  return {
    provider,
    ...fields,
    rawPayload: context.rawPayload,
    clientReferenceId: context.clientReferenceId,
    receivedAt: context.receivedAt
  };
}
