import {
  CalendarDestinationKind,
  ExtractedTask,
  KanbanDestinationKind,
  TranscriptSentence,
  TranscriptionProvider
} from '../../types';

export interface FetchedTranscript {
  transcriptId: string | null;
  text: string | null;
  sentences: TranscriptSentence[];
  participantEmails: string[];
  /** When the meeting took place, as an ISO timestamp, if the provider reports it. */
  meetingDate: string | null;
}

export interface TranscriptFetcher {
  readonly name: TranscriptionProvider;

  fetchTranscript(meetingId: string): Promise<FetchedTranscript>;
}

export interface TaskExtractionInput {
  meetingId: string;
  transcriptText: string;
  participantEmails: string[];
  timezone: string;
  /** The meeting's calendar day in the tenant's timezone; relative dates resolve against it. */
  referenceDate: string;
}

export interface TaskExtractor {
  extractTasks(input: TaskExtractionInput): Promise<ExtractedTask[]>;
}

export interface CardContext {
  meetingId: string;
}

export interface KanbanDestination {
  readonly kind: KanbanDestinationKind;

  /** Returns the provider's id for the created card or page. */
  createCard(task: ExtractedTask, context: CardContext): Promise<string>;
}

export interface CalendarEventContext {
  meetingId: string;
  timezone: string;
}

export interface CalendarDestination {
  readonly kind: CalendarDestinationKind;

  /** Returns the provider's event id. */
  createEvent(task: ExtractedTask, context: CalendarEventContext): Promise<string>;
}

export interface TokenProvider {
  getAccessToken(forceRefresh?: boolean): Promise<string>;
}

export interface ConfiguredDestinations {
  kanban: KanbanDestination[];
  calendars: CalendarDestination[];
}
