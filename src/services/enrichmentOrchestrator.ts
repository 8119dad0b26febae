import { FetchedTranscript, TaskExtractor, TranscriptFetcher } from '../integrations/base/capabilities';
import { DestinationResolver } from '../integrations/destinationFactory';
import { TranscriptionStore } from '../database/stores';
import { getErrorMessage } from '../errors';
import {
  EnrichmentStatus,
  ExtractedTask,
  isKanbanDestination,
  TranscriptionProvider,
  TranscriptionRecord,
  TranscriptionUpdate,
  UserIntegrationSettings
} from '../types';
import { toLocalIsoDate } from './actionItems';
import { DestinationDispatcher, DispatchSummary } from './destinationDispatcher';
import { isCompletionEvent } from './normalizer';

/** One atomic state write, either to a single record or to every record of a meeting. */
export type RecordWriter = (patch: TranscriptionUpdate) => Promise<void>;

export interface EnrichmentOutcome {
  status: EnrichmentStatus;
  error: string | null;
  dispatch: DispatchSummary | null;
}

export interface EnrichmentOrchestratorDeps {
  transcriptions: TranscriptionStore;
  fetchers: Partial<Record<TranscriptionProvider, TranscriptFetcher>>;
  extractor: TaskExtractor | null;
  dispatcher: DestinationDispatcher;
  resolveDestinations: DestinationResolver;
  defaultTimezone: string;
}

/**
 * Drives a transcription record through
 * received → fetching_transcript → transcript_ready → extracting_tasks → dispatched.
 *
 * Fetch errors end in `failed`; extraction errors and Kanban failures end in
 * `failed_partial`. Both are retried only through backfill.
 */
export class EnrichmentOrchestrator {
  constructor(private deps: EnrichmentOrchestratorDeps) {}

  fetcherFor(provider: TranscriptionProvider): TranscriptFetcher | null {
    return this.deps.fetchers[provider] ?? null;
  }

  /** Webhook path: only completion events from providers with a fetcher advance. */
  async run(record: TranscriptionRecord, settings: UserIntegrationSettings | null): Promise<EnrichmentOutcome> {
    if (!this.fetcherFor(record.provider) || !isCompletionEvent(record.provider, record.event_type)) {
      console.log(
        `Record ${record.id} (${record.provider}/${record.event_type}) does not qualify for transcript fetch`
      );
      return { status: record.enrichment_status, error: record.enrichment_error, dispatch: null };
    }

    return this.process(record, settings, async patch => {
      await this.deps.transcriptions.update(record.id, patch);
    });
  }

  async process(
    record: TranscriptionRecord,
    settings: UserIntegrationSettings | null,
    write: RecordWriter
  ): Promise<EnrichmentOutcome> {
    const fetcher = this.fetcherFor(record.provider);
    if (!fetcher) {
      return { status: record.enrichment_status, error: record.enrichment_error, dispatch: null };
    }

    const meetingId = record.meeting_id;
    await write({ enrichment_status: 'fetching_transcript' });

    let transcript: FetchedTranscript;
    try {
      transcript = await fetcher.fetchTranscript(meetingId);
    } catch (error) {
      const message = getErrorMessage(error);
      console.error(`Transcript fetch failed for meeting ${meetingId}:`, message);
      await write({ enrichment_status: 'failed', enrichment_error: message });
      return { status: 'failed', error: message, dispatch: null };
    }

    // Text, sentences and emails land in the same write as the status change.
    await write({
      enrichment_status: 'transcript_ready',
      enrichment_error: null,
      transcript_id: transcript.transcriptId,
      transcript_text: transcript.text,
      transcript_sentences: transcript.sentences,
      participant_emails: transcript.participantEmails
    });
    console.log(`Transcript ready for meeting ${meetingId}: ${transcript.sentences.length} sentences`);

    const destinations = this.deps.resolveDestinations(settings);
    const extractor = this.deps.extractor;
    const transcriptText = transcript.text;
    if (!extractor || destinations.kanban.length === 0 || !transcriptText) {
      console.log(`Meeting ${meetingId} stored without fan-out (no extractor, destinations or transcript text)`);
      return { status: 'transcript_ready', error: null, dispatch: null };
    }

    const timezone = settings?.timezone || this.deps.defaultTimezone;
    // Anchored to the meeting, not the clock, so a later backfill builds the same task keys.
    const referenceDate =
      toLocalIsoDate(transcript.meetingDate, timezone) ??
      toLocalIsoDate(record.received_at, timezone) ??
      record.received_at.slice(0, 10);
    await write({ enrichment_status: 'extracting_tasks' });

    let tasks: ExtractedTask[];
    try {
      tasks = await extractor.extractTasks({
        meetingId,
        transcriptText,
        participantEmails: transcript.participantEmails,
        timezone,
        referenceDate
      });
    } catch (error) {
      const message = getErrorMessage(error);
      console.error(`Task extraction failed for meeting ${meetingId}:`, message);
      await write({ enrichment_status: 'failed_partial', enrichment_error: message });
      return { status: 'failed_partial', error: message, dispatch: null };
    }

    const dispatch = await this.deps.dispatcher.dispatch({
      meetingId,
      recordId: record.id,
      clientReferenceId: record.client_reference_id,
      timezone,
      tasks,
      destinations
    });

    // A card that exists but could not be recorded carries an error without being `failed`.
    const kanbanFailures = dispatch.results.filter(
      result => isKanbanDestination(result.destination) && (result.status === 'failed' || result.error !== null)
    );
    const status: EnrichmentStatus = kanbanFailures.length > 0 ? 'failed_partial' : 'dispatched';
    const error =
      kanbanFailures.length > 0
        ? kanbanFailures.map(result => result.error).join('; ')
        : null;

    await write({ enrichment_status: status, enrichment_error: error, dispatch_results: dispatch.results });
    console.log(
      `Meeting ${meetingId} ${status}: ${tasks.length} tasks, ${dispatch.createdCount} created, ${dispatch.failedCount} failed`
    );

    return { status, error, dispatch };
  }
}
