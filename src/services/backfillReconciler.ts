import { TranscriptionStore, UserSettingsStore } from '../database/stores';
import { NotFoundError, ValidationError } from '../errors';
import { BackfillResult } from '../types';
import { EnrichmentOrchestrator } from './enrichmentOrchestrator';

/**
 * Re-fetches the transcript for a meeting and re-runs enrichment on the
 * records already stored for it. Records are updated in place; the
 * dispatcher skips tasks that already reached a destination.
 */
export class BackfillReconciler {
  constructor(
    private transcriptions: TranscriptionStore,
    private userSettings: UserSettingsStore,
    private orchestrator: EnrichmentOrchestrator
  ) {}

  async backfill(meetingId: string): Promise<BackfillResult> {
    const records = await this.transcriptions.listByMeetingId(meetingId);
    if (records.length === 0) {
      throw new NotFoundError(`Transcription record for meeting ${meetingId}`);
    }

    const latest = records[0];
    if (!this.orchestrator.fetcherFor(latest.provider)) {
      throw new ValidationError(`Backfill is not supported for provider ${latest.provider}`);
    }

    const settings = await this.userSettings.getSettings(latest.client_reference_id);
    if (!settings) {
      console.warn(`No integration settings for ${latest.client_reference_id}; backfilling ${meetingId} without fan-out`);
    }

    let updatedCount = 0;
    const outcome = await this.orchestrator.process(latest, settings, async patch => {
      updatedCount = await this.transcriptions.updateByMeetingId(meetingId, patch);
    });
    console.log(`Backfill for meeting ${meetingId} finished as ${outcome.status} (${updatedCount} records)`);

    const record = await this.transcriptions.getLatestByMeetingId(meetingId);
    if (!record) {
      throw new NotFoundError(`Transcription record for meeting ${meetingId}`);
    }

    return { meeting_id: meetingId, updated_count: updatedCount, record };
  }
}
