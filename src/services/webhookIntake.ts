import { TranscriptionStore, UserSettingsStore } from '../database/stores';
import { NotFoundError, ValidationError, getErrorMessage } from '../errors';
import { TranscriptionProvider, WebhookAcceptance } from '../types';
import { EnrichmentOrchestrator } from './enrichmentOrchestrator';
import { isTranscriptionProvider, normalizeWebhook } from './normalizer';
import { verifyWebhookAuth, WebhookHeaders } from './webhookSignature';

export interface IncomingWebhook {
  provider: string;
  clientReferenceId?: string | null;
  rawBody: string | null | undefined;
  headers: WebhookHeaders;
}

export interface WebhookIntakeDeps {
  transcriptions: TranscriptionStore;
  userSettings: UserSettingsStore;
  orchestrator: EnrichmentOrchestrator;
  webhookSecrets: Record<TranscriptionProvider, string>;
  now?: () => Date;
}

export class WebhookIntake {
  private now: () => Date;

  constructor(private deps: WebhookIntakeDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Validates, stores and enriches one webhook delivery.
   * Every rejection happens before the record is written; once it is written
   * the delivery is accepted whatever happens during enrichment.
   */
  async receive(webhook: IncomingWebhook): Promise<WebhookAcceptance> {
    const clientReferenceId = webhook.clientReferenceId?.trim();
    if (!clientReferenceId) {
      throw new ValidationError('Missing client reference id');
    }

    const { provider } = webhook;
    if (!isTranscriptionProvider(provider)) {
      throw new ValidationError(`Unsupported provider: ${provider}`);
    }

    const rawBody = webhook.rawBody ?? '';
    if (!rawBody.trim()) {
      throw new ValidationError('Missing request body');
    }

    verifyWebhookAuth(rawBody, webhook.headers, this.deps.webhookSecrets[provider]);

    let body: unknown;
    try {
      body = JSON.parse(rawBody);
    } catch {
      throw new ValidationError('Invalid JSON payload');
    }

    const settings = await this.deps.userSettings.getSettings(clientReferenceId);
    if (!settings) {
      throw new NotFoundError(`Client reference id ${clientReferenceId}`);
    }

    const event = normalizeWebhook(provider, body, {
      clientReferenceId,
      rawPayload: rawBody,
      receivedAt: this.now().toISOString()
    });

    const record = await this.deps.transcriptions.create(event);
    console.log(
      `Stored ${provider} ${event.eventType} webhook for meeting ${event.meetingId} as record ${record.id}`
    );

    let enrichmentStatus = record.enrichment_status;
    let enrichmentError = record.enrichment_error;
    try {
      const outcome = await this.deps.orchestrator.run(record, settings);
      enrichmentStatus = outcome.status;
      enrichmentError = outcome.error;
    } catch (error) {
      // The record exists, so the delivery is still accepted; the stored status shows where it stopped.
      console.error(`Enrichment aborted for record ${record.id} (meeting ${event.meetingId}):`, error);
      enrichmentError = getErrorMessage(error);
      const stored = await this.deps.transcriptions.getById(record.id).catch(lookupError => {
        console.error(`Failed to reload record ${record.id}:`, lookupError);
        return null;
      });
      if (stored) {
        enrichmentStatus = stored.enrichment_status;
      }
    }

    return {
      status: 'accepted',
      provider,
      event_type: event.eventType,
      meeting_id: event.meetingId,
      client_reference_id: clientReferenceId,
      meeting_platform: event.platform,
      stored_record_id: record.id,
      enrichment_status: enrichmentStatus,
      enrichment_error: enrichmentError,
      received_at: event.receivedAt
    };
  }
}
