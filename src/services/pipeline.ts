import OpenAI from 'openai';
import { AppConfig } from '../config';
import { createStores, Stores } from '../database';
import { TaskExtractor } from '../integrations/base/capabilities';
import { createDestinationResolver, DestinationResolver } from '../integrations/destinationFactory';
import { FirefliesClient } from '../integrations/fireflies/firefliesClient';
import { createOpenAiCompletion, LlmTaskExtractor } from '../integrations/openai/llmTaskExtractor';
import { BackfillReconciler } from './backfillReconciler';
import { DestinationDispatcher } from './destinationDispatcher';
import { EnrichmentOrchestrator } from './enrichmentOrchestrator';
import { TranscriptionQueries } from './transcriptionQueries';
import { WebhookIntake } from './webhookIntake';

export interface Pipeline {
  stores: Stores;
  orchestrator: EnrichmentOrchestrator;
  intake: WebhookIntake;
  backfill: BackfillReconciler;
  queries: TranscriptionQueries;
}

function createTaskExtractor(appConfig: AppConfig): TaskExtractor | null {
  if (!appConfig.llm.openaiApiKey) {
    return null;
  }
  // Retries would stretch the webhook past the provider's delivery timeout.
  const client = new OpenAI({
    apiKey: appConfig.llm.openaiApiKey,
    timeout: appConfig.llm.timeoutMs,
    maxRetries: 0
  });
  return new LlmTaskExtractor(createOpenAiCompletion(client, { model: appConfig.llm.model }));
}

function createResolver(appConfig: AppConfig): DestinationResolver {
  return createDestinationResolver({
    notion: {
      apiUrl: appConfig.notion.apiUrl,
      version: appConfig.notion.version,
      timeoutMs: appConfig.notion.timeoutMs
    },
    monday: {
      apiUrl: appConfig.monday.apiUrl,
      apiVersion: appConfig.monday.apiVersion,
      timeoutMs: appConfig.monday.timeoutMs
    },
    googleCalendar: {
      apiUrl: appConfig.googleCalendar.apiUrl,
      timeoutMs: appConfig.googleCalendar.timeoutMs
    },
    googleOAuth: {
      clientId: appConfig.googleCalendar.clientId,
      clientSecret: appConfig.googleCalendar.clientSecret,
      tokenUrl: appConfig.googleCalendar.tokenUrl,
      timeoutMs: appConfig.googleCalendar.timeoutMs
    },
    outlookCalendar: {
      apiUrl: appConfig.outlook.apiUrl,
      timeoutMs: appConfig.outlook.timeoutMs
    },
    outlookOAuth: {
      clientId: appConfig.outlook.clientId,
      clientSecret: appConfig.outlook.clientSecret,
      tenantId: appConfig.outlook.tenantId,
      tokenUrl: appConfig.outlook.tokenUrl,
      timeoutMs: appConfig.outlook.timeoutMs
    }
  });
}

/** Wires stores, provider clients and services from one configuration. */
export function createPipeline(appConfig: AppConfig, stores: Stores = createStores(appConfig)): Pipeline {
  const fireflies = new FirefliesClient(appConfig.fireflies.secretName, appConfig.aws.region, {
    endpoint: appConfig.fireflies.endpoint,
    timeoutMs: appConfig.fireflies.timeoutMs,
    apiKey: appConfig.fireflies.apiKey
  });

  const orchestrator = new EnrichmentOrchestrator({
    transcriptions: stores.transcriptions,
    fetchers: { fireflies },
    extractor: createTaskExtractor(appConfig),
    dispatcher: new DestinationDispatcher(stores.actionItems),
    resolveDestinations: createResolver(appConfig),
    defaultTimezone: appConfig.defaultTimezone
  });

  return {
    stores,
    orchestrator,
    intake: new WebhookIntake({
      transcriptions: stores.transcriptions,
      userSettings: stores.userSettings,
      orchestrator,
      webhookSecrets: {
        fireflies: appConfig.fireflies.webhookSecret,
        read_ai: appConfig.readAi.webhookSecret
      }
    }),
    backfill: new BackfillReconciler(stores.transcriptions, stores.userSettings, orchestrator),
    queries: new TranscriptionQueries(stores.transcriptions, stores.actionItems, stores.userSettings)
  };
}
