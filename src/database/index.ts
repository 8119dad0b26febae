import { AppConfig } from '../config';
import { ActionItemCreationRepository } from './repositories/actionItemCreationRepository';
import { TranscriptionRepository } from './repositories/transcriptionRepository';
import { UserSettingsRepository } from './repositories/userSettingsRepository';
import {
  InMemoryActionItemCreationStore,
  InMemoryTranscriptionStore,
  InMemoryUserSettingsStore
} from './memory/inMemoryStores';
import { ActionItemCreationStore, TranscriptionStore, UserSettingsStore } from './stores';

export interface Stores {
  transcriptions: TranscriptionStore;
  actionItems: ActionItemCreationStore;
  userSettings: UserSettingsStore;
}

export function createStores(appConfig: AppConfig): Stores {
  if (appConfig.storage.driver === 'memory') {
    console.log('Using in-memory stores');
    return {
      transcriptions: new InMemoryTranscriptionStore(),
      actionItems: new InMemoryActionItemCreationStore(),
      userSettings: new InMemoryUserSettingsStore()
    };
  }

  const { url, serviceKey } = appConfig.supabase;
  return {
    transcriptions: new TranscriptionRepository(url, serviceKey),
    actionItems: new ActionItemCreationRepository(url, serviceKey),
    userSettings: new UserSettingsRepository(url, serviceKey, appConfig.defaultTimezone)
  };
}

export * from './stores';
