import dotenv from 'dotenv';

dotenv.config();

export type StorageDriver = 'supabase' | 'memory';

function parseStorageDriver(value: string | undefined): StorageDriver {
  return value === 'memory' ? 'memory' : 'supabase';
}

export const config = {
  server: {
    port: parseInt(process.env.PORT || '3000'),
  },
  aws: {
    region: process.env.AWS_REGION || 'us-east-1',
  },
  storage: {
    driver: parseStorageDriver(process.env.STORAGE_DRIVER),
  },
  supabase: {
    url: process.env.SUPABASE_URL || '',
    serviceKey: process.env.SUPABASE_SERVICE_KEY || '',
  },
  fireflies: {
    secretName: process.env.FIREFLIES_SECRET_NAME || 'fireflies-api-credentials',
    apiKey: process.env.FIREFLIES_API_KEY || '',
    endpoint: process.env.FIREFLIES_GRAPHQL_ENDPOINT || 'https://api.fireflies.ai/graphql',
    timeoutMs: parseInt(process.env.FIREFLIES_TIMEOUT_MS || '20000'),
    webhookSecret: process.env.FIREFLIES_WEBHOOK_SECRET || '',
  },
  readAi: {
    webhookSecret: process.env.READ_AI_WEBHOOK_SECRET || '',
  },
  llm: {
    openaiApiKey: process.env.OPENAI_API_KEY || '',
    model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    timeoutMs: parseInt(process.env.OPENAI_TIMEOUT_MS || '30000'),
  },
  notion: {
    apiUrl: process.env.NOTION_API_URL || 'https://api.notion.com/v1',
    version: process.env.NOTION_VERSION || '2022-06-28',
    timeoutMs: parseInt(process.env.NOTION_TIMEOUT_MS || '15000'),
  },
  monday: {
    apiUrl: process.env.MONDAY_API_URL || 'https://api.monday.com/v2',
    apiVersion: process.env.MONDAY_API_VERSION || '2024-01',
    timeoutMs: parseInt(process.env.MONDAY_TIMEOUT_MS || '15000'),
  },
  googleCalendar: {
    apiUrl: process.env.GOOGLE_CALENDAR_API_URL || 'https://www.googleapis.com/calendar/v3',
    tokenUrl: process.env.GOOGLE_OAUTH_TOKEN_URL || 'https://oauth2.googleapis.com/token',
    clientId: process.env.GOOGLE_CLIENT_ID || '',
    clientSecret: process.env.GOOGLE_CLIENT_SECRET || '',
    timeoutMs: parseInt(process.env.GOOGLE_CALENDAR_TIMEOUT_MS || '15000'),
  },
  outlook: {
    apiUrl: process.env.MICROSOFT_GRAPH_API_URL || 'https://graph.microsoft.com/v1.0',
    tokenUrl: process.env.MICROSOFT_OAUTH_TOKEN_URL || 'https://login.microsoftonline.com/{tenant}/oauth2/v2.0/token',
    clientId: process.env.MICROSOFT_CLIENT_ID || '',
    clientSecret: process.env.MICROSOFT_CLIENT_SECRET || '',
    tenantId: process.env.MICROSOFT_TENANT_ID || 'common',
    timeoutMs: parseInt(process.env.OUTLOOK_CALENDAR_TIMEOUT_MS || '15000'),
  },
  defaultTimezone: process.env.DEFAULT_TIMEZONE || 'UTC',
};

export type AppConfig = typeof config;

export function validateConfig(): void {
  if (config.storage.driver === 'memory') {
    console.warn('⚠️  STORAGE_DRIVER=memory. Records are kept in process memory and lost on restart.');
  } else if (!config.supabase.url || !config.supabase.serviceKey) {
    console.warn('⚠️  Supabase credentials not configured. Transcription records cannot be stored.');
  }

  if (!config.fireflies.apiKey && !config.fireflies.secretName) {
    console.warn('⚠️  No Fireflies API key or secret configured. Transcript fetches will fail.');
  }

  if (!config.llm.openaiApiKey) {
    console.warn('⚠️  OPENAI_API_KEY not set. Records will stop at transcript_ready without task extraction.');
  }

  const signedProviders = [
    config.fireflies.webhookSecret ? 'fireflies' : null,
    config.readAi.webhookSecret ? 'read_ai' : null,
  ].filter((provider): provider is string => provider !== null);

  if (signedProviders.length === 0) {
    console.warn('⚠️  No webhook secrets configured. Incoming webhooks are accepted unsigned.');
  } else {
    console.log(`✅ Webhook signatures enforced for: ${signedProviders.join(', ')}`);
  }
}
