import { GraphQLClient } from 'graphql-request';
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { FetchedTranscript, TranscriptFetcher } from '../base/capabilities';
import { ProviderFetchError, getErrorMessage } from '../../errors';
import { TranscriptSentence } from '../../types';
import { firstString, getPath, isJsonObject } from '../../utils/json';
import {
  FirefliesCredentials,
  FirefliesGraphQLError,
  FirefliesTranscript,
  TranscriptQueryResponse
} from './types';

export interface FirefliesClientOptions {
  endpoint?: string;
  timeoutMs?: number;
  apiKey?: string;
}

const FULL_TRANSCRIPT_QUERY = `
  query GetTranscript($id: String!) {
    transcript(id: $id) {
      id
      title
      date
      organizer_email
      host_email
      participants
      fireflies_users
      meeting_attendees {
        displayName
        email
        name
      }
      sentences {
        index
        speaker_name
        text
        start_time
        end_time
      }
    }
  }
`;

// Some workspaces reject the user-list fields; these narrower shapes still give us the text.
const REDUCED_TRANSCRIPT_QUERY = `
  query GetTranscriptReduced($id: String!) {
    transcript(id: $id) {
      id
      title
      date
      organizer_email
      meeting_attendees {
        email
        name
      }
      sentences {
        index
        speaker_name
        text
        start_time
        end_time
      }
    }
  }
`;

const MINIMAL_TRANSCRIPT_QUERY = `
  query GetTranscriptMinimal($id: String!) {
    transcript(id: $id) {
      id
      sentences {
        index
        speaker_name
        text
        start_time
        end_time
      }
    }
  }
`;

const TRANSCRIPT_QUERIES = [FULL_TRANSCRIPT_QUERY, REDUCED_TRANSCRIPT_QUERY, MINIMAL_TRANSCRIPT_QUERY];

export class FirefliesClient implements TranscriptFetcher {
  readonly name = 'fireflies';
  private graphqlClient: GraphQLClient;
  private credentials: FirefliesCredentials;
  private secretsManager: SecretsManagerClient;
  private authenticated = false;
  private timeoutMs: number;
  private envApiKey?: string;

  constructor(private secretName: string, region: string = 'us-east-1', options: FirefliesClientOptions = {}) {
    const endpoint =
      options.endpoint || process.env.FIREFLIES_GRAPHQL_ENDPOINT || 'https://api.fireflies.ai/graphql';
    this.graphqlClient = new GraphQLClient(endpoint);

    this.secretsManager = new SecretsManagerClient({ region });
    this.credentials = {};
    this.timeoutMs = options.timeoutMs ?? 20000;
    this.envApiKey = options.apiKey;
  }

  async authenticate(credentials?: FirefliesCredentials): Promise<void> {
    if (credentials) {
      this.credentials = credentials;
    } else {
      try {
        await this.loadCredentialsFromSecrets();
      } catch (error) {
        console.warn(`AWS Secrets Manager not available (${getErrorMessage(error)}), trying environment variables...`);
        this.loadCredentialsFromEnv();
      }
    }

    if (!this.credentials.apiKey) {
      throw new Error(
        'Missing Fireflies API key. Set FIREFLIES_API_KEY environment variable or configure AWS Secrets Manager.'
      );
    }

    this.graphqlClient.setHeader('Authorization', `Bearer ${this.credentials.apiKey}`);
    this.authenticated = true;
  }

  private async loadCredentialsFromSecrets(): Promise<void> {
    const command = new GetSecretValueCommand({ SecretId: this.secretName });
    const response = await this.secretsManager.send(command);

    if (!response.SecretString) {
      throw new Error('No secret string found');
    }

    const secrets: unknown = JSON.parse(response.SecretString);
    const apiKey = firstString(secrets, ['apiKey', 'api_key']);
    if (!apiKey) {
      throw new Error(`Secret ${this.secretName} has no apiKey`);
    }
    this.credentials = { apiKey };
  }

  private loadCredentialsFromEnv(): void {
    this.credentials = {
      apiKey: this.envApiKey || process.env.FIREFLIES_API_KEY
    };
  }

  async fetchTranscript(meetingId: string): Promise<FetchedTranscript> {
    try {
      if (!this.authenticated) {
        await this.authenticate();
      }

      const transcript = await this.requestTranscript(meetingId);
      if (!transcript) {
        throw new Error(`Transcript not found for meeting ${meetingId}`);
      }

      return this.mapTranscript(transcript);
    } catch (error) {
      if (error instanceof ProviderFetchError) {
        throw error;
      }
      throw new ProviderFetchError('fireflies', getErrorMessage(error));
    }
  }

  private async requestTranscript(meetingId: string): Promise<FirefliesTranscript | null> {
    for (let attempt = 0; attempt < TRANSCRIPT_QUERIES.length; attempt++) {
      try {
        const response = await this.graphqlClient.request<TranscriptQueryResponse>({
          document: TRANSCRIPT_QUERIES[attempt],
          variables: { id: meetingId },
          signal: AbortSignal.timeout(this.timeoutMs)
        });
        return response.transcript;
      } catch (error) {
        const graphqlErrors = extractGraphQLErrors(error);
        const isLastQuery = attempt === TRANSCRIPT_QUERIES.length - 1;
        if (graphqlErrors.length === 0 || isLastQuery || isFatalGraphQLError(graphqlErrors)) {
          this.handleApiError(error);
        }
        console.warn(
          `Fireflies rejected transcript query ${attempt + 1} for meeting ${meetingId}, retrying with fewer fields:`,
          graphqlErrors.map(e => e.message).join('; ')
        );
      }
    }
    return null;
  }

  private mapTranscript(transcript: FirefliesTranscript): FetchedTranscript {
    const sentences: TranscriptSentence[] = (transcript.sentences || [])
      .filter(sentence => Boolean(sentence.text && sentence.text.trim()))
      .map(sentence => ({
        speaker: sentence.speaker_name?.trim() || 'Unknown',
        start_time: toSeconds(sentence.start_time),
        end_time: toSeconds(sentence.end_time),
        text: (sentence.text || '').trim()
      }));

    return {
      transcriptId: transcript.id,
      text: sentences.length > 0 ? sentences.map(sentence => sentence.text).join('\n') : null,
      sentences,
      participantEmails: collectParticipantEmails(transcript),
      meetingDate: toTimestamp(transcript.date)
    };
  }

  private handleApiError(error: unknown): never {
    const errors = extractGraphQLErrors(error);
    if (errors.length > 0) {
      const errorMessage = errors.map(e => e.message).join('; ');

      if (/unauthori[sz]ed|authentication/i.test(errorMessage)) {
        throw new ProviderFetchError('fireflies', 'Fireflies authentication failed. Check API key.');
      } else if (/rate limit/i.test(errorMessage)) {
        throw new ProviderFetchError('fireflies', 'Fireflies API rate limit exceeded.');
      } else {
        throw new ProviderFetchError('fireflies', `Fireflies API error: ${errorMessage}`);
      }
    }
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new ProviderFetchError('fireflies', `Fireflies request timed out after ${this.timeoutMs}ms`);
    }
    throw new ProviderFetchError('fireflies', getErrorMessage(error));
  }
}

function extractGraphQLErrors(error: unknown): FirefliesGraphQLError[] {
  const errors = getPath(error, 'response.errors');
  if (!Array.isArray(errors)) {
    return [];
  }
  return errors
    .filter(isJsonObject)
    .map(entry => ({ message: typeof entry.message === 'string' ? entry.message : 'Unknown GraphQL error' }));
}

function isFatalGraphQLError(errors: FirefliesGraphQLError[]): boolean {
  return errors.some(e => /unauthori[sz]ed|authentication|rate limit|not found/i.test(e.message));
}

function toSeconds(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const seconds = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(seconds) ? seconds : null;
}

// Fireflies reports `date` as epoch milliseconds, sometimes serialized as a string.
function toTimestamp(value: number | string | null | undefined): string | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const numeric = typeof value === 'number' ? value : Number(value);
  const date = Number.isFinite(numeric) ? new Date(numeric) : new Date(String(value));
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

function emailsFrom(value: unknown): string[] {
  if (typeof value === 'string') {
    return value.split(',');
  }
  if (Array.isArray(value)) {
    return value.flatMap(entry => emailsFrom(isJsonObject(entry) ? entry.email : entry));
  }
  return [];
}

/** Lowercased, deduplicated and sorted emails from every attendee field Fireflies exposes. */
export function collectParticipantEmails(transcript: FirefliesTranscript): string[] {
  const candidates = [
    ...emailsFrom(transcript.organizer_email),
    ...emailsFrom(transcript.host_email),
    ...emailsFrom(transcript.participants),
    ...emailsFrom(transcript.fireflies_users),
    ...emailsFrom(transcript.meeting_attendees)
  ];

  const emails = new Set(
    candidates.map(candidate => candidate.trim().toLowerCase()).filter(candidate => candidate.includes('@'))
  );
  return Array.from(emails).sort();
}
