import { FirefliesClient, collectParticipantEmails } from './firefliesClient';
import { GraphQLClient } from 'graphql-request';
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { mockClient } from 'aws-sdk-client-mock';
import { ProviderFetchError } from '../../errors';

jest.mock('graphql-request');
const MockedGraphQLClient = GraphQLClient as jest.MockedClass<typeof GraphQLClient>;

describe('FirefliesClient', () => {
  const mockSecretsManager = mockClient(SecretsManagerClient);
  let firefliesClient: FirefliesClient;
  let mockGraphQLClient: { request: jest.Mock; setHeader: jest.Mock };

  beforeEach(() => {
    jest.clearAllMocks();
    mockSecretsManager.reset();

    mockGraphQLClient = {
      request: jest.fn(),
      setHeader: jest.fn()
    };

    MockedGraphQLClient.mockImplementation(() => mockGraphQLClient as unknown as GraphQLClient);

    firefliesClient = new FirefliesClient('test-secret', 'us-east-1', { timeoutMs: 1000 });
  });

  describe('authenticate', () => {
    it('should authenticate with API key', async () => {
      await firefliesClient.authenticate({ apiKey: 'test-api-key' });

      expect(mockGraphQLClient.setHeader).toHaveBeenCalledWith('Authorization', 'Bearer test-api-key');
    });

    it('should load credentials from secrets manager', async () => {
      mockSecretsManager.on(GetSecretValueCommand).resolves({
        SecretString: JSON.stringify({ apiKey: 'secret-api-key' })
      });

      await firefliesClient.authenticate();

      expect(mockGraphQLClient.setHeader).toHaveBeenCalledWith('Authorization', 'Bearer secret-api-key');
    });

    it('should fall back to the configured key when secrets manager fails', async () => {
      mockSecretsManager.on(GetSecretValueCommand).rejects(new Error('AccessDenied'));
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const client = new FirefliesClient('test-secret', 'us-east-1', { apiKey: 'env-api-key' });

      await client.authenticate();

      expect(mockGraphQLClient.setHeader).toHaveBeenCalledWith('Authorization', 'Bearer env-api-key');
      warn.mockRestore();
    });

    it('should throw error if API key is missing', async () => {
      await expect(firefliesClient.authenticate({})).rejects.toThrow('Missing Fireflies API key');
    });
  });

  describe('fetchTranscript', () => {
    beforeEach(async () => {
      await firefliesClient.authenticate({ apiKey: 'test-api-key' });
    });

    it('should map sentences, text and participant emails', async () => {
      mockGraphQLClient.request.mockResolvedValue({
        transcript: {
          id: 'm1',
          title: 'Planning',
          date: 1704726000000,
          organizer_email: 'Host@Example.com',
          participants: ['ana@example.com, bob@example.com', 'not-an-email'],
          fireflies_users: [{ email: 'ana@example.com' }],
          meeting_attendees: [{ email: 'carl@example.com', name: 'Carl' }],
          sentences: [
            { index: 0, speaker_name: 'Ana', text: 'Hello', start_time: 0.5, end_time: 1.2 },
            { index: 1, speaker_name: null, text: '  ', start_time: 1.2, end_time: 1.4 },
            { index: 2, speaker_name: 'Bob', text: 'world', start_time: '1.5', end_time: '2' }
          ]
        }
      });

      const transcript = await firefliesClient.fetchTranscript('m1');

      expect(transcript).toEqual({
        transcriptId: 'm1',
        text: 'Hello\nworld',
        sentences: [
          { speaker: 'Ana', start_time: 0.5, end_time: 1.2, text: 'Hello' },
          { speaker: 'Bob', start_time: 1.5, end_time: 2, text: 'world' }
        ],
        participantEmails: ['ana@example.com', 'bob@example.com', 'carl@example.com', 'host@example.com'],
        meetingDate: '2024-01-08T15:00:00.000Z'
      });
      expect(mockGraphQLClient.request).toHaveBeenCalledWith(
        expect.objectContaining({
          document: expect.stringContaining('query GetTranscript('),
          variables: { id: 'm1' }
        })
      );
    });

    it('should read meeting dates sent as strings', async () => {
      mockGraphQLClient.request.mockResolvedValue({ transcript: { id: 'm1', date: '1704726000000', sentences: [] } });

      const transcript = await firefliesClient.fetchTranscript('m1');

      expect(transcript.meetingDate).toBe('2024-01-08T15:00:00.000Z');
      expect(transcript.text).toBeNull();
    });

    it('should retry with a narrower query when a field is rejected', async () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      mockGraphQLClient.request
        .mockRejectedValueOnce({ response: { errors: [{ message: 'Cannot query field "fireflies_users"' }] } })
        .mockResolvedValueOnce({
          transcript: { id: 'm1', sentences: [{ index: 0, speaker_name: 'Ana', text: 'Hi', start_time: 0, end_time: 1 }] }
        });

      const transcript = await firefliesClient.fetchTranscript('m1');

      expect(transcript.text).toBe('Hi');
      expect(transcript.meetingDate).toBeNull();
      expect(mockGraphQLClient.request).toHaveBeenCalledTimes(2);
      expect(mockGraphQLClient.request.mock.calls[1][0].document).toContain('GetTranscriptReduced');
      warn.mockRestore();
    });

    it('should map authentication failures to a ProviderFetchError', async () => {
      mockGraphQLClient.request.mockRejectedValue({ response: { errors: [{ message: 'Unauthorized' }] } });

      const promise = firefliesClient.fetchTranscript('m1');

      await expect(promise).rejects.toBeInstanceOf(ProviderFetchError);
      await expect(promise).rejects.toThrow('Fireflies authentication failed. Check API key.');
      expect(mockGraphQLClient.request).toHaveBeenCalledTimes(1);
    });

    it('should fail when the transcript does not exist', async () => {
      mockGraphQLClient.request.mockResolvedValue({ transcript: null });

      await expect(firefliesClient.fetchTranscript('missing')).rejects.toThrow(
        'Transcript not found for meeting missing'
      );
    });

    it('should wrap network errors', async () => {
      mockGraphQLClient.request.mockRejectedValue(new Error('socket hang up'));

      await expect(firefliesClient.fetchTranscript('m1')).rejects.toThrow('socket hang up');
    });
  });

  describe('collectParticipantEmails', () => {
    it('should return an empty list when no emails are present', () => {
      expect(collectParticipantEmails({ id: 'm1', participants: null })).toEqual([]);
    });
  });
});
