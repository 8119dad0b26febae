import OpenAI from 'openai';
import { createOpenAiCompletion, LlmTaskExtractor } from './llmTaskExtractor';
import { ExtractionError } from '../../errors';

describe('LlmTaskExtractor', () => {
  const input = {
    meetingId: 'm1',
    transcriptText: 'Ana: I will send the deck by Wednesday.',
    participantEmails: ['ana@example.com'],
    timezone: 'Europe/Paris',
    referenceDate: '2024-01-08'
  };

  it('should send the transcript with reference date and participants', async () => {
    const complete = jest.fn().mockResolvedValue('{"action_items": []}');
    const extractor = new LlmTaskExtractor(complete);

    await extractor.extractTasks(input);

    expect(complete).toHaveBeenCalledTimes(1);
    const request = complete.mock.calls[0][0];
    expect(request.system).toContain('"action_items"');
    expect(request.user).toBe(
      [
        'Reference date: 2024-01-08',
        'Timezone: Europe/Paris',
        'Participant emails: ana@example.com',
        '',
        'Transcript:',
        'Ana: I will send the deck by Wednesday.'
      ].join('\n')
    );
  });

  it('should return normalized tasks', async () => {
    const complete = jest.fn().mockResolvedValue(
      JSON.stringify({
        action_items: [
          {
            title: 'Send the deck',
            assignee_email: 'ANA@example.com',
            assignee_name: 'Ana',
            due_date: '2024-01-10',
            details: null,
            source_sentence: 'I will send the deck by Wednesday.'
          }
        ]
      })
    );
    const extractor = new LlmTaskExtractor(complete);

    await expect(extractor.extractTasks(input)).resolves.toEqual([
      {
        title: 'Send the deck',
        assigneeEmail: 'ana@example.com',
        assigneeName: 'Ana',
        dueDate: '2024-01-10',
        details: null,
        sourceSentence: 'I will send the deck by Wednesday.'
      }
    ]);
  });

  it('should recover JSON wrapped in prose', async () => {
    const complete = jest.fn().mockResolvedValue('Here you go: {"action_items": [{"title": "Book venue"}]} Thanks!');
    const extractor = new LlmTaskExtractor(complete);

    const tasks = await extractor.extractTasks(input);

    expect(tasks.map(task => task.title)).toEqual(['Book venue']);
  });

  it('should raise ExtractionError for unparseable output', async () => {
    const extractor = new LlmTaskExtractor(jest.fn().mockResolvedValue('no json here'));

    await expect(extractor.extractTasks(input)).rejects.toThrow('Task extraction returned non-JSON content');
  });

  it('should raise ExtractionError for an unexpected shape', async () => {
    const extractor = new LlmTaskExtractor(jest.fn().mockResolvedValue('{"action_items": "none"}'));

    await expect(extractor.extractTasks(input)).rejects.toBeInstanceOf(ExtractionError);
  });

  it('should wrap request failures', async () => {
    const extractor = new LlmTaskExtractor(jest.fn().mockRejectedValue(new Error('Request timed out.')));

    await expect(extractor.extractTasks(input)).rejects.toThrow(
      'Task extraction request failed: Request timed out.'
    );
  });

  it('should treat an empty response as a failure', async () => {
    const extractor = new LlmTaskExtractor(jest.fn().mockResolvedValue(null));

    await expect(extractor.extractTasks(input)).rejects.toThrow('Task extraction returned an empty response');
  });
});

describe('createOpenAiCompletion', () => {
  let create: jest.Mock;
  let client: OpenAI;

  beforeEach(() => {
    create = jest.fn();
    client = { chat: { completions: { create } } } as unknown as OpenAI;
  });

  it('should request JSON mode and unwrap the first message', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: '{"action_items": []}' } }] });
    const complete = createOpenAiCompletion(client, { model: 'gpt-4o-mini' });

    await expect(complete({ system: 'rules', user: 'transcript' })).resolves.toBe('{"action_items": []}');
    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      temperature: 0.1,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: 'rules' },
        { role: 'user', content: 'transcript' }
      ]
    });
  });

  it('should return null when there are no choices', async () => {
    create.mockResolvedValue({ choices: [] });
    const complete = createOpenAiCompletion(client, { model: 'gpt-4o-mini', temperature: 0 });

    await expect(complete({ system: 'rules', user: 'transcript' })).resolves.toBeNull();
    expect(create.mock.calls[0][0].temperature).toBe(0);
  });

  it('should map rate limits to an ExtractionError', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    create.mockRejectedValue(new OpenAI.APIError(429, { code: 'rate_limit_exceeded' }, 'Rate limit reached', {}));
    const complete = createOpenAiCompletion(client, { model: 'gpt-4o-mini' });

    const promise = complete({ system: 'rules', user: 'transcript' });

    await expect(promise).rejects.toBeInstanceOf(ExtractionError);
    await expect(promise).rejects.toThrow(
      'OpenAI API quota exceeded. Please check your API key and billing status.'
    );
    error.mockRestore();
  });

  it('should map an exhausted quota to an ExtractionError', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    create.mockRejectedValue(new OpenAI.APIError(403, { code: 'insufficient_quota' }, 'Quota exceeded', {}));
    const complete = createOpenAiCompletion(client, { model: 'gpt-4o-mini' });

    await expect(complete({ system: 'rules', user: 'transcript' })).rejects.toBeInstanceOf(ExtractionError);
    error.mockRestore();
  });

  it('should rethrow other failures unchanged', async () => {
    const failure = new OpenAI.APIError(500, { code: 'server_error' }, 'Upstream failed', {});
    create.mockRejectedValue(failure);
    const complete = createOpenAiCompletion(client, { model: 'gpt-4o-mini' });

    await expect(complete({ system: 'rules', user: 'transcript' })).rejects.toBe(failure);
  });
});
