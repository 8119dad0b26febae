import OpenAI from 'openai';
import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { TaskExtractionInput, TaskExtractor } from '../base/capabilities';
import { ExtractionError, getErrorMessage } from '../../errors';
import { ExtractedTask } from '../../types';
import { normalizeExtractedTasks } from '../../services/actionItems';

export interface JsonCompletionRequest {
  system: string;
  user: string;
}

/** Returns the raw message content of a JSON-mode completion. */
export type JsonCompletion = (request: JsonCompletionRequest) => Promise<string | null>;

const MAX_TRANSCRIPT_CHARS = 100000;

const SYSTEM_PROMPT = `You extract action items from meeting transcripts.

RULES:
1. Extract only concrete commitments or follow-ups someone agreed to do.
2. The title is a short imperative sentence in the language of the meeting.
3. assignee_email must be one of the participant emails, otherwise null.
4. due_date is YYYY-MM-DD. Resolve relative dates ("next Friday") against the reference date and timezone. Use null when no date was stated.
5. source_sentence quotes the transcript line the item came from.
6. Returning no action items is valid.

Return ONLY valid JSON: {"action_items": [{"title": string, "assignee_email": string|null, "assignee_name": string|null, "due_date": string|null, "details": string|null, "source_sentence": string|null}]}`;

const nullableText = z.string().nullish().catch(null);

const ActionItemSchema = z.object({
  title: z.string().nullish(),
  assignee_email: nullableText,
  assignee_name: nullableText,
  due_date: nullableText,
  details: nullableText,
  source_sentence: nullableText
});

const ExtractionOutputSchema = z.object({
  action_items: z.array(ActionItemSchema).default([])
});

function parseJsonContent(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    const start = content.indexOf('{');
    const end = content.lastIndexOf('}');
    if (start === -1 || end <= start) {
      throw new ExtractionError('Task extraction returned non-JSON content');
    }
    try {
      return JSON.parse(content.slice(start, end + 1));
    } catch (error) {
      throw new ExtractionError(`Task extraction returned invalid JSON: ${getErrorMessage(error)}`);
    }
  }
}

export class LlmTaskExtractor implements TaskExtractor {
  constructor(private complete: JsonCompletion) {}

  async extractTasks(input: TaskExtractionInput): Promise<ExtractedTask[]> {
    const transcript =
      input.transcriptText.length > MAX_TRANSCRIPT_CHARS
        ? `${input.transcriptText.slice(0, MAX_TRANSCRIPT_CHARS)}\n\n[TRANSCRIPT TRUNCATED]`
        : input.transcriptText;

    const user = [
      `Reference date: ${input.referenceDate}`,
      `Timezone: ${input.timezone}`,
      `Participant emails: ${input.participantEmails.length > 0 ? input.participantEmails.join(', ') : 'none'}`,
      '',
      'Transcript:',
      transcript
    ].join('\n');

    let content: string | null;
    try {
      content = await this.complete({ system: SYSTEM_PROMPT, user });
    } catch (error) {
      if (error instanceof ExtractionError) {
        throw error;
      }
      throw new ExtractionError(`Task extraction request failed: ${getErrorMessage(error)}`);
    }

    if (!content || !content.trim()) {
      throw new ExtractionError('Task extraction returned an empty response');
    }

    const parsed = ExtractionOutputSchema.safeParse(parseJsonContent(content));
    if (!parsed.success) {
      throw new ExtractionError(`Task extraction returned an unexpected shape: ${fromZodError(parsed.error).message}`);
    }

    const tasks = normalizeExtractedTasks(parsed.data.action_items);
    console.log(`[TaskExtraction] Extracted ${tasks.length} action items for meeting ${input.meetingId}`);
    return tasks;
  }
}

export interface OpenAiCompletionOptions {
  model: string;
  temperature?: number;
}

export function createOpenAiCompletion(client: OpenAI, options: OpenAiCompletionOptions): JsonCompletion {
  return async ({ system, user }) => {
    try {
      const response = await client.chat.completions.create({
        model: options.model,
        temperature: options.temperature ?? 0.1,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user }
        ]
      });

      return response.choices[0]?.message?.content ?? null;
    } catch (error) {
      if (error instanceof OpenAI.APIError && (error.status === 429 || error.code === 'insufficient_quota')) {
        console.error('[TaskExtraction] [OpenAI Quota Error] Rate limited or quota exceeded');
        throw new ExtractionError('OpenAI API quota exceeded. Please check your API key and billing status.');
      }
      throw error;
    }
  };
}
