import axios, { AxiosInstance } from 'axios';
import { CalendarDestination, CalendarEventContext, TokenProvider } from '../base/capabilities';
import { DispatchError, getErrorMessage } from '../../errors';
import { ExtractedTask } from '../../types';
import { describeHttpError } from '../httpErrors';

export interface OutlookCalendarClientOptions {
  apiUrl?: string;
  timeoutMs?: number;
}

interface GraphEventResponse {
  id?: string;
}

// Graph events need a time range; tasks get a one-hour slot on the due date.
const EVENT_START = '09:00:00';
const EVENT_END = '10:00:00';

export class OutlookCalendarClient implements CalendarDestination {
  readonly kind = 'outlook_calendar';
  private api: AxiosInstance;

  constructor(private tokenProvider: TokenProvider, options: OutlookCalendarClientOptions = {}) {
    this.api = axios.create({
      baseURL: options.apiUrl || 'https://graph.microsoft.com/v1.0',
      timeout: options.timeoutMs ?? 15000,
      headers: { 'Content-Type': 'application/json' }
    });
  }

  async createEvent(task: ExtractedTask, context: CalendarEventContext): Promise<string> {
    if (!task.dueDate) {
      throw new DispatchError('outlook_calendar', `Task "${task.title}" has no due date`);
    }

    const body = {
      subject: task.title,
      body: {
        contentType: 'text',
        content: [task.details, task.sourceSentence, `Meeting: ${context.meetingId}`]
          .filter((line): line is string => Boolean(line))
          .join('\n\n')
      },
      start: { dateTime: `${task.dueDate}T${EVENT_START}`, timeZone: context.timezone },
      end: { dateTime: `${task.dueDate}T${EVENT_END}`, timeZone: context.timezone }
    };

    try {
      const token = await this.tokenProvider.getAccessToken();
      let data: GraphEventResponse;
      try {
        data = await this.insertEvent(body, token);
      } catch (error) {
        if (!(axios.isAxiosError(error) && error.response?.status === 401)) {
          throw error;
        }
        console.warn(`Microsoft Graph rejected the access token for meeting ${context.meetingId}, refreshing`);
        data = await this.insertEvent(body, await this.tokenProvider.getAccessToken(true));
      }

      if (!data.id) {
        throw new DispatchError('outlook_calendar', 'Response did not include an event id');
      }
      return data.id;
    } catch (error) {
      if (error instanceof DispatchError) {
        throw error;
      }
      throw new DispatchError('outlook_calendar', describeHttpError(error, 'Microsoft Graph') ?? getErrorMessage(error));
    }
  }

  private async insertEvent(body: object, token: string): Promise<GraphEventResponse> {
    const { data } = await this.api.post<GraphEventResponse>('/me/events', body, {
      headers: { Authorization: `Bearer ${token}` }
    });
    return data;
  }
}
