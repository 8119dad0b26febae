import axios, { AxiosInstance } from 'axios';
import { CalendarDestination, CalendarEventContext, TokenProvider } from '../base/capabilities';
import { DispatchError, getErrorMessage } from '../../errors';
import { ExtractedTask } from '../../types';
import { addDays } from '../../services/actionItems';
import { describeHttpError } from '../httpErrors';

export interface GoogleCalendarClientOptions {
  apiUrl?: string;
  timeoutMs?: number;
}

interface CalendarEventResponse {
  id?: string;
}

export class GoogleCalendarClient implements CalendarDestination {
  readonly kind = 'google_calendar';
  private api: AxiosInstance;

  constructor(
    private tokenProvider: TokenProvider,
    private calendarId: string = 'primary',
    options: GoogleCalendarClientOptions = {}
  ) {
    this.api = axios.create({
      baseURL: options.apiUrl || 'https://www.googleapis.com/calendar/v3',
      timeout: options.timeoutMs ?? 15000,
      headers: { 'Content-Type': 'application/json' }
    });
  }

  async createEvent(task: ExtractedTask, context: CalendarEventContext): Promise<string> {
    if (!task.dueDate) {
      throw new DispatchError('google_calendar', `Task "${task.title}" has no due date`);
    }

    const body = {
      summary: task.title,
      description: [task.details, task.sourceSentence, `Meeting: ${context.meetingId}`]
        .filter((line): line is string => Boolean(line))
        .join('\n\n'),
      start: { date: task.dueDate, timeZone: context.timezone },
      end: { date: addDays(task.dueDate, 1), timeZone: context.timezone }
    };

    try {
      const token = await this.tokenProvider.getAccessToken();
      let data: CalendarEventResponse;
      try {
        data = await this.insertEvent(body, token);
      } catch (error) {
        if (!isUnauthorized(error)) {
          throw error;
        }
        console.warn(`Google Calendar rejected the access token for meeting ${context.meetingId}, refreshing`);
        data = await this.insertEvent(body, await this.tokenProvider.getAccessToken(true));
      }

      if (!data.id) {
        throw new DispatchError('google_calendar', 'Response did not include an event id');
      }
      return data.id;
    } catch (error) {
      if (error instanceof DispatchError) {
        throw error;
      }
      throw new DispatchError('google_calendar', describeHttpError(error, 'Google Calendar') ?? getErrorMessage(error));
    }
  }

  private async insertEvent(body: object, token: string): Promise<CalendarEventResponse> {
    const { data } = await this.api.post<CalendarEventResponse>(
      `/calendars/${encodeURIComponent(this.calendarId)}/events`,
      body,
      { headers: { Authorization: `Bearer ${token}` } }
    );
    return data;
  }
}

function isUnauthorized(error: unknown): boolean {
  return axios.isAxiosError(error) && error.response?.status === 401;
}
