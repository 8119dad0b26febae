import { CalendarDestination, ConfiguredDestinations, KanbanDestination } from './base/capabilities';
import { NotionKanbanClient, NotionClientOptions } from './notion/notionKanbanClient';
import { MondayKanbanClient, MondayClientOptions } from './monday/mondayKanbanClient';
import { GoogleCalendarClient, GoogleCalendarClientOptions } from './google/googleCalendarClient';
import { GoogleOAuthClientConfig, GoogleOAuthTokenProvider } from './google/googleOAuthTokenProvider';
import { OutlookCalendarClient, OutlookCalendarClientOptions } from './outlook/outlookCalendarClient';
import { OutlookOAuthClientConfig, OutlookOAuthTokenProvider } from './outlook/outlookOAuthTokenProvider';
import { DestinationKind, UserIntegrationSettings } from '../types';

export interface DestinationClientOptions {
  notion?: NotionClientOptions;
  monday?: MondayClientOptions;
  googleCalendar?: GoogleCalendarClientOptions;
  googleOAuth: GoogleOAuthClientConfig;
  outlookCalendar?: OutlookCalendarClientOptions;
  outlookOAuth: OutlookOAuthClientConfig;
}

export type DestinationResolver = (settings: UserIntegrationSettings | null) => ConfiguredDestinations;

export const NO_DESTINATIONS: ConfiguredDestinations = { kanban: [], calendars: [] };

function hasText(value: string | undefined): value is string {
  return Boolean(value && value.trim());
}

/**
 * Which destinations a settings snapshot enables. Autosync off enables none;
 * otherwise a destination counts once its credentials are complete.
 */
export function configuredDestinationKinds(settings: UserIntegrationSettings | null): Set<DestinationKind> {
  const kinds = new Set<DestinationKind>();
  if (!settings || !settings.autosyncEnabled) {
    return kinds;
  }

  const { notion, monday, googleCalendar, outlookCalendar } = settings;
  if (notion && hasText(notion.apiToken) && hasText(notion.databaseId)) {
    kinds.add('notion');
  }
  if (monday && hasText(monday.apiToken) && hasText(monday.boardId)) {
    kinds.add('monday');
  }
  if (googleCalendar && (hasText(googleCalendar.accessToken) || hasText(googleCalendar.refreshToken))) {
    kinds.add('google_calendar');
  }
  if (outlookCalendar && (hasText(outlookCalendar.accessToken) || hasText(outlookCalendar.refreshToken))) {
    kinds.add('outlook_calendar');
  }
  return kinds;
}

/**
 * Builds fresh clients from one settings snapshot. Nothing is cached between
 * requests, so a settings change applies to the next webhook.
 */
export function createDestinations(
  settings: UserIntegrationSettings | null,
  options: DestinationClientOptions
): ConfiguredDestinations {
  const kinds = configuredDestinationKinds(settings);
  if (!settings || kinds.size === 0) {
    return NO_DESTINATIONS;
  }

  const kanban: KanbanDestination[] = [];
  const calendars: CalendarDestination[] = [];
  const { notion, monday, googleCalendar, outlookCalendar } = settings;

  if (notion && kinds.has('notion')) {
    kanban.push(new NotionKanbanClient(notion, options.notion));
  }
  if (monday && kinds.has('monday')) {
    kanban.push(new MondayKanbanClient(monday, options.monday));
  }
  if (googleCalendar && kinds.has('google_calendar')) {
    calendars.push(
      new GoogleCalendarClient(
        new GoogleOAuthTokenProvider(googleCalendar, options.googleOAuth),
        googleCalendar.calendarId || 'primary',
        options.googleCalendar
      )
    );
  }
  if (outlookCalendar && kinds.has('outlook_calendar')) {
    calendars.push(
      new OutlookCalendarClient(new OutlookOAuthTokenProvider(outlookCalendar, options.outlookOAuth), options.outlookCalendar)
    );
  }

  return { kanban, calendars };
}

export function createDestinationResolver(options: DestinationClientOptions): DestinationResolver {
  return settings => createDestinations(settings, options);
}
