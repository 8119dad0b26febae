import { CALENDAR_DESTINATION_KINDS, CalendarSyncMap, CalendarSyncUpdate, ExtractedTask } from '../types';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Returns the date when it is a real calendar day in YYYY-MM-DD form. */
export function toIsoDate(value: string | null | undefined): string | null {
  if (!value) {
    return null;
  }
  const trimmed = value.trim();
  const match = ISO_DATE.exec(trimmed);
  if (!match) {
    return null;
  }
  const date = new Date(`${trimmed}T00:00:00Z`);
  if (Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== trimmed) {
    return null;
  }
  return trimmed;
}

export function addDays(isoDate: string, days: number): string {
  const date = new Date(`${isoDate}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

/**
 * Calendar day of an instant as seen in `timezone`. Unknown zones fall back to
 * the UTC day; unparseable instants give null.
 */
export function toLocalIsoDate(instant: string | null | undefined, timezone: string): string | null {
  if (!instant) {
    return null;
  }
  const date = new Date(instant);
  if (Number.isNaN(date.getTime())) {
    return null;
  }

  let parts: Intl.DateTimeFormatPart[];
  try {
    parts = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit'
    }).formatToParts(date);
  } catch (error) {
    if (!(error instanceof RangeError)) {
      throw error;
    }
    console.warn(`Unknown timezone "${timezone}", using UTC for ${instant}`);
    return date.toISOString().slice(0, 10);
  }

  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(entry => entry.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

export function normalizeTitle(title: string): string {
  return title
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

/** Identity of a task within one meeting, used to skip destinations that already have it. */
export function buildTaskKey(task: Pick<ExtractedTask, 'title' | 'dueDate'>): string {
  return `${normalizeTitle(task.title)}|${task.dueDate ?? ''}`;
}

function cleanText(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function cleanEmail(value: string | null | undefined): string | null {
  const email = cleanText(value)?.toLowerCase() ?? null;
  return email && email.includes('@') ? email : null;
}

export interface RawTask {
  title?: string | null;
  assignee_email?: string | null;
  assignee_name?: string | null;
  due_date?: string | null;
  details?: string | null;
  source_sentence?: string | null;
}

export function normalizeExtractedTasks(items: RawTask[]): ExtractedTask[] {
  const seen = new Set<string>();
  const tasks: ExtractedTask[] = [];

  for (const item of items) {
    const title = cleanText(item.title)?.replace(/\s+/g, ' ');
    if (!title) {
      continue;
    }

    const task: ExtractedTask = {
      title,
      assigneeEmail: cleanEmail(item.assignee_email),
      assigneeName: cleanText(item.assignee_name),
      dueDate: toIsoDate(item.due_date),
      details: cleanText(item.details),
      sourceSentence: cleanText(item.source_sentence)
    };

    const key = buildTaskKey(task);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    tasks.push(task);
  }

  return tasks;
}

/** Folds the per-calendar entries of a row into its summary columns. */
export function summarizeCalendarSyncs(syncs: CalendarSyncMap): CalendarSyncUpdate {
  const entries = CALENDAR_DESTINATION_KINDS.flatMap(kind => {
    const entry = syncs[kind];
    return entry ? [entry] : [];
  });
  const errors = entries.flatMap(entry => (entry.status === 'failed' && entry.error ? [entry.error] : []));
  const firstRef = entries.find(entry => entry.status === 'synced' && entry.event_ref)?.event_ref ?? null;

  let status: CalendarSyncUpdate['calendar_sync_status'] = 'pending';
  if (entries.some(entry => entry.status === 'failed')) {
    status = 'failed';
  } else if (entries.length > 0) {
    status = 'synced';
  }

  return {
    calendar_sync_status: status,
    calendar_event_ref: firstRef,
    calendar_error: errors.length > 0 ? errors.join('; ') : null,
    calendar_syncs: syncs
  };
}
