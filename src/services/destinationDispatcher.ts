import { CalendarDestination, ConfiguredDestinations, KanbanDestination } from '../integrations/base/capabilities';
import { ActionItemCreationStore } from '../database/stores';
import { getErrorMessage } from '../errors';
import {
  ActionItemCreation,
  CalendarSyncEntry,
  CalendarSyncMap,
  DestinationResult,
  ExtractedTask,
  KanbanDestinationKind
} from '../types';
import { buildTaskKey, summarizeCalendarSyncs } from './actionItems';

export interface DispatchRequest {
  meetingId: string;
  recordId: string;
  clientReferenceId: string;
  timezone: string;
  tasks: ExtractedTask[];
  destinations: ConfiguredDestinations;
}

export interface DispatchSummary {
  results: DestinationResult[];
  createdCount: number;
  failedCount: number;
}

/**
 * Fans tasks out to every configured destination. Each destination call is
 * isolated: a failure is recorded as a result and the remaining calls still run.
 *
 * Existing ActionItemCreation rows for the meeting make the dispatch
 * idempotent: a task already on a board is not created again, and a calendar
 * that already holds the task's event gets no second one.
 */
export class DestinationDispatcher {
  constructor(private actionItems: ActionItemCreationStore) {}

  async dispatch(request: DispatchRequest): Promise<DispatchSummary> {
    const { meetingId, destinations } = request;
    const existing = await this.actionItems.listByMeetingId(meetingId);
    const results: DestinationResult[] = [];

    for (const task of request.tasks) {
      const taskKey = buildTaskKey(task);
      const rows = existing.filter(row => row.task_key === taskKey);
      const calendarApplies = Boolean(task.dueDate) && destinations.calendars.length > 0;

      for (const kanban of destinations.kanban) {
        const previous = rows.find(row => row.destination_kind === kanban.kind);
        if (previous) {
          results.push(this.result(kanban.kind, task, taskKey, 'skipped_existing', previous.destination_ref));
          continue;
        }
        results.push(await this.createCard(request, kanban, task, taskKey, rows, calendarApplies));
      }

      if (calendarApplies && rows.length > 0) {
        results.push(...(await this.syncCalendars(request, task, taskKey, rows)));
      }
    }

    return {
      results,
      createdCount: results.filter(result => result.status === 'created').length,
      failedCount: results.filter(result => result.status === 'failed').length
    };
  }

  /** Creates the card and records it; a recorded row is appended to `rows`. */
  private async createCard(
    request: DispatchRequest,
    kanban: KanbanDestination,
    task: ExtractedTask,
    taskKey: string,
    rows: ActionItemCreation[],
    calendarApplies: boolean
  ): Promise<DestinationResult> {
    const { meetingId } = request;

    let ref: string;
    try {
      ref = await kanban.createCard(task, { meetingId });
    } catch (error) {
      console.error(`Failed to create ${kanban.kind} card for meeting ${meetingId} ("${task.title}"):`, error);
      return this.result(kanban.kind, task, taskKey, 'failed', null, getErrorMessage(error));
    }

    try {
      const row = await this.actionItems.create({
        meeting_id: meetingId,
        transcription_record_id: request.recordId,
        client_reference_id: request.clientReferenceId,
        task_key: taskKey,
        title: task.title,
        destination_kind: kanban.kind,
        destination_ref: ref,
        due_date: task.dueDate,
        calendar_sync_status: calendarApplies ? 'pending' : 'not_applicable'
      });
      rows.push(row);
      return this.result(kanban.kind, task, taskKey, 'created', ref);
    } catch (error) {
      // The card exists on the board; report it with its ref so it can be found and cleaned up.
      console.error(`Created ${kanban.kind} card ${ref} for meeting ${meetingId} but could not record it:`, error);
      const recorded = await this.findRecordedRow(meetingId, taskKey, kanban.kind);
      if (recorded) {
        rows.push(recorded);
      }
      return this.result(
        kanban.kind,
        task,
        taskKey,
        'created',
        ref,
        `Card ${ref} created but not recorded: ${getErrorMessage(error)}`
      );
    }
  }

  // A concurrent run may have recorded the same task first (unique violation on insert).
  private async findRecordedRow(
    meetingId: string,
    taskKey: string,
    kind: KanbanDestinationKind
  ): Promise<ActionItemCreation | null> {
    try {
      const rows = await this.actionItems.listByMeetingId(meetingId);
      return rows.find(row => row.task_key === taskKey && row.destination_kind === kind) ?? null;
    } catch (error) {
      console.error(`Failed to reload action item creations for meeting ${meetingId}:`, error);
      return null;
    }
  }

  private async syncCalendars(
    request: DispatchRequest,
    task: ExtractedTask,
    taskKey: string,
    rows: ActionItemCreation[]
  ): Promise<DestinationResult[]> {
    const results: DestinationResult[] = [];
    const changes: CalendarSyncMap = {};

    for (const calendar of request.destinations.calendars) {
      const synced = rows.find(row => row.calendar_syncs[calendar.kind]?.status === 'synced');
      if (synced) {
        const ref = synced.calendar_syncs[calendar.kind]?.event_ref ?? null;
        results.push(this.result(calendar.kind, task, taskKey, 'skipped_existing', ref));
        continue;
      }

      const outcome = await this.createEvent(request, calendar, task);
      changes[calendar.kind] = outcome;
      results.push(
        this.result(
          calendar.kind,
          task,
          taskKey,
          outcome.status === 'synced' ? 'created' : 'failed',
          outcome.event_ref,
          outcome.error
        )
      );
    }

    if (Object.keys(changes).length > 0) {
      await this.recordCalendarSyncs(request.meetingId, rows, changes);
    }
    return results;
  }

  private async createEvent(
    request: DispatchRequest,
    calendar: CalendarDestination,
    task: ExtractedTask
  ): Promise<CalendarSyncEntry> {
    try {
      const eventRef = await calendar.createEvent(task, {
        meetingId: request.meetingId,
        timezone: request.timezone
      });
      return { status: 'synced', event_ref: eventRef, error: null };
    } catch (error) {
      console.error(`Failed to create ${calendar.kind} event for meeting ${request.meetingId} ("${task.title}"):`, error);
      return { status: 'failed', event_ref: null, error: getErrorMessage(error) };
    }
  }

  private async recordCalendarSyncs(
    meetingId: string,
    rows: ActionItemCreation[],
    changes: CalendarSyncMap
  ): Promise<void> {
    for (const row of rows) {
      const update = summarizeCalendarSyncs({ ...row.calendar_syncs, ...changes });
      try {
        await this.actionItems.updateCalendarSync([row.id], update);
        Object.assign(row, update);
      } catch (error) {
        console.error(`Failed to record calendar sync for meeting ${meetingId} (row ${row.id}):`, error);
      }
    }
  }

  private result(
    destination: DestinationResult['destination'],
    task: ExtractedTask,
    taskKey: string,
    status: DestinationResult['status'],
    ref: string | null,
    error: string | null = null
  ): DestinationResult {
    return { destination, task_key: taskKey, task_title: task.title, status, ref, error };
  }
}
