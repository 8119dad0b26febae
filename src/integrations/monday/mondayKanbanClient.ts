import { GraphQLClient } from 'graphql-request';
import { CardContext, KanbanDestination } from '../base/capabilities';
import { DispatchError, getErrorMessage } from '../../errors';
import { ExtractedTask, MondaySettings } from '../../types';
import { getPath, isJsonObject } from '../../utils/json';

export interface MondayClientOptions {
  apiUrl?: string;
  apiVersion?: string;
  timeoutMs?: number;
}

interface CreateItemResponse {
  create_item: { id: string } | null;
}

const CREATE_ITEM_MUTATION = `
  mutation CreateItem($boardId: ID!, $groupId: String, $itemName: String!, $columnValues: JSON) {
    create_item(board_id: $boardId, group_id: $groupId, item_name: $itemName, column_values: $columnValues) {
      id
    }
  }
`;

const MAX_ITEM_NAME_LENGTH = 255;

export class MondayKanbanClient implements KanbanDestination {
  readonly kind = 'monday';
  private graphqlClient: GraphQLClient;
  private timeoutMs: number;

  constructor(private settings: MondaySettings, options: MondayClientOptions = {}) {
    this.graphqlClient = new GraphQLClient(options.apiUrl || 'https://api.monday.com/v2', {
      headers: {
        Authorization: settings.apiToken,
        'API-Version': options.apiVersion || '2024-01'
      }
    });
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  async createCard(task: ExtractedTask, context: CardContext): Promise<string> {
    try {
      const response = await this.graphqlClient.request<CreateItemResponse>({
        document: CREATE_ITEM_MUTATION,
        variables: {
          boardId: this.settings.boardId,
          groupId: this.settings.groupId ?? null,
          itemName: task.title.slice(0, MAX_ITEM_NAME_LENGTH),
          columnValues: JSON.stringify(this.buildColumnValues(task))
        },
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      const itemId = response.create_item?.id;
      if (!itemId) {
        throw new DispatchError('monday', `create_item returned no id for meeting ${context.meetingId}`);
      }
      return String(itemId);
    } catch (error) {
      if (error instanceof DispatchError) {
        throw error;
      }
      throw new DispatchError('monday', describeMondayError(error));
    }
  }

  private buildColumnValues(task: ExtractedTask): Record<string, unknown> {
    const columnValues: Record<string, unknown> = {};
    const { statusColumnId, todoStatusLabel, dateColumnId } = this.settings;

    if (statusColumnId && todoStatusLabel) {
      columnValues[statusColumnId] = { label: todoStatusLabel };
    }
    if (dateColumnId && task.dueDate) {
      columnValues[dateColumnId] = { date: task.dueDate };
    }

    return columnValues;
  }
}

function describeMondayError(error: unknown): string {
  const errors = getPath(error, 'response.errors');
  if (Array.isArray(errors) && errors.length > 0) {
    const message = errors
      .map(entry => (isJsonObject(entry) && typeof entry.message === 'string' ? entry.message : 'Unknown error'))
      .join('; ');
    return `Monday API error: ${message}`;
  }
  const status = getPath(error, 'response.status');
  if (status === 401 || status === 403) {
    return 'Monday authentication failed';
  }
  if (status === 429) {
    return 'Monday rate limit exceeded';
  }
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return 'Monday request timed out';
  }
  return getErrorMessage(error);
}
