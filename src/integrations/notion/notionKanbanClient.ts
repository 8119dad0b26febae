import axios, { AxiosInstance } from 'axios';
import { CardContext, KanbanDestination } from '../base/capabilities';
import { DispatchError, getErrorMessage } from '../../errors';
import { ExtractedTask, NotionSettings } from '../../types';
import { describeHttpError } from '../httpErrors';

export interface NotionClientOptions {
  apiUrl?: string;
  version?: string;
  timeoutMs?: number;
}

interface NotionPropertySchema {
  type?: string;
}

interface NotionDatabaseResponse {
  properties?: Record<string, NotionPropertySchema>;
}

interface NotionPageResponse {
  id?: string;
}

interface DatabaseLayout {
  titleProperty: string;
  statusProperty: { name: string; type: 'status' | 'select' } | null;
  dateProperty: string | null;
}

type RichText = { text: { content: string } };

const MAX_TEXT_LENGTH = 2000;

function richText(content: string): RichText[] {
  return [{ text: { content: content.slice(0, MAX_TEXT_LENGTH) } }];
}

function paragraph(content: string) {
  return { object: 'block', type: 'paragraph', paragraph: { rich_text: richText(content) } };
}

export class NotionKanbanClient implements KanbanDestination {
  readonly kind = 'notion';
  private api: AxiosInstance;
  private layout?: DatabaseLayout;

  constructor(private settings: NotionSettings, options: NotionClientOptions = {}) {
    this.api = axios.create({
      baseURL: options.apiUrl || 'https://api.notion.com/v1',
      timeout: options.timeoutMs ?? 15000,
      headers: {
        Authorization: `Bearer ${settings.apiToken}`,
        'Notion-Version': options.version || '2022-06-28',
        'Content-Type': 'application/json'
      }
    });
  }

  async createCard(task: ExtractedTask, context: CardContext): Promise<string> {
    try {
      const layout = await this.loadLayout();
      const { data } = await this.api.post<NotionPageResponse>('/pages', {
        parent: { database_id: this.settings.databaseId },
        properties: this.buildProperties(task, layout),
        children: this.buildChildren(task, context)
      });

      if (!data.id) {
        throw new DispatchError('notion', 'Response did not include a page id');
      }
      return data.id;
    } catch (error) {
      if (error instanceof DispatchError) {
        throw error;
      }
      throw new DispatchError('notion', describeHttpError(error, 'Notion') ?? getErrorMessage(error));
    }
  }

  private async loadLayout(): Promise<DatabaseLayout> {
    if (this.layout) {
      return this.layout;
    }

    const { data } = await this.api.get<NotionDatabaseResponse>(`/databases/${this.settings.databaseId}`);
    const properties = Object.entries(data.properties || {});

    const titleProperty = properties.find(([, schema]) => schema.type === 'title')?.[0] || 'Name';

    const statusType = (name: string): 'status' | 'select' | null => {
      const type = data.properties?.[name]?.type;
      return type === 'status' || type === 'select' ? type : null;
    };

    let statusProperty: DatabaseLayout['statusProperty'] = null;
    const configuredStatus = this.settings.statusProperty;
    const configuredType = configuredStatus ? statusType(configuredStatus) : null;
    if (configuredStatus && configuredType) {
      statusProperty = { name: configuredStatus, type: configuredType };
    } else {
      for (const [name] of properties) {
        const type = statusType(name);
        if (type) {
          statusProperty = { name, type };
          break;
        }
      }
    }

    const dateProperty = properties.find(([, schema]) => schema.type === 'date')?.[0] || null;

    this.layout = { titleProperty, statusProperty, dateProperty };
    return this.layout;
  }

  private buildProperties(task: ExtractedTask, layout: DatabaseLayout): Record<string, unknown> {
    const properties: Record<string, unknown> = {
      [layout.titleProperty]: { title: richText(task.title) }
    };

    if (layout.statusProperty && this.settings.todoStatus) {
      properties[layout.statusProperty.name] = {
        [layout.statusProperty.type]: { name: this.settings.todoStatus }
      };
    }

    if (layout.dateProperty && task.dueDate) {
      properties[layout.dateProperty] = { date: { start: task.dueDate } };
    }

    return properties;
  }

  private buildChildren(task: ExtractedTask, context: CardContext) {
    const lines = [
      task.details,
      task.assigneeName || task.assigneeEmail
        ? `Assignee: ${[task.assigneeName, task.assigneeEmail].filter(Boolean).join(' ')}`
        : null,
      task.sourceSentence ? `From the meeting: "${task.sourceSentence}"` : null,
      `Meeting: ${context.meetingId}`
    ];
    return lines.filter((line): line is string => Boolean(line)).map(paragraph);
  }
}
