import { ResponseParseError } from './apiClient.js';

export type TableContent = 'sensors' | 'channels';

export type TableRow = Record<string, unknown>;

export interface Credentials {
  username: string;
  passhash: string;
}

export interface TableQuery {
  content: TableContent;
  columns: readonly string[];
  count: number;
  id?: number;
}

/**
 * `table.json` answers with the rows under a key named after the content
 * type. Both keys are modelled; `items` prefers whichever one is populated.
 */
export class TableResponse {
  constructor(
    readonly sensors: TableRow[] | null,
    readonly channels: TableRow[] | null
  ) {}

  get items(): TableRow[] {
    if (this.channels && this.channels.length > 0) {
      return this.channels;
    }
    if (this.sensors && this.sensors.length > 0) {
      return this.sensors;
    }
    return [];
  }

  static parse(text: string, content: TableContent | null = null): TableResponse {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new ResponseParseError(content, error);
    }

    if (!isRecord(parsed)) {
      throw new ResponseParseError(content, new Error('expected a JSON object'));
    }

    const body = lowerCaseKeys(parsed);
    return new TableResponse(readRows(body.sensors), readRows(body.channels));
  }
}

export function trimServerUrl(server: string): string {
  return server.trim().replace(/\/+$/, '');
}

export function buildTableUrl(server: string, query: TableQuery, credentials: Credentials): URL {
  const url = new URL(`${trimServerUrl(server)}/api/table.json`);
  url.searchParams.set('content', query.content);
  if (typeof query.id === 'number') {
    url.searchParams.set('id', String(query.id));
  }
  url.searchParams.set('columns', query.columns.join(','));
  url.searchParams.set('count', String(query.count));
  url.searchParams.set('username', credentials.username);
  url.searchParams.set('passhash', credentials.passhash);
  return url;
}

/** Row keys are matched case-insensitively, so every row is re-keyed in lower case. */
export function lowerCaseKeys(row: Record<string, unknown>): TableRow {
  const result: TableRow = {};
  for (const [key, value] of Object.entries(row)) {
    const normalized = key.toLowerCase();
    if (!(normalized in result)) {
      result[normalized] = value;
    }
  }
  return result;
}

export function readText(row: TableRow, column: string): string | null {
  const value = row[column];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

export function readObjectId(row: TableRow): number | null {
  const value = row.objid;
  const numeric = typeof value === 'string' && value.trim() ? Number(value) : value;
  return typeof numeric === 'number' && Number.isInteger(numeric) ? numeric : null;
}

function readRows(value: unknown): TableRow[] | null {
  if (!Array.isArray(value)) {
    return null;
  }
  return value.filter(isRecord).map(lowerCaseKeys);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
