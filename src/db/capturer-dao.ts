/**
 * Data access for accounts, schedules and the database browser pages
 */

import type Database from 'better-sqlite3';
import type { CapturerDatabase } from './database.js';
import type { AccountLookup, AccountRecord } from '../auth/auth-gate.js';
import { ConflictError, NotFoundError, ValidationError, toError } from '../errors/index.js';

export interface AccountSummary {
  username: string;
  createdAt: string;
}

export interface Schedule {
  id: number;
  name: string;
  startTime: string;
  durationMinutes: number;
  enabled: boolean;
  createdAt: string;
}

export type NewSchedule = Omit<Schedule, 'id' | 'createdAt'>;

export interface TableSummary {
  name: string;
  rowCount: number;
}

export type CellValue = string | number | null;

export interface QueryResult {
  columns: string[];
  rows: Array<Record<string, CellValue>>;
  truncated: boolean;
}

interface ScheduleRow {
  id: number;
  name: string;
  start_time: string;
  duration_minutes: number;
  enabled: number;
  created_at: string;
}

type RowStatement = Database.Statement<unknown[], Record<string, unknown>>;

interface CountRow {
  count: number;
}

export const MAX_QUERY_ROWS = 1000;

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('hex');
  }
  return String(value);
}

function toSchedule(row: ScheduleRow): Schedule {
  return {
    id: row.id,
    name: row.name,
    startTime: row.start_time,
    durationMinutes: row.duration_minutes,
    enabled: row.enabled === 1,
    createdAt: row.created_at,
  };
}

function collectRows(
  statement: RowStatement,
  params: unknown[],
  maxRows: number
): QueryResult {
  const columns = statement.columns().map(column => column.name);
  const rows: QueryResult['rows'] = [];
  let truncated = false;

  for (const row of statement.iterate(...params)) {
    if (rows.length >= maxRows) {
      truncated = true;
      break;
    }
    const normalized: Record<string, CellValue> = {};
    for (const column of columns) {
      normalized[column] = toCellValue(row[column]);
    }
    rows.push(normalized);
  }

  return { columns, rows, truncated };
}

export class CapturerDao implements AccountLookup {
  constructor(
    private db: CapturerDatabase,
    private clock: () => Date = () => new Date()
  ) {}

  // --- accounts

  queryAccount(username: string): AccountRecord | undefined {
    return this.db
      .prepare<[string], AccountRecord>('SELECT username, password, misc FROM accounts WHERE username = ?')
      .get(username);
  }

  countAccounts(): number {
    return this.db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM accounts').get()?.count ?? 0;
  }

  listAccounts(): AccountSummary[] {
    return this.db
      .prepare<[], { username: string; created_at: string }>(
        'SELECT username, created_at FROM accounts ORDER BY username'
      )
      .all()
      .map(row => ({ username: row.username, createdAt: row.created_at }));
  }

  insertAccount(username: string, passwordHex: string, saltHex: string): AccountSummary {
    if (this.queryAccount(username)) {
      throw new ConflictError(`Account "${username}" already exists`, { username });
    }

    const createdAt = this.clock().toISOString();
    this.db
      .prepare<[string, string, string, string]>(
        'INSERT INTO accounts (username, password, misc, created_at) VALUES (?, ?, ?, ?)'
      )
      .run(username, passwordHex, saltHex, createdAt);

    return { username, createdAt };
  }

  deleteAccount(username: string): boolean {
    const result = this.db.prepare<[string]>('DELETE FROM accounts WHERE username = ?').run(username);
    return result.changes > 0;
  }

  // --- schedules

  listSchedules(): Schedule[] {
    return this.db
      .prepare<[], ScheduleRow>('SELECT * FROM schedules ORDER BY start_time, id')
      .all()
      .map(toSchedule);
  }

  getSchedule(id: number): Schedule | undefined {
    const row = this.db.prepare<[number], ScheduleRow>('SELECT * FROM schedules WHERE id = ?').get(id);
    return row ? toSchedule(row) : undefined;
  }

  insertSchedule(schedule: NewSchedule): Schedule {
    const result = this.db
      .prepare<[string, string, number, number, string]>(
        'INSERT INTO schedules (name, start_time, duration_minutes, enabled, created_at) VALUES (?, ?, ?, ?, ?)'
      )
      .run(
        schedule.name,
        schedule.startTime,
        schedule.durationMinutes,
        schedule.enabled ? 1 : 0,
        this.clock().toISOString()
      );

    const created = this.getSchedule(Number(result.lastInsertRowid));
    if (!created) {
      throw new NotFoundError('Inserted schedule could not be read back');
    }
    return created;
  }

  deleteSchedule(id: number): boolean {
    const result = this.db.prepare<[number]>('DELETE FROM schedules WHERE id = ?').run(id);
    return result.changes > 0;
  }

  // --- database browser

  listTables(): TableSummary[] {
    const names = this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      )
      .all()
      .map(row => row.name);

    return names.map(name => ({
      name,
      rowCount:
        this.db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM ${quoteIdentifier(name)}`).get()?.count ?? 0,
    }));
  }

  browseTable(name: string, limit: number): QueryResult {
    const exists = this.listTables().some(table => table.name === name);
    if (!exists) {
      throw new NotFoundError(`Table "${name}" does not exist`, { table: name });
    }

    const statement = this.db.prepare<unknown[], Record<string, unknown>>(
      `SELECT * FROM ${quoteIdentifier(name)} LIMIT ?`
    );
    // One extra row tells whether the table holds more than the limit
    return collectRows(statement, [limit + 1], limit);
  }

  /**
   * Run a single read-only statement. Anything that would modify the
   * database is rejected before it executes.
   */
  runReadOnlyQuery(sql: string, maxRows: number = MAX_QUERY_ROWS): QueryResult {
    const source = sql.trim();
    if (!source) {
      throw new ValidationError('Query is empty');
    }

    let statement: RowStatement;
    try {
      statement = this.db.prepare<unknown[], Record<string, unknown>>(source);
    } catch (error) {
      throw new ValidationError(`Invalid query: ${toError(error).message}`);
    }

    if (!statement.reader || !statement.readonly) {
      throw new ValidationError('Only read-only statements are allowed');
    }

    try {
      return collectRows(statement, [], maxRows);
    } catch (error) {
      throw new ValidationError(`Query failed: ${toError(error).message}`);
    }
  }
}
