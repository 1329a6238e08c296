// API response types for the Bagfiles Capturer dashboard
import { z } from 'zod';

// Zod schemas for runtime validation
export const PublicConfigSchema = z.object({
  title: z.string(),
  timerIntervalMs: z.number().positive(),
  consoleRefreshMs: z.number().positive(),
  authEnabled: z.boolean(),
});

export const TimerTickResponseSchema = z.object({
  n: z.number().int(),
});

export const ActiveScheduleSchema = z.object({
  id: z.number(),
  name: z.string(),
  startTime: z.string(),
  durationMinutes: z.number(),
});

export const ConsoleStatusSchema = z.object({
  status: z.literal('ok'),
  startedAt: z.string(),
  uptimeSeconds: z.number(),
  ticksReceived: z.number(),
  lastTick: z.number().nullable(),
  lastTickAt: z.string().nullable(),
  activeSchedules: z.array(ActiveScheduleSchema),
  accountCount: z.number(),
  scheduleCount: z.number(),
  nextSchedule: z
    .object({
      id: z.number(),
      name: z.string(),
      startsAt: z.string(),
    })
    .nullable(),
});

export const AccountSchema = z.object({
  username: z.string(),
  createdAt: z.string(),
});

export const AccountsResponseSchema = z.object({
  accounts: z.array(AccountSchema),
});

export const AccountCreatedSchema = z.object({
  account: AccountSchema,
});

export const AccountDeletedSchema = z.object({
  deleted: z.string(),
});

export const ScheduleSchema = z.object({
  id: z.number(),
  name: z.string(),
  startTime: z.string(),
  durationMinutes: z.number(),
  enabled: z.boolean(),
  createdAt: z.string(),
  nextStart: z.string().optional(),
});

export const SchedulesResponseSchema = z.object({
  schedules: z.array(ScheduleSchema),
});

export const ScheduleCreatedSchema = z.object({
  schedule: ScheduleSchema,
});

export const ScheduleDeletedSchema = z.object({
  deleted: z.number(),
});

export const TableSummarySchema = z.object({
  name: z.string(),
  rowCount: z.number(),
});

export const TablesResponseSchema = z.object({
  tables: z.array(TableSummarySchema),
});

export const CellValueSchema = z.union([z.string(), z.number(), z.null()]);

export const QueryResultSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.record(CellValueSchema)),
  truncated: z.boolean(),
});

export const TableRowsResponseSchema = QueryResultSchema.extend({
  table: z.string(),
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  message: z.string().optional(),
});

// TypeScript types inferred from schemas
export type PublicConfig = z.infer<typeof PublicConfigSchema>;
export type ConsoleStatus = z.infer<typeof ConsoleStatusSchema>;
export type ActiveSchedule = z.infer<typeof ActiveScheduleSchema>;
export type Account = z.infer<typeof AccountSchema>;
export type Schedule = z.infer<typeof ScheduleSchema>;
export type TableSummary = z.infer<typeof TableSummarySchema>;
export type CellValue = z.infer<typeof CellValueSchema>;
export type QueryResult = z.infer<typeof QueryResultSchema>;
export type TableRowsResponse = z.infer<typeof TableRowsResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
