// ============================================
// LOG RECORD STORE TYPES
// ============================================

import type { LogLevel, LogRecord } from "../logger/types.js";

export interface StoredLogRecord extends LogRecord {
  id: number;
}

export interface LogRecordQuery {
  level?: LogLevel;
  /** Case-insensitive substring of the message */
  search?: string;
  limit?: number;
  offset?: number;
}

/**
 * Read-only listing over stored records, newest first
 */
export interface LogRecordView {
  list(query?: LogRecordQuery): StoredLogRecord[];
  count(query?: Omit<LogRecordQuery, "limit" | "offset">): number;
  get(id: number): StoredLogRecord | undefined;
}
