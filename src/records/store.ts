import { LoggerConfigError } from "../logger/errors.js";
import type { LogRecord, LogRecordSink } from "../logger/types.js";
import type { LogRecordQuery, LogRecordView, StoredLogRecord } from "./types.js";

export interface MemoryLogRecordStoreOptions {
  /** Oldest records are dropped once the store holds this many */
  capacity?: number;
}

const DEFAULT_CAPACITY = 1000;
const DEFAULT_LIST_LIMIT = 100;

function newestFirst(a: StoredLogRecord, b: StoredLogRecord): number {
  const byTime = b.timestamp.getTime() - a.timestamp.getTime();
  return byTime !== 0 ? byTime : b.id - a.id;
}

function copyRecord(record: StoredLogRecord): StoredLogRecord {
  return { ...record, timestamp: new Date(record.timestamp.getTime()) };
}

// ============================================
// IN-PROCESS LOG RECORD STORE
// ============================================
export class MemoryLogRecordStore implements LogRecordSink, LogRecordView {
  private records: StoredLogRecord[] = [];
  private nextId = 1;
  private capacity: number;

  constructor(options: MemoryLogRecordStoreOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new LoggerConfigError(`Record store capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  // ============================================
  // WRITE OPERATIONS
  // ============================================

  /**
   * Keep a record. Records are never updated afterwards.
   */
  save(record: LogRecord): void {
    this.insert(record);
  }

  insert(record: LogRecord): number {
    const stored: StoredLogRecord = {
      id: this.nextId++,
      timestamp: new Date(record.timestamp.getTime()),
      level: record.level,
      loggerName: record.loggerName,
      message: record.message,
    };
    this.records.push(stored);

    if (this.records.length > this.capacity) {
      this.records.splice(0, this.records.length - this.capacity);
    }
    return stored.id;
  }

  // ============================================
  // READ OPERATIONS
  // ============================================

  private matching(query: LogRecordQuery): StoredLogRecord[] {
    const search = query.search?.toLowerCase();
    return this.records.filter(
      (record) =>
        (query.level === undefined || record.level === query.level) &&
        (!search || record.message.toLowerCase().includes(search))
    );
  }

  /**
   * Records matching the query, newest first
   */
  list(query: LogRecordQuery = {}): StoredLogRecord[] {
    const offset = query.offset ?? 0;
    const limit = query.limit ?? DEFAULT_LIST_LIMIT;

    return this.matching(query)
      .sort(newestFirst)
      .slice(offset, offset + limit)
      .map(copyRecord);
  }

  count(query: Omit<LogRecordQuery, "limit" | "offset"> = {}): number {
    return this.matching(query).length;
  }

  get(id: number): StoredLogRecord | undefined {
    const record = this.records.find((candidate) => candidate.id === id);
    return record ? copyRecord(record) : undefined;
  }

  /**
   * Drop every record; ids keep counting up
   */
  clear(): void {
    this.records = [];
  }
}
