// ============================================
// RECORD STORE EXPORTS
// ============================================
export { MemoryLogRecordStore } from "./store.js";
export type { MemoryLogRecordStoreOptions } from "./store.js";
export type { LogRecordQuery, LogRecordView, StoredLogRecord } from "./types.js";
