export type {
  MessageDirection,
  HistoryEntry,
  GetEntriesOptions,
  HistoryStore,
} from './adapter.js';

export { SQLiteHistoryStore } from './sqlite.js';
