/**
 * Direction of a recorded message relative to the local peer
 */
export type MessageDirection = 'sent' | 'received';

/**
 * Stored history record
 */
export interface HistoryEntry {
  id: number;               // Insertion sequence
  sessionId: string;        // Random per-session identifier (hex)
  direction: MessageDirection;
  plaintext: string;        // Text as typed or as decoded
  ciphertext: Uint8Array;   // Wire bytes without the length prefix
  streamOffset: number;     // Keystream position before this message
  createdAt: number;        // Unix timestamp in milliseconds
}

/**
 * Query options for retrieving history
 */
export interface GetEntriesOptions {
  /** Filter by session */
  sessionId?: string;
  /** Filter by direction */
  direction?: MessageDirection;
  /** Maximum number of entries to return */
  limit?: number;
}

/**
 * Message history backend.
 * Implementations can use SQLite or any other store.
 */
export interface HistoryStore {
  /**
   * Append a message to the history
   */
  record(entry: Omit<HistoryEntry, 'id' | 'createdAt'>): Promise<HistoryEntry>;

  /**
   * Retrieve entries in insertion order
   */
  getEntries(options?: GetEntriesOptions): Promise<HistoryEntry[]>;

  /**
   * Close the storage connection
   */
  close(): Promise<void>;
}
