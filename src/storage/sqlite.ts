import Database from 'better-sqlite3';
import type {
  HistoryStore,
  HistoryEntry,
  GetEntriesOptions,
  MessageDirection,
} from './adapter.js';

interface HistoryRow {
  id: number;
  session_id: string;
  direction: MessageDirection;
  plaintext: string;
  ciphertext: Buffer;
  stream_offset: number;
  created_at: number;
}

/**
 * SQLite-backed chat history
 */
export class SQLiteHistoryStore implements HistoryStore {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS messages (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id    TEXT NOT NULL,
        direction     TEXT NOT NULL CHECK (direction IN ('sent', 'received')),
        plaintext     TEXT NOT NULL,
        ciphertext    BLOB NOT NULL,
        stream_offset INTEGER NOT NULL,
        created_at    INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_session
        ON messages (session_id, id);
    `);
  }

  async record(entry: Omit<HistoryEntry, 'id' | 'createdAt'>): Promise<HistoryEntry> {
    const createdAt = Date.now();

    const stmt = this.db.prepare(`
      INSERT INTO messages (session_id, direction, plaintext, ciphertext, stream_offset, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    const result = stmt.run(
      entry.sessionId,
      entry.direction,
      entry.plaintext,
      Buffer.from(entry.ciphertext),
      entry.streamOffset,
      createdAt
    );

    return {
      ...entry,
      id: Number(result.lastInsertRowid),
      createdAt,
    };
  }

  async getEntries(options: GetEntriesOptions = {}): Promise<HistoryEntry[]> {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (options.sessionId) {
      conditions.push('session_id = ?');
      params.push(options.sessionId);
    }

    if (options.direction) {
      conditions.push('direction = ?');
      params.push(options.direction);
    }

    const whereClause = conditions.length > 0
      ? `WHERE ${conditions.join(' AND ')}`
      : '';

    let limitClause = '';
    if (options.limit !== undefined) {
      limitClause = 'LIMIT ?';
      params.push(options.limit);
    }

    const query = `
      SELECT id, session_id, direction, plaintext, ciphertext, stream_offset, created_at
      FROM messages
      ${whereClause}
      ORDER BY id ASC
      ${limitClause}
    `;

    const rows = this.db.prepare(query).all(...params) as HistoryRow[];

    return rows.map((row) => ({
      id: row.id,
      sessionId: row.session_id,
      direction: row.direction,
      plaintext: row.plaintext,
      ciphertext: new Uint8Array(row.ciphertext),
      streamOffset: row.stream_offset,
      createdAt: row.created_at,
    }));
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
