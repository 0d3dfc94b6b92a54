/**
 * SQLite revocation storage using better-sqlite3.
 */

import Database from 'better-sqlite3';
import type { RevocationRecord, RevocationStorage } from '../core/types.js';

interface RevocationRow {
  user_id: string;
  revoked: number;
  revoked_at: number | null;
}

export class SqliteRevocationStorage implements RevocationStorage {
  private db: Database.Database;
  private selectOne: Database.Statement<[string], RevocationRow>;
  private selectAll: Database.Statement<[], RevocationRow>;
  private upsert: Database.Statement<[string, number, number | null]>;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.createTables();
    this.selectOne = this.db.prepare<[string], RevocationRow>(
      'SELECT user_id, revoked, revoked_at FROM revocations WHERE user_id = ?',
    );
    this.selectAll = this.db.prepare<[], RevocationRow>(
      'SELECT user_id, revoked, revoked_at FROM revocations ORDER BY user_id',
    );
    this.upsert = this.db.prepare<[string, number, number | null]>(`
      INSERT INTO revocations (user_id, revoked, revoked_at) VALUES (?, ?, ?)
      ON CONFLICT(user_id) DO UPDATE SET revoked = excluded.revoked, revoked_at = excluded.revoked_at
    `);
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS revocations (
        user_id TEXT PRIMARY KEY,
        revoked INTEGER NOT NULL,
        revoked_at INTEGER
      );
    `);
  }

  async getRevocation(userId: string): Promise<RevocationRecord | null> {
    const row = this.selectOne.get(userId);
    return row ? rowToRecord(row) : null;
  }

  async saveRevocation(record: RevocationRecord): Promise<void> {
    this.upsert.run(record.userId, record.revoked ? 1 : 0, record.revokedAt ?? null);
  }

  async listRevocations(): Promise<RevocationRecord[]> {
    return this.selectAll.all().map(rowToRecord);
  }

  close(): void {
    this.db.close();
  }
}

function rowToRecord(row: RevocationRow): RevocationRecord {
  const record: RevocationRecord = { userId: row.user_id, revoked: row.revoked === 1 };
  if (row.revoked_at !== null) record.revokedAt = row.revoked_at;
  return record;
}
