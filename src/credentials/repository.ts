/**
 * repository.ts - Persistence for encrypted user secrets
 *
 * The store only ever hands this layer opaque encrypted blobs; nothing
 * here can read an API key.
 */

import { mkdirSync } from "fs";
import path from "path";
import Database from "better-sqlite3";
import type { UserSecretRecord } from "./types";

export interface UserSecretRepository {
  /** The record for `userId`, or null when none is stored. */
  find(userId: string): UserSecretRecord | null;

  /**
   * Inserts or replaces the payload for `userId`. An existing row keeps its
   * createdAt; updatedAt becomes `now`.
   */
  upsert(userId: string, encryptedPayload: Buffer, now: number): void;

  /** Resolves to false when there was nothing to delete. */
  delete(userId: string): boolean;
}

interface UserSecretRow {
  user_id: string;
  encrypted_payload: Buffer;
  created_at: number;
  updated_at: number;
}

export class SqliteUserSecretRepository implements UserSecretRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS user_secrets (
        user_id TEXT PRIMARY KEY,
        encrypted_payload BLOB NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );
    `);
  }

  /**
   * Opens (creating if needed) the database at `databasePath`.
   * ":memory:" gives a throwaway database.
   */
  static open(databasePath: string): SqliteUserSecretRepository {
    if (databasePath !== ":memory:") {
      mkdirSync(path.dirname(databasePath), { recursive: true });
    }
    const db = new Database(databasePath);
    if (databasePath !== ":memory:") {
      db.pragma("journal_mode = WAL");
    }
    return new SqliteUserSecretRepository(db);
  }

  find(userId: string): UserSecretRecord | null {
    const row = this.db
      .prepare<[string], UserSecretRow>(
        "SELECT user_id, encrypted_payload, created_at, updated_at FROM user_secrets WHERE user_id = ?"
      )
      .get(userId);
    if (!row) return null;
    return {
      userId: row.user_id,
      encryptedPayload: row.encrypted_payload,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  upsert(userId: string, encryptedPayload: Buffer, now: number): void {
    this.db
      .prepare(
        `INSERT INTO user_secrets (user_id, encrypted_payload, created_at, updated_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET
           encrypted_payload = excluded.encrypted_payload,
           updated_at = excluded.updated_at`
      )
      .run(userId, encryptedPayload, now, now);
  }

  delete(userId: string): boolean {
    return this.db.prepare("DELETE FROM user_secrets WHERE user_id = ?").run(userId).changes > 0;
  }

  close(): void {
    this.db.close();
  }
}
