import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";

import * as schema from "./schema";

import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

/**
 * マイグレーションツールを使わずに起動時に作成する
 */
const CREATE_BOOKS_TABLE = `
CREATE TABLE IF NOT EXISTS books (
  id TEXT PRIMARY KEY NOT NULL,
  title TEXT NOT NULL,
  authors TEXT NOT NULL,
  publisher TEXT,
  publish_year INTEGER,
  page_count INTEGER,
  isbn TEXT,
  description TEXT,
  cover_image_url TEXT,
  source TEXT NOT NULL,
  external_id TEXT
);
CREATE INDEX IF NOT EXISTS books_isbn_idx ON books (isbn);
`;

export type DrizzleDatabase = BetterSQLite3Database<typeof schema> & {
  $client: Database.Database;
};

/**
 * Better SQLite3 + Drizzle ORM のデータベース接続を作成
 * テーブルが無ければ作る
 * @param dbPath ":memory:" ならメモリ上のDB
 */
export function createDrizzleConnection(dbPath: string): DrizzleDatabase {
  try {
    const sqlite = new Database(dbPath);
    sqlite.exec(CREATE_BOOKS_TABLE);

    return drizzle({ client: sqlite, schema });
  } catch (error: unknown) {
    throw new Error(
      `Failed to create database connection: ${error instanceof Error ? error.message : "Unknown error"}`
    );
  }
}

/**
 * データベース接続を閉じる
 */
export function closeDrizzleConnection(db: DrizzleDatabase): void {
  db.$client.close();
}
