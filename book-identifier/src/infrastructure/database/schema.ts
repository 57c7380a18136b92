import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * 保存済みカタログのスキーマ定義
 * authors は JSON 文字列 (string[]) で持つ
 */
export const booksTable = sqliteTable("books", {
  id: text("id").primaryKey(),
  title: text("title").notNull(),
  authors: text("authors").notNull(),
  publisher: text("publisher"),
  publishYear: integer("publish_year"),
  pageCount: integer("page_count"),
  isbn: text("isbn"),
  description: text("description"),
  coverImageUrl: text("cover_image_url"),
  source: text("source").notNull(),
  externalId: text("external_id")
});

export type BookRow = typeof booksTable.$inferSelect;
export type NewBookRow = typeof booksTable.$inferInsert;
