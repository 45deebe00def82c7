// 数据库模块：SQLite 连接（每个请求独立打开、用完关闭）、schema 初始化与 Writing CRUD

import Database from "better-sqlite3";
import type { CategorySlug } from "../writings/categories.js";
import type { SaveWritingInput, Writing } from "../writings/types.js";


export type Db = Database.Database;


/** 打开数据库连接；调用方负责 close，优先使用 withDb */
export function openDb(dbPath: string): Db {
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  return db;
}


/** 作用域连接：执行 fn 后无论成功与否都关闭连接 */
export function withDb<T>(dbPath: string, fn: (db: Db) => T): T {
  const db = openDb(dbPath);
  try {
    return fn(db);
  } finally {
    db.close();
  }
}


/** 建表：writings 主表 + 按分类/更新时间的索引 */
export function initSchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS writings (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      category    TEXT NOT NULL,
      title       TEXT NOT NULL,
      content     TEXT NOT NULL,
      created_at  TEXT NOT NULL,
      updated_at  TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_writings_category_updated ON writings(category, updated_at);
  `);
}


/** 按分类列出全部条目，最近更新在前（同一时间戳按 id 倒序） */
export function listWritings(db: Db, category: CategorySlug): Writing[] {
  return db.prepare(`
    SELECT * FROM writings
    WHERE category = @category
    ORDER BY updated_at DESC, id DESC
  `).all({ category }) as Writing[];
}


/** 按 id 查询；传入 category 时同时按分类限定 */
export function getWriting(db: Db, id: number, category?: CategorySlug): Writing | null {
  const row = category
    ? db.prepare("SELECT * FROM writings WHERE id = @id AND category = @category").get({ id, category })
    : db.prepare("SELECT * FROM writings WHERE id = @id").get({ id });
  return (row as Writing | undefined) ?? null;
}


/** 新建条目，created_at 与 updated_at 相同，返回新 id */
export function createWriting(db: Db, input: Omit<SaveWritingInput, "id">, now: Date): number {
  const ts = now.toISOString();
  const info = db.prepare(`
    INSERT INTO writings (category, title, content, created_at, updated_at)
    VALUES (@category, @title, @content, @ts, @ts)
  `).run({ category: input.category, title: input.title, content: input.content, ts });
  return Number(info.lastInsertRowid);
}


/** 更新标题/正文/updated_at，按 id + category 限定，返回受影响行数（0 表示不存在或分类不符） */
export function updateWriting(db: Db, input: SaveWritingInput & { id: number }, now: Date): number {
  const info = db.prepare(`
    UPDATE writings
    SET title = @title, content = @content, updated_at = @ts
    WHERE id = @id AND category = @category
  `).run({ id: input.id, category: input.category, title: input.title, content: input.content, ts: now.toISOString() });
  return info.changes;
}


/** 删除条目，按 id + category 限定，防止伪造 id 跨分类删除 */
export function deleteWriting(db: Db, id: number, category: CategorySlug): number {
  return db.prepare("DELETE FROM writings WHERE id = @id AND category = @category").run({ id, category }).changes;
}
