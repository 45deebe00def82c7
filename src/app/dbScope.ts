// 作用域连接中间件：每个请求打开一个 SQLite 连接，响应后无论成败都关闭

import { createMiddleware } from "hono/factory";
import { openDb } from "../db/index.js";
import type { AppEnv } from "./types.js";


export function dbScope(dbPath: string) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const db = openDb(dbPath);
    c.set("db", db);
    try {
      await next();
    } finally {
      db.close();
    }
  });
}
