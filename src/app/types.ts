// Hono 上下文变量：由中间件注入，handler 通过 c.get 读取

import type { Db } from "../db/index.js";


export type AppEnv = {
  Variables: {
    /** 当前请求的数据库连接（dbScope 注入，请求结束后关闭） */
    db: Db;
  };
};
