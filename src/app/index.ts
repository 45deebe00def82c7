// App 入口：加载 .env，初始化数据目录与 schema，启动 Hono 服务

import "dotenv/config";
import { serve } from "@hono/node-server";
import { insecureDefaults, loadConfig } from "../config/index.js";
import { initDataDir } from "../config/paths.js";
import { initSchema, withDb } from "../db/index.js";
import { errMessage, logger } from "../logger/index.js";
import { createApp } from "./router.js";


async function main() {
  const config = loadConfig();
  for (const name of insecureDefaults(config)) {
    logger.warn("config", "仍在使用默认值，请通过环境变量设置", { name });
  }
  await initDataDir(config.dbPath);
  withDb(config.dbPath, initSchema);
  const app = createApp({ config });
  serve({ fetch: app.fetch, port: config.port });
  logger.info("app", `Portal: http://127.0.0.1:${config.port}/`, { dbPath: config.dbPath });
}


main().catch((err) => {
  logger.error("app", "启动失败", { err: errMessage(err) });
  process.exitCode = 1;
});
