// 应用配置：从环境变量读取（入口处由 dotenv 加载 .env），zod 校验后以对象形式注入 createApp

import { isAbsolute, join } from "node:path";
import { z } from "zod";
import { DEFAULT_DB_PATH } from "./paths.js";


export const DEFAULT_SECRET_KEY = "cambia-esta-clave-por-una-mas-larga";
export const DEFAULT_PIN = "1234";


/** 运行时配置 */
export interface PortalConfig {
  /** 会话 cookie 签名密钥 */
  secretKey: string;
  /** 访问 PIN */
  pin: string;
  /** 无操作超时（毫秒） */
  inactivityTimeoutMs: number;
  /** SQLite 文件绝对路径 */
  dbPath: string;
  port: number;
}


const envSchema = z.object({
  PORTAL_SECRET_KEY: z.string().min(1).default(DEFAULT_SECRET_KEY),
  PORTAL_PIN: z.string().min(1).default(DEFAULT_PIN),
  // 秒，默认 15 分钟
  INACTIVITY_TIMEOUT: z.coerce.number().int().positive().default(15 * 60),
  DB_PATH: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(5020),
});


export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}


/** 空字符串视为未设置，与 .env 中 `KEY=` 的写法一致 */
function dropEmpty(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v !== "") out[k] = v;
  }
  return out;
}


/** 解析环境变量为 PortalConfig，非法值抛出 ConfigError */
export function loadConfig(env: Record<string, string | undefined> = process.env): PortalConfig {
  const parsed = envSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`配置无效: ${detail}`);
  }
  const { PORTAL_SECRET_KEY, PORTAL_PIN, INACTIVITY_TIMEOUT, DB_PATH, PORT } = parsed.data;
  const dbPath = DB_PATH ? (isAbsolute(DB_PATH) ? DB_PATH : join(process.cwd(), DB_PATH)) : DEFAULT_DB_PATH;
  return {
    secretKey: PORTAL_SECRET_KEY,
    pin: PORTAL_PIN,
    inactivityTimeoutMs: INACTIVITY_TIMEOUT * 1000,
    dbPath,
    port: PORT,
  };
}


/** 仍在使用默认密钥或默认 PIN 时返回对应的变量名，供启动时告警 */
export function insecureDefaults(config: PortalConfig): string[] {
  const names: string[] = [];
  if (config.secretKey === DEFAULT_SECRET_KEY) names.push("PORTAL_SECRET_KEY");
  if (config.pin === DEFAULT_PIN) names.push("PORTAL_PIN");
  return names;
}
