// 路径配置：集中管理所有运行时路径，区分项目文件与用户数据

import { mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";


/** 用户数据根目录：data/（不纳入版本管理，存放 SQLite 数据库） */
export const DATA_DIR = join(process.cwd(), "data");


/** 默认数据库文件：data/portal.db */
export const DEFAULT_DB_PATH = join(DATA_DIR, "portal.db");


/** 页面模板目录：statics/（项目文件，纳入版本管理） */
export const STATICS_DIR = join(process.cwd(), "statics");


/** 确保数据库文件所在目录存在 */
export async function initDataDir(dbPath: string): Promise<void> {
  await mkdir(dirname(dbPath), { recursive: true });
}
