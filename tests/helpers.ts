// 测试工具：临时 SQLite 文件 + 可控时钟 + 进程内请求（app.request），不监听端口

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createApp } from "../src/app/router.js";
import { SessionStore } from "../src/auth/session.js";
import type { PortalConfig } from "../src/config/index.js";
import { initSchema, withDb } from "../src/db/index.js";


export const TEST_PIN = "4321";
export const START = new Date("2025-03-01T10:00:00.000Z");


/** 从响应的 Set-Cookie 中取出 name=value 部分 */
export function cookieFrom(res: Response): string | null {
  const header = res.headers.get("set-cookie");
  return header ? header.split(";")[0] : null;
}


export async function createHarness(overrides: Partial<PortalConfig> = {}) {
  const dir = await mkdtemp(join(tmpdir(), "portal-test-"));
  const dbPath = join(dir, "test.db");
  withDb(dbPath, initSchema);
  let current = START.getTime();
  const config: PortalConfig = {
    secretKey: "test-secret",
    pin: TEST_PIN,
    inactivityTimeoutMs: 60_000,
    dbPath,
    port: 0,
    ...overrides,
  };
  const sessions = new SessionStore();
  const app = createApp({ config, sessions, now: () => new Date(current) });

  function headers(cookie?: string | null): Record<string, string> {
    return cookie ? { Cookie: cookie } : {};
  }

  return {
    app,
    config,
    dbPath,
    sessions,
    advance(ms: number) {
      current += ms;
    },
    get(path: string, cookie?: string | null) {
      return app.request(path, { headers: headers(cookie) });
    },
    post(path: string, form: Record<string, string>, cookie?: string | null) {
      return app.request(path, { method: "POST", body: new URLSearchParams(form), headers: headers(cookie) });
    },
    /** 提交 PIN，返回会话 cookie（PIN 错误时为 null） */
    async login(pin = TEST_PIN): Promise<string | null> {
      const res = await app.request("/pin", { method: "POST", body: new URLSearchParams({ pin }) });
      return cookieFrom(res);
    },
    cleanup() {
      return rm(dir, { recursive: true, force: true });
    },
  };
}


export type Harness = Awaited<ReturnType<typeof createHarness>>;
