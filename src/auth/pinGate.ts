// PIN 门禁：受保护路由的中间件，校验会话授权与无操作超时

import { createMiddleware } from "hono/factory";
import { logger } from "../logger/index.js";
import type { AppEnv } from "../app/types.js";
import { endSession, readSession, readSessionId, type SessionStore } from "./session.js";


export interface PinGateOptions {
  store: SessionStore;
  secret: string;
  timeoutMs: number;
  now: () => Date;
}


/** 提交的 PIN 是否正确 */
export function pinMatches(entered: string, pin: string): boolean {
  return entered === pin;
}


/**
 * 未授权 → /pin；超过 timeoutMs 未活动 → 清除会话并跳转 /pin?expired=1；
 * 否则刷新 lastActive 后放行。已被其他登录的 sweep 清理的会话同样给出过期提示
 */
export function pinRequired(opts: PinGateOptions) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const session = await readSession(c, opts.store, opts.secret);
    if (!session) {
      const id = await readSessionId(c, opts.secret);
      if (id && opts.store.takeExpired(id)) {
        endSession(c, opts.store, id);
        logger.info("auth", "会话因无操作超时已关闭");
        return c.redirect("/pin?expired=1");
      }
      return c.redirect("/pin");
    }
    if (!session.data.authorized) return c.redirect("/pin");
    const now = opts.now().getTime();
    if (now - session.data.lastActive > opts.timeoutMs) {
      endSession(c, opts.store, session.id);
      logger.info("auth", "会话因无操作超时已关闭");
      return c.redirect("/pin?expired=1");
    }
    session.data.lastActive = now;
    await next();
  });
}
