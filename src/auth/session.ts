// 会话：进程内 SessionStore + 签名 cookie 保存会话 id

import { randomBytes } from "node:crypto";
import type { Context } from "hono";
import { deleteCookie, getSignedCookie, setSignedCookie } from "hono/cookie";


export const SESSION_COOKIE = "portal_session";


export interface SessionData {
  authorized: boolean;
  /** 最近一次活动时间（毫秒时间戳） */
  lastActive: number;
}


export interface ActiveSession {
  id: string;
  data: SessionData;
}


/** 进程内会话存储；由 createApp 持有，不做跨进程共享 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionData>();
  /** 被 sweep 清理的会话 id → 清理时间；保留一个超时窗口，供门禁给出过期提示 */
  private readonly expired = new Map<string, number>();

  create(data: SessionData): string {
    const id = randomBytes(20).toString("hex");
    this.sessions.set(id, data);
    return id;
  }

  get(id: string): SessionData | undefined {
    return this.sessions.get(id);
  }

  destroy(id: string): boolean {
    return this.sessions.delete(id);
  }

  /** 清理超过 timeoutMs 未活动的会话，返回清理数量 */
  sweep(now: number, timeoutMs: number): number {
    for (const [id, at] of this.expired) {
      if (now - at > timeoutMs) this.expired.delete(id);
    }
    let removed = 0;
    for (const [id, data] of this.sessions) {
      if (now - data.lastActive > timeoutMs) {
        this.sessions.delete(id);
        this.expired.set(id, now);
        removed++;
      }
    }
    return removed;
  }

  /** 该 id 是否因超时被 sweep 清理过；只返回一次 true */
  takeExpired(id: string): boolean {
    return this.expired.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}


/** cookie 中签名有效的会话 id */
export async function readSessionId(c: Context, secret: string): Promise<string | null> {
  const id = await getSignedCookie(c, secret, SESSION_COOKIE);
  return id || null;
}


/** 读取当前请求的会话；cookie 缺失、签名无效或会话已销毁时返回 null */
export async function readSession(c: Context, store: SessionStore, secret: string): Promise<ActiveSession | null> {
  const id = await readSessionId(c, secret);
  if (!id) return null;
  const data = store.get(id);
  return data ? { id, data } : null;
}


/** PIN 通过后新建已授权会话，旧会话（若有）一并销毁 */
export async function startSession(c: Context, store: SessionStore, secret: string, now: number): Promise<ActiveSession> {
  const previous = await readSession(c, store, secret);
  if (previous) store.destroy(previous.id);
  const data: SessionData = { authorized: true, lastActive: now };
  const id = store.create(data);
  await setSignedCookie(c, SESSION_COOKIE, id, secret, { path: "/", httpOnly: true, sameSite: "Lax" });
  return { id, data };
}


/** 销毁会话并清除 cookie */
export function endSession(c: Context, store: SessionStore, id: string): void {
  store.destroy(id);
  deleteCookie(c, SESSION_COOKIE, { path: "/" });
}
