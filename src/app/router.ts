// Router：Hono 实现，仅负责 HTTP 层；配置、会话存储与时钟通过 createApp 参数注入

import { Hono } from "hono";
import { z } from "zod";
import { pinMatches, pinRequired } from "../auth/pinGate.js";
import { SessionStore, startSession } from "../auth/session.js";
import type { PortalConfig } from "../config/index.js";
import { createWriting, deleteWriting, getWriting, listWritings, updateWriting } from "../db/index.js";
import { contentDisposition, exportWriting, isExportFormat } from "../export/index.js";
import { errMessage, logger } from "../logger/index.js";
import { renderCategoryPage, renderError, renderHomePage, renderPage, renderPinPage } from "../render/index.js";
import { isCategorySlug, type CategorySlug } from "../writings/categories.js";
import { UNTITLED } from "../writings/types.js";
import { dbScope } from "./dbScope.js";
import { BadRequestError, NotFoundError } from "./errors.js";
import type { AppEnv } from "./types.js";


export const MSG_EXPIRED = "Tu sesión se cerró por inactividad. Ingresa el PIN de nuevo.";
export const MSG_WRONG_PIN = "PIN incorrecto. Inténtalo de nuevo.";


export interface AppDeps {
  config: PortalConfig;
  /** 会话存储，默认每个 app 实例一个 */
  sessions?: SessionStore;
  /** 时钟，测试时注入以控制超时 */
  now?: () => Date;
}


/** 保存表单：id 为空视为新建；非整数 id 拒绝 */
const saveFormSchema = z.object({
  id: z.preprocess(
    (v) => (v === "" ? undefined : v),
    z.coerce.number().int().positive().optional(),
  ),
  title: z.string().default(""),
  content: z.string().default(""),
});


function requireCategory(slug: string): CategorySlug {
  if (!isCategorySlug(slug)) throw new NotFoundError(`Categoría desconocida: ${slug}`);
  return slug;
}


/** 查询参数中的正整数 id，非法时返回 null */
function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return id > 0 ? id : null;
}


/** 创建 Hono 应用 */
export function createApp({ config, sessions = new SessionStore(), now = () => new Date() }: AppDeps) {
  const app = new Hono<AppEnv>();
  const gate = pinRequired({ store: sessions, secret: config.secretKey, timeoutMs: config.inactivityTimeoutMs, now });
  const scoped = dbScope(config.dbPath);

  app.use("/inicio", gate);
  app.use("/categoria/*", gate, scoped);
  app.use("/texto/*", gate, scoped);

  // ── 公开页面 ──────────────────────────────────────────────────────────────────
  app.get("/", async (c) => c.html(await renderPage("welcome")));

  app.get("/pin", async (c) => {
    const error = c.req.query("expired") ? MSG_EXPIRED : null;
    return c.html(await renderPinPage(error));
  });

  app.post("/pin", async (c) => {
    const body = await c.req.parseBody();
    const entered = typeof body.pin === "string" ? body.pin : "";
    if (!pinMatches(entered, config.pin)) {
      logger.warn("auth", "PIN 错误");
      return c.html(await renderPinPage(MSG_WRONG_PIN));
    }
    const ts = now().getTime();
    sessions.sweep(ts, config.inactivityTimeoutMs);
    await startSession(c, sessions, config.secretKey, ts);
    logger.info("auth", "PIN 校验通过，会话已建立");
    return c.redirect("/inicio");
  });

  // ── 受保护页面 ────────────────────────────────────────────────────────────────
  app.get("/inicio", async (c) => c.html(await renderHomePage()));

  // 分类页：列表 + 可选的编辑预填（edit_id 需同时匹配分类）
  app.get("/categoria/:slug", async (c) => {
    const slug = requireCategory(c.req.param("slug"));
    const db = c.get("db");
    const editId = parseId(c.req.query("edit_id"));
    const editing = editId ? getWriting(db, editId, slug) : null;
    return c.html(await renderCategoryPage(slug, listWritings(db, slug), editing));
  });

  // 保存：无 id 新建，有 id 则按 id + 分类更新
  app.post("/categoria/:slug", async (c) => {
    const slug = requireCategory(c.req.param("slug"));
    const parsed = saveFormSchema.safeParse(await c.req.parseBody());
    if (!parsed.success) throw new BadRequestError("Formulario inválido");
    const { id } = parsed.data;
    const title = parsed.data.title.trim() || UNTITLED;
    const content = parsed.data.content.trim();
    const db = c.get("db");
    if (id !== undefined) {
      const changes = updateWriting(db, { id, category: slug, title, content }, now());
      if (changes > 0) logger.info("db", "条目已更新", { id, category: slug });
      else logger.warn("db", "更新未命中（不存在或分类不符）", { id, category: slug });
    } else {
      const newId = createWriting(db, { category: slug, title, content }, now());
      logger.info("db", "条目已创建", { id: newId, category: slug });
    }
    return c.redirect(`/categoria/${slug}`);
  });

  // 下载：formato=pdf（默认）或 html
  app.get("/texto/:id{[0-9]+}/descargar", async (c) => {
    const id = Number(c.req.param("id"));
    const format = c.req.query("formato") ?? "pdf";
    if (!isExportFormat(format)) throw new BadRequestError(`Formato desconocido: ${format}`);
    const writing = getWriting(c.get("db"), id);
    if (!writing) throw new NotFoundError("Texto no encontrado");
    const file = await exportWriting(writing, format);
    logger.info("export", "已生成导出文件", { id, format });
    const headers = {
      "Content-Type": file.contentType,
      "Content-Disposition": contentDisposition(file.fileName),
    };
    return typeof file.body === "string"
      ? c.body(file.body, 200, headers)
      : c.body(new Uint8Array(file.body).buffer, 200, headers);
  });

  // 删除：分类必须来自表单且合法，按 id + 分类删除
  app.post("/texto/:id{[0-9]+}/borrar", async (c) => {
    const id = Number(c.req.param("id"));
    const body = await c.req.parseBody();
    const slug = body.slug;
    if (!isCategorySlug(slug)) throw new BadRequestError("Categoría inválida");
    const changes = deleteWriting(c.get("db"), id, slug);
    if (changes > 0) logger.info("db", "条目已删除", { id, category: slug });
    return c.redirect(`/categoria/${slug}`);
  });

  // ── 错误页 ────────────────────────────────────────────────────────────────────
  app.notFound(async (c) => c.html(await renderError(404, "Página no encontrada"), 404));

  app.onError(async (err, c) => {
    if (err instanceof NotFoundError) return c.html(await renderError(404, err.message), 404);
    if (err instanceof BadRequestError) return c.html(await renderError(400, err.message), 400);
    logger.error("app", "请求处理失败", { path: c.req.path, err: errMessage(err) });
    return c.html(await renderError(500, "Error interno"), 500);
  });

  return app;
}
