// 页面渲染：读取 statics/ 下的 HTML 模板，{{key}} 转义插入，{{{key}}} 原样插入

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { STATICS_DIR } from "../config/paths.js";
import { CATEGORIES, CATEGORY_SLUGS, type CategorySlug } from "../writings/categories.js";
import type { Writing } from "../writings/types.js";


/** HTML 转义，用于注入到页面中的不可信内容 */
export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}


/** 填充模板占位符（单次扫描，插入的内容不再被解析）；未提供的变量替换为空串 */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{\{(\w+)\}\}\}|\{\{(\w+)\}\}/g, (_, raw: string | undefined, escaped: string | undefined) => {
    if (raw !== undefined) return vars[raw] ?? "";
    return escapeHtml(vars[escaped ?? ""] ?? "");
  });
}


export async function renderPage(name: string, vars: Record<string, string> = {}): Promise<string> {
  const template = await readFile(join(STATICS_DIR, `${name}.html`), "utf-8");
  return fillTemplate(template, vars);
}


/** 错误页：模板缺失时退回内联 HTML */
export async function renderError(status: number, message: string): Promise<string> {
  try {
    return await renderPage("error", { status: String(status), message });
  } catch {
    return `<!DOCTYPE html><html><head><meta charset="utf-8"><title>${status}</title></head><body><h1>${status}</h1><p>${escapeHtml(message)}</p></body></html>`;
  }
}


export function renderPinPage(error: string | null): Promise<string> {
  return renderPage("pin", {
    errorBlock: error ? `<p class="error">${escapeHtml(error)}</p>` : "",
  });
}


export function renderHomePage(): Promise<string> {
  const links = CATEGORY_SLUGS.map((slug) => {
    const cat = CATEGORIES[slug];
    return `<li><a href="/categoria/${slug}">${cat.icon} ${escapeHtml(cat.name)}</a><small>${escapeHtml(cat.description)}</small></li>`;
  });
  return renderPage("home", { categories: links.join("\n") });
}


function formatTimestamp(iso: string): string {
  return iso.slice(0, 16).replace("T", " ");
}


function renderWritingItem(slug: CategorySlug, w: Writing): string {
  return [
    `<li>`,
    `<strong>${escapeHtml(w.title)}</strong> <small>${escapeHtml(formatTimestamp(w.updated_at))}</small>`,
    `<a href="/categoria/${slug}?edit_id=${w.id}">Editar</a>`,
    `<a href="/texto/${w.id}/descargar">PDF</a>`,
    `<a href="/texto/${w.id}/descargar?formato=html">HTML</a>`,
    `<form method="post" action="/texto/${w.id}/borrar"><input type="hidden" name="slug" value="${slug}"><button type="submit">Borrar</button></form>`,
    `</li>`,
  ].join("");
}


/** 分类页：列表 + 编辑表单（editing 非空时预填） */
export function renderCategoryPage(slug: CategorySlug, writings: Writing[], editing: Writing | null): Promise<string> {
  const cat = CATEGORIES[slug];
  return renderPage("category", {
    slug,
    name: cat.name,
    icon: cat.icon,
    description: cat.description,
    formHeading: editing ? "Editar texto" : "Nuevo texto",
    editId: editing ? String(editing.id) : "",
    editTitle: editing?.title ?? "",
    editContent: editing?.content ?? "",
    list: writings.length > 0
      ? `<ul class="writings">${writings.map((w) => renderWritingItem(slug, w)).join("\n")}</ul>`
      : `<p class="empty">Todavía no hay textos aquí.</p>`,
  });
}
