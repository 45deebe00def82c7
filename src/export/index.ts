// 导出：同一条目可下载为 PDF（纯文本排版）或原样 HTML

import type { Writing } from "../writings/types.js";
import { renderWritingPdf } from "./pdf.js";
import { safeFileName } from "./text.js";

export { contentDisposition } from "./text.js";


export const EXPORT_FORMATS = ["pdf", "html"] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(s: unknown): s is ExportFormat {
  return EXPORT_FORMATS.some((f) => f === s);
}


export interface ExportedFile {
  fileName: string;
  contentType: string;
  body: Uint8Array | string;
}


export async function exportWriting(writing: Writing, format: ExportFormat): Promise<ExportedFile> {
  const base = safeFileName(writing.title);
  if (format === "html") {
    return {
      fileName: `${base}.html`,
      contentType: "text/html; charset=utf-8",
      body: writing.content,
    };
  }
  return {
    fileName: `${base}.pdf`,
    contentType: "application/pdf",
    body: await renderWritingPdf(writing.title || "sin_titulo", writing.content),
  };
}
