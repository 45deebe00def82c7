// 导出用文本处理：HTML → 纯文本、定宽折行、文件名清洗

import { parse } from "node-html-parser";


/** Quill 的空段落 <p><br></p> 只代表一个空行 */
const EMPTY_PARAGRAPH = /<p(\s[^>]*)?>\s*<br\s*\/?>\s*<\/p>/gi;
const BLOCK_END = /<\/(p|div|li|h[1-6]|blockquote|pre)>/gi;
const LINE_BREAK = /<br\s*\/?>/gi;


/** 去除标签并解码实体；块级元素结束与 <br> 转为换行，末尾换行去掉 */
export function htmlToPlainText(html: string): string {
  const marked = html
    .replace(EMPTY_PARAGRAPH, "\n")
    .replace(BLOCK_END, (tag) => `\n${tag}`)
    .replace(LINE_BREAK, "\n");
  return parse(marked).text.replace(/\n+$/, "");
}


/**
 * 贪心折行：保留行首缩进与词间原有空白（制表符展开为 4 个空格），
 * 仅在断行处丢弃空白；单词超过 width 时按 width 切分；空白行返回 []
 */
export function wrapLine(line: string, width: number): string[] {
  const chunks = line.replace(/\t/g, "    ").split(/(\s+)/).filter(Boolean);
  const out: string[] = [];
  let current = "";
  for (const chunk of chunks) {
    if (/^\s+$/.test(chunk)) {
      // 续行行首的空白丢弃
      if (current || out.length === 0) current += chunk;
      continue;
    }
    if (!current.trim() || current.length + chunk.length <= width) {
      current += chunk;
    } else {
      out.push(current.trimEnd());
      current = chunk;
    }
    while (current.length > width) {
      out.push(current.slice(0, width));
      current = current.slice(width);
    }
  }
  if (current.trim()) out.push(current.trimEnd());
  return out;
}


/** 多行文本逐行折行，空行保留为 ""；空文本返回 [] */
export function wrapText(text: string, width: number): string[] {
  if (!text) return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  const out: string[] = [];
  for (const line of lines) {
    const wrapped = wrapLine(line, width);
    out.push(...(wrapped.length > 0 ? wrapped : [""]));
  }
  return out;
}


/** 下载文件名：小写，空格与 / \ 替换为 _；空标题用 sin_titulo */
export function safeFileName(title: string): string {
  return (title || "sin_titulo").toLowerCase().replace(/[ /\\]/g, "_");
}


/** Content-Disposition：ASCII 回退名 + RFC 5987 filename* */
export function contentDisposition(fileName: string): string {
  const ascii = fileName.replace(/[^\x20-\x7e]|"/g, "_");
  const encoded = encodeURIComponent(fileName).replace(
    /['()*]/g,
    (ch) => "%" + ch.charCodeAt(0).toString(16).toUpperCase(),
  );
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encoded}`;
}
