// PDF 导出：纯文本按固定页边距与行高排版，纵向空间用完即分页（pdf-lib 标准字体）

import { PDFDocument, StandardFonts, type PDFFont } from "pdf-lib";
import { htmlToPlainText, wrapText } from "./text.js";


/** US Letter 版式，单位为点 */
export const PDF_LAYOUT = {
  pageWidth: 612,
  pageHeight: 792,
  margin: 50,
  titleSize: 16,
  titleGap: 30,
  bodySize: 11,
  lineHeight: 14,
  wrapWidth: 90,
} as const;


export interface PlacedLine {
  text: string;
  y: number;
}


/** 计算每行所在页与纵坐标；首页正文从标题下方开始，y 低于下边距时换页 */
export function paginate(lines: string[]): PlacedLine[][] {
  const { pageHeight, margin, titleGap, lineHeight } = PDF_LAYOUT;
  const top = pageHeight - margin;
  let y = top - titleGap;
  let current: PlacedLine[] = [];
  const pages: PlacedLine[][] = [current];
  for (const text of lines) {
    if (y < margin) {
      current = [];
      pages.push(current);
      y = top;
    }
    current.push({ text, y });
    y -= lineHeight;
  }
  return pages;
}


/** 标准字体只支持 WinAnsi 字符集，其余字符替换为 ? */
function encodableWith(font: PDFFont): (text: string) => string {
  const supported = new Set(font.getCharacterSet());
  return (text) =>
    Array.from(text.replace(/[\t\r\n]/g, " "))
      .map((ch) => (supported.has(ch.codePointAt(0) ?? 0) ? ch : "?"))
      .join("");
}


/** 生成 PDF：标题 Helvetica-Bold，正文为去标签后的 HTML 内容 */
export async function renderWritingPdf(title: string, html: string): Promise<Uint8Array> {
  const { pageWidth, pageHeight, margin, titleSize, bodySize, wrapWidth } = PDF_LAYOUT;
  const pdfDoc = await PDFDocument.create();
  pdfDoc.setTitle(title);
  const font = await pdfDoc.embedFont(StandardFonts.Helvetica);
  const boldFont = await pdfDoc.embedFont(StandardFonts.HelveticaBold);
  const bodyText = encodableWith(font);
  const titleText = encodableWith(boldFont);

  const pages = paginate(wrapText(htmlToPlainText(html), wrapWidth));
  pages.forEach((placed, index) => {
    const page = pdfDoc.addPage([pageWidth, pageHeight]);
    if (index === 0) {
      page.drawText(titleText(title), { x: margin, y: pageHeight - margin, size: titleSize, font: boldFont });
    }
    for (const line of placed) {
      if (!line.text) continue;
      page.drawText(bodyText(line.text), { x: margin, y: line.y, size: bodySize, font });
    }
  });
  return pdfDoc.save();
}
