import { readFile } from "node:fs/promises";
import path from "node:path";
import { getDocumentProxy } from "unpdf";
import { ANALYSIS_CONFIG, type LayoutConfig } from "./config.js";
import { DocumentLoadError } from "./errors.js";
import { groupRunsIntoBlocks, type TextRun } from "./layout/blocks.js";
import type { DocumentLayout, FontStyle, PageLayout } from "./types.js";

// Only the slice of the PDF.js page API this reader touches.
export interface PdfPageLike {
  getTextContent(): Promise<{ items: unknown[]; styles: Record<string, { fontFamily?: string }> }>;
  getOperatorList(): Promise<unknown>;
  commonObjs: {
    has(id: string): boolean;
    get(id: string): unknown;
  };
}

interface RawTextItem {
  str: string;
  transform: unknown[];
  width: number;
  fontName: string;
}

const BOLD_NAME = /bold|black|heavy|semibold|demi/i;
const ITALIC_NAME = /italic|oblique/i;

function asTextItem(raw: unknown): RawTextItem | null {
  if (typeof raw !== "object" || raw === null) return null;
  if (!("str" in raw) || typeof raw.str !== "string") return null;
  const transform = "transform" in raw && Array.isArray(raw.transform) ? raw.transform : [];
  const width = "width" in raw && typeof raw.width === "number" ? raw.width : 0;
  const fontName = "fontName" in raw && typeof raw.fontName === "string" ? raw.fontName : "";
  return { str: raw.str, transform, width, fontName };
}

function num(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

/** "ABCDEF+Helvetica-BoldOblique" -> "Helvetica" */
export function baseFamily(fontName: string): string {
  const withoutSubset = fontName.replace(/^[A-Z]{6}\+/, "");
  return withoutSubset.split(/[-,]/)[0]?.trim() || withoutSubset;
}

export function fontStyleFromName(
  fontName: string,
  flags: { bold?: boolean; italic?: boolean } = {},
): FontStyle {
  return {
    family: baseFamily(fontName),
    bold: flags.bold === true || BOLD_NAME.test(fontName),
    italic: flags.italic === true || ITALIC_NAME.test(fontName),
  };
}

function resolveFont(
  page: PdfPageLike,
  fontName: string,
  styles: Record<string, { fontFamily?: string }>,
  cache: Map<string, FontStyle>,
): FontStyle {
  const cached = cache.get(fontName);
  if (cached) return cached;

  let style = fontStyleFromName(styles[fontName]?.fontFamily ?? fontName);
  if (fontName && page.commonObjs.has(fontName)) {
    const font = page.commonObjs.get(fontName);
    if (typeof font === "object" && font !== null && "name" in font && typeof font.name === "string") {
      style = fontStyleFromName(font.name, {
        bold: "bold" in font && font.bold === true,
        italic: "italic" in font && font.italic === true,
      });
    }
  }
  cache.set(fontName, style);
  return style;
}

export async function readPageLayout(
  page: PdfPageLike,
  pageNumber: number,
  documentId: string,
  config: LayoutConfig = ANALYSIS_CONFIG.layout,
): Promise<PageLayout> {
  const textContent = await page.getTextContent();
  // Loads the page's fonts into commonObjs so their real names are available.
  await page.getOperatorList();

  const fonts = new Map<string, FontStyle>();
  const runs: TextRun[] = [];
  for (const raw of textContent.items) {
    const item = asTextItem(raw);
    if (!item || !item.str) continue;
    const [a, b, c, d, x, y] = item.transform.map(num);
    runs.push({
      text: item.str,
      x: x ?? 0,
      y: y ?? 0,
      width: item.width,
      fontSize: Math.max(Math.hypot(c ?? 0, d ?? 0), Math.hypot(a ?? 0, b ?? 0)),
      font: resolveFont(page, item.fontName, textContent.styles, fonts),
    });
  }

  return { pageNumber, blocks: groupRunsIntoBlocks(runs, { pageNumber, documentId }, config) };
}

export async function extractPdfLayout(
  filePath: string,
  documentId: string = path.basename(filePath),
): Promise<DocumentLayout> {
  try {
    const buffer = await readFile(filePath);
    const pdf = await getDocumentProxy(new Uint8Array(buffer));

    try {
      const pages: PageLayout[] = [];
      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        pages.push(await readPageLayout(page, i, documentId));
      }
      return { documentId, pages };
    } finally {
      await pdf.destroy();
    }
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new DocumentLoadError(documentId, `Failed to read ${documentId}: ${msg}`, { cause: err });
  }
}
