import { ANALYSIS_CONFIG, type LayoutConfig } from "../config.js";
import type { FontStyle, TextBlock } from "../types.js";
import { countChars } from "../text.js";

/** One positioned run of text as PDF.js reports it (origin bottom-left). */
export interface TextRun {
  text: string;
  x: number;
  y: number;
  width: number;
  fontSize: number;
  font: FontStyle;
}

export interface TextLine {
  runs: TextRun[];
  text: string;
  baseline: number;
  fontSize: number;
  font: FontStyle;
}

function dominantStyle(runs: TextRun[]): { fontSize: number; font: FontStyle } {
  const weights = new Map<string, { fontSize: number; font: FontStyle; chars: number }>();
  for (const run of runs) {
    const key = `${run.fontSize}|${run.font.family}|${run.font.bold}|${run.font.italic}`;
    const chars = countChars(run.text);
    const entry = weights.get(key);
    if (entry) entry.chars += chars;
    else weights.set(key, { fontSize: run.fontSize, font: run.font, chars });
  }

  let best: { fontSize: number; font: FontStyle; chars: number } | undefined;
  for (const entry of weights.values()) {
    if (!best || entry.chars > best.chars) best = entry;
  }
  return best ?? { fontSize: 0, font: { family: "", bold: false, italic: false } };
}

function joinRuns(runs: TextRun[], config: LayoutConfig): string {
  let text = "";
  let prevEnd = Number.NEGATIVE_INFINITY;
  for (const run of runs) {
    const gap = run.x - prevEnd;
    const needsSpace =
      text.length > 0 &&
      gap > run.fontSize * config.spaceTolerance &&
      !/\s$/.test(text) &&
      !/^\s/.test(run.text);
    if (needsSpace) text += " ";
    text += run.text;
    prevEnd = run.x + run.width;
  }
  return text.trim();
}

function toLine(runs: TextRun[], config: LayoutConfig): TextLine {
  const style = dominantStyle(runs);
  return {
    runs,
    text: joinRuns(runs, config),
    baseline: runs[0]?.y ?? 0,
    fontSize: style.fontSize,
    font: style.font,
  };
}

/** Runs arrive in content order; consecutive runs on one baseline form a line. */
export function groupRunsIntoLines(
  runs: TextRun[],
  config: LayoutConfig = ANALYSIS_CONFIG.layout,
): TextLine[] {
  const lines: TextLine[] = [];
  let current: TextRun[] = [];

  for (const run of runs) {
    if (!run.text.trim()) continue;
    const first = current[0];
    if (first && Math.abs(run.y - first.y) > Math.max(run.fontSize, first.fontSize) * config.lineTolerance) {
      lines.push(toLine(current, config));
      current = [];
    }
    current.push(run);
  }
  if (current.length > 0) lines.push(toLine(current, config));

  return lines.filter((line) => line.text.length > 0);
}

function startsNewBlock(prev: TextLine, line: TextLine, config: LayoutConfig): boolean {
  const drop = prev.baseline - line.baseline;
  if (drop <= 0) return true;
  if (drop > Math.max(prev.fontSize, line.fontSize) * config.blockGapRatio) return true;
  if (Math.abs(prev.fontSize - line.fontSize) > config.fontSizeTolerance) return true;
  return prev.font.bold !== line.font.bold || prev.font.family !== line.font.family;
}

/**
 * Rebuilds visually cohesive blocks from one page's runs. A block ends at a
 * wide vertical gap, a jump back up the page, or a change of size or weight.
 */
export function groupRunsIntoBlocks(
  runs: TextRun[],
  page: { pageNumber: number; documentId: string },
  config: LayoutConfig = ANALYSIS_CONFIG.layout,
): TextBlock[] {
  const blocks: TextBlock[] = [];
  let current: TextLine[] = [];

  const flush = () => {
    if (current.length === 0) return;
    const style = dominantStyle(current.flatMap((l) => l.runs));
    blocks.push({
      text: current.map((l) => l.text).join("\n"),
      fontSize: style.fontSize,
      font: style.font,
      lineCount: current.length,
      pageNumber: page.pageNumber,
      documentId: page.documentId,
    });
    current = [];
  };

  for (const line of groupRunsIntoLines(runs, config)) {
    const prev = current[current.length - 1];
    if (prev && startsNewBlock(prev, line, config)) flush();
    current.push(line);
  }
  flush();

  return blocks;
}
