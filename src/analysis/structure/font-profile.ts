import type { FontStyle, PageFontProfile, PageLayout } from "../types.js";
import { countChars } from "../text.js";

export function roundFontSize(size: number, precision: number): number {
  const factor = 10 ** precision;
  return Math.round(size * factor) / factor;
}

export function styleKey(font: FontStyle): string {
  return `${font.family.toLowerCase()}|${font.bold ? "b" : ""}${font.italic ? "i" : ""}`;
}

/**
 * Most common (size, style) pair on a page, weighted by character count so
 * that one long paragraph outweighs a handful of short labels. Ties go to the
 * pair seen first. Returns null for a page without any characters.
 */
export function computePageFontProfile(
  page: PageLayout,
  precision: number,
): PageFontProfile | null {
  const weights = new Map<string, { profile: PageFontProfile; chars: number }>();

  for (const block of page.blocks) {
    const chars = countChars(block.text);
    if (chars === 0) continue;

    const fontSize = roundFontSize(block.fontSize, precision);
    const key = `${fontSize}|${styleKey(block.font)}`;
    const entry = weights.get(key);
    if (entry) {
      entry.chars += chars;
    } else {
      weights.set(key, { profile: { fontSize, font: block.font }, chars });
    }
  }

  let best: { profile: PageFontProfile; chars: number } | null = null;
  for (const entry of weights.values()) {
    if (!best || entry.chars > best.chars) best = entry;
  }
  return best ? best.profile : null;
}
