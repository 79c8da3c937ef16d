import type { ExtractorConfig } from "../config.js";
import type { FontStyle, PageFontProfile, TextBlock } from "../types.js";
import { countWords } from "../text.js";
import { roundFontSize } from "./font-profile.js";

export function isShortForm(block: TextBlock, config: ExtractorConfig): boolean {
  const words = countWords(block.text);
  return (
    block.lineCount <= config.maxTitleLines &&
    words > 0 &&
    words < config.maxTitleWords
  );
}

export function isLargerThanBody(
  block: TextBlock,
  profile: PageFontProfile,
  config: ExtractorConfig,
): boolean {
  const size = roundFontSize(block.fontSize, config.fontSizePrecision);
  return size > profile.fontSize + config.titleSizeMargin;
}

/** Bold-ness or family must differ; italics alone are not emphasis enough. */
export function hasDistinctStyle(font: FontStyle, dominant: FontStyle): boolean {
  return (
    font.bold !== dominant.bold ||
    font.family.toLowerCase() !== dominant.family.toLowerCase()
  );
}

export function isTitleBlock(
  block: TextBlock,
  profile: PageFontProfile | null,
  config: ExtractorConfig,
): boolean {
  if (!profile) return false;
  return (
    isShortForm(block, config) &&
    isLargerThanBody(block, profile, config) &&
    hasDistinctStyle(block.font, profile.font)
  );
}
