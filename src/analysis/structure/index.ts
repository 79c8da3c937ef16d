export { SectionExtractor } from "./section-extractor.js";
export { computePageFontProfile, roundFontSize, styleKey } from "./font-profile.js";
export { isTitleBlock, isShortForm, isLargerThanBody, hasDistinctStyle } from "./title-classifier.js";
export type { StructureExtractor } from "./types.js";
