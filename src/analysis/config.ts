export interface ExtractorConfig {
  /** Blocks with more lines than this are body text. */
  maxTitleLines: number;
  /** Titles must have fewer words than this. */
  maxTitleWords: number;
  /** Points a title's size must exceed the page's dominant size by. */
  titleSizeMargin: number;
  /** Decimals font sizes are rounded to before they are compared. */
  fontSizePrecision: number;
}

export interface LayoutConfig {
  /** Baseline drift, as a fraction of the font size, still read as the same line. */
  lineTolerance: number;
  /** Horizontal gap, as a fraction of the font size, that separates two words. */
  spaceTolerance: number;
  /** Baseline gap, as a multiple of the font size, that starts a new block. */
  blockGapRatio: number;
  /** Size change in points that starts a new block. */
  fontSizeTolerance: number;
}

export const ANALYSIS_CONFIG = {
  inputFileName: "challenge1b_input.json",
  outputFileName: "challenge1b_output.json",
  pdfDirName: "PDFs",

  embeddingModel: process.env["EMBEDDING_MODEL"] ?? "qwen/qwen3-embedding-8b",
  embeddingBatchSize: 20,
  embeddingConcurrency: 5,

  topK: 5,

  extractor: {
    maxTitleLines: 2,
    maxTitleWords: 10,
    titleSizeMargin: 0.5,
    fontSizePrecision: 1,
  } satisfies ExtractorConfig,

  layout: {
    lineTolerance: 0.5,
    spaceTolerance: 0.15,
    blockGapRatio: 1.6,
    fontSizeTolerance: 0.5,
  } satisfies LayoutConfig,
} as const;
