export { ANALYSIS_CONFIG, type ExtractorConfig, type LayoutConfig } from "./config.js";
export { DocumentLoadError, EmbeddingError, TaskDescriptorError } from "./errors.js";
export {
  OpenRouterEmbeddingProvider,
  validateVector,
  type EmbeddingProvider,
  type OpenRouterEmbeddingOptions,
} from "./embedding-service.js";
export { extractPdfLayout, readPageLayout, type PdfPageLike } from "./pdf-extractor.js";
export { groupRunsIntoBlocks, groupRunsIntoLines, type TextLine, type TextRun } from "./layout/blocks.js";
export * from "./structure/index.js";
export { createKeywordMatcher, isCompliant, keywordPattern } from "./ranking/compliance.js";
export { cosineSimilarity } from "./ranking/similarity.js";
export { RelevanceRanker, buildFocusQuery, embeddingText, type RankerOptions } from "./ranking/ranker.js";
export { parseTaskInput, toTaskDescriptor, type TaskInput } from "./task-input.js";
export { buildOutput, selectTop, type AnalysisOutput } from "./output-builder.js";
export {
  analyzeDocuments,
  extractSections,
  runCollectionAnalysis,
  type AnalyzeOptions,
  type CollectionRunOptions,
  type CollectionRunResult,
  type LayoutLoader,
} from "./pipeline.js";
export {
  noopLog,
  type DocumentLayout,
  type FontStyle,
  type LogFn,
  type PageFontProfile,
  type PageLayout,
  type ScoredSection,
  type Section,
  type TaskDescriptor,
  type TextBlock,
} from "./types.js";
