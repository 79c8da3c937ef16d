import { writeFile } from "node:fs/promises";
import path from "node:path";
import { ANALYSIS_CONFIG, type ExtractorConfig } from "./config.js";
import type { EmbeddingProvider } from "./embedding-service.js";
import { loadTaskInput, scanCollection } from "./collection.js";
import { buildOutput, type AnalysisOutput } from "./output-builder.js";
import { extractPdfLayout } from "./pdf-extractor.js";
import { RelevanceRanker, type RankerOptions } from "./ranking/ranker.js";
import { SectionExtractor } from "./structure/section-extractor.js";
import { toTaskDescriptor } from "./task-input.js";
import {
  noopLog,
  type DocumentLayout,
  type LogFn,
  type ScoredSection,
  type Section,
  type TaskDescriptor,
} from "./types.js";

export interface AnalyzeOptions {
  embeddings: EmbeddingProvider;
  extractor?: ExtractorConfig;
  ranker?: Pick<RankerOptions, "batchSize" | "concurrency">;
  log?: LogFn;
}

export function extractSections(
  documents: readonly DocumentLayout[],
  config: ExtractorConfig = ANALYSIS_CONFIG.extractor,
  log: LogFn = noopLog,
): Section[] {
  const extractor = new SectionExtractor(config);
  const sections: Section[] = [];
  for (const doc of documents) {
    const extracted = extractor.extract(doc);
    log(`Extract: ${doc.documentId}: ${extracted.length} section(s) from ${doc.pages.length} page(s)`);
    sections.push(...extracted);
  }
  return sections;
}

export async function analyzeDocuments(
  documents: readonly DocumentLayout[],
  task: TaskDescriptor,
  options: AnalyzeOptions,
): Promise<ScoredSection[]> {
  const log = options.log ?? noopLog;
  const sections = extractSections(documents, options.extractor, log);
  const ranker = new RelevanceRanker(options.embeddings, { ...options.ranker, log });
  return ranker.rank(sections, task);
}

export type LayoutLoader = (filePath: string, documentId: string) => Promise<DocumentLayout>;

export interface CollectionRunOptions extends AnalyzeOptions {
  collectionDir: string;
  topK?: number;
  outputPath?: string;
  loadLayout?: LayoutLoader;
  now?: () => Date;
}

export interface CollectionRunResult {
  output: AnalysisOutput;
  outputPath: string;
  rankedCount: number;
}

export async function runCollectionAnalysis(
  options: CollectionRunOptions,
): Promise<CollectionRunResult> {
  const log = options.log ?? noopLog;
  const loadLayout = options.loadLayout ?? extractPdfLayout;
  const topK = options.topK ?? ANALYSIS_CONFIG.topK;
  const started = performance.now();

  log(`Run: loading task input from ${options.collectionDir}`);
  const input = await loadTaskInput(options.collectionDir);
  const task = toTaskDescriptor(input);

  const { found, missing } = await scanCollection(options.collectionDir, input.documents);
  for (const name of missing) {
    log(`Run: warning: PDF file not found: ${name}`);
  }

  const layouts: DocumentLayout[] = [];
  for (const doc of found) {
    log(`Run: parsing ${doc.documentId}...`);
    try {
      layouts.push(await loadLayout(doc.filePath, doc.documentId));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log(`Run: warning: skipping ${doc.documentId}: ${msg}`);
    }
  }

  const ranked = await analyzeDocuments(layouts, task, options);
  log(`Run: ${ranked.length} compliant section(s) ranked`);

  const output = buildOutput(input, ranked, topK, options.now?.() ?? new Date());
  const outputPath =
    options.outputPath ?? path.join(options.collectionDir, ANALYSIS_CONFIG.outputFileName);
  await writeFile(outputPath, JSON.stringify(output, null, 4));

  const secs = ((performance.now() - started) / 1000).toFixed(2);
  log(`Run: done in ${secs}s, output saved to ${outputPath}`);

  return { output, outputPath, rankedCount: ranked.length };
}
