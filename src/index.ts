#!/usr/bin/env node
import "dotenv/config";
import {
  ANALYSIS_CONFIG,
  OpenRouterEmbeddingProvider,
  runCollectionAnalysis,
} from "./analysis/index.js";
import { parseArgs } from "./cli-args.js";

function printUsage(): void {
  console.log(`
pdf-section-ranker: rank a PDF collection's sections for a persona and task

Usage:
  pdf-section-ranker [collection-dir] [options]

The collection directory holds ${ANALYSIS_CONFIG.inputFileName} and a ${ANALYSIS_CONFIG.pdfDirName}/ folder.
Results are written to <collection-dir>/${ANALYSIS_CONFIG.outputFileName}.

Options:
  --top-k, -k N      Number of sections to keep (default: ${ANALYSIS_CONFIG.topK})
  --output, -o PATH  Write the result somewhere else
  --help, -h         Show this help message

Environment:
  OPENROUTER_API_KEY  API key for the embedding endpoint (required)
  EMBEDDING_MODEL     Embedding model (default: ${ANALYSIS_CONFIG.embeddingModel})
  COLLECTION_DIR      Default collection directory
`);
}

// ── Main ────────────────────────────────────────────────────────────────────
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    printUsage();
    return;
  }

  const apiKey = process.env["OPENROUTER_API_KEY"];
  if (!apiKey) {
    console.error("Error: OPENROUTER_API_KEY environment variable is required.");
    console.error("  export OPENROUTER_API_KEY=your-key");
    process.exit(1);
  }

  const log = (msg: string) => console.log(`[${new Date().toISOString()}] ${msg}`);

  const result = await runCollectionAnalysis({
    collectionDir: args.collectionDir,
    topK: args.topK,
    outputPath: args.outputPath,
    embeddings: new OpenRouterEmbeddingProvider({ apiKey }),
    log,
  });

  log(
    `Kept ${result.output.extracted_sections.length} of ${result.rankedCount} ranked section(s)`,
  );
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${msg}`);
  process.exit(1);
});
