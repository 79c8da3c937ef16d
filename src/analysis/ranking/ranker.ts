import { ANALYSIS_CONFIG } from "../config.js";
import { EmbeddingError } from "../errors.js";
import { validateVector, type EmbeddingProvider } from "../embedding-service.js";
import { noopLog, type LogFn, type ScoredSection, type Section, type TaskDescriptor } from "../types.js";
import { createKeywordMatcher, isCompliant } from "./compliance.js";
import { cosineSimilarity } from "./similarity.js";

export interface RankerOptions {
  batchSize?: number;
  concurrency?: number;
  log?: LogFn;
}

export function buildFocusQuery(task: Pick<TaskDescriptor, "role" | "task">): string {
  return `${task.role}: ${task.task}`;
}

export function embeddingText(section: Pick<Section, "title" | "body">): string {
  return [section.title, section.body].filter((part) => part.length > 0).join(". ");
}

function label(section: Section): string {
  const title = section.title || "(untitled)";
  return `"${title}" (${section.documentId}, page ${section.pageNumber})`;
}

export class RelevanceRanker {
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly log: LogFn;

  constructor(
    private readonly embeddings: EmbeddingProvider,
    options: RankerOptions = {},
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? ANALYSIS_CONFIG.embeddingBatchSize);
    this.concurrency = Math.max(1, options.concurrency ?? ANALYSIS_CONFIG.embeddingConcurrency);
    this.log = options.log ?? noopLog;
  }

  /**
   * Drops sections that break the keyword constraints, scores the rest by
   * cosine similarity to the persona/task query and returns them best first.
   * Equal scores keep their input order.
   */
  async rank(sections: readonly Section[], task: TaskDescriptor): Promise<ScoredSection[]> {
    const matcher = createKeywordMatcher(task);
    const compliant = sections.filter((s) => isCompliant(s, matcher));
    this.log(`Rank: ${compliant.length}/${sections.length} section(s) pass the keyword constraints`);

    if (compliant.length === 0) return [];

    const queryVector = validateVector(await this.embeddings.embed(buildFocusQuery(task)));
    const vectors = await this.embedSections(compliant, queryVector.length);

    const scored: Array<{ section: Section; score: number; order: number }> = [];
    compliant.forEach((section, order) => {
      const vector = vectors[order];
      if (!vector) return;
      scored.push({ section, score: cosineSimilarity(queryVector, vector), order });
    });

    scored.sort((a, b) => b.score - a.score || a.order - b.order);

    return scored.map(({ section, score }, i) => ({ ...section, score, rank: i + 1 }));
  }

  private async embedSections(
    sections: Section[],
    dimensions: number,
  ): Promise<Array<number[] | null>> {
    const results: Array<number[] | null> = new Array<number[] | null>(sections.length).fill(null);

    const batches: { startIdx: number; sections: Section[] }[] = [];
    for (let i = 0; i < sections.length; i += this.batchSize) {
      batches.push({ startIdx: i, sections: sections.slice(i, i + this.batchSize) });
    }

    let completed = 0;
    const queue = [...batches];
    const workers = Array.from(
      { length: Math.min(this.concurrency, queue.length) },
      async () => {
        let batch = queue.shift();
        while (batch) {
          const { startIdx } = batch;
          const vectors = await this.embedBatch(batch.sections, dimensions);
          vectors.forEach((vector, j) => {
            results[startIdx + j] = vector;
          });
          completed += batch.sections.length;
          this.log(`Rank: embedded ${completed}/${sections.length}`);
          batch = queue.shift();
        }
      },
    );

    await Promise.all(workers);
    return results;
  }

  private async embedBatch(
    sections: Section[],
    dimensions: number,
  ): Promise<Array<number[] | null>> {
    const texts = sections.map(embeddingText);

    if (this.embeddings.embedMany && texts.length > 1 && texts.every((t) => t.trim())) {
      try {
        const vectors = await this.embeddings.embedMany(texts);
        if (vectors.length === texts.length) {
          return vectors.map((v) => validateVector(v, dimensions));
        }
        this.log(`Rank: batch returned ${vectors.length} vector(s) for ${texts.length} text(s), retrying one by one`);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        this.log(`Rank: batch embedding failed (${msg}), retrying one by one`);
      }
    }

    const vectors: Array<number[] | null> = [];
    for (const [i, section] of sections.entries()) {
      try {
        const text = texts[i] ?? "";
        if (!text.trim()) throw new EmbeddingError("Section has no text to embed");
        vectors.push(validateVector(await this.embeddings.embed(text), dimensions));
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        this.log(`Rank: skipping ${label(section)}: ${msg}`);
        vectors.push(null);
      }
    }
    return vectors;
  }
}
