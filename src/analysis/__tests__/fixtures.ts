import type { EmbeddingProvider } from "../embedding-service.js";
import type { DocumentLayout, FontStyle, Section, TaskDescriptor, TextBlock } from "../types.js";

export const REGULAR: FontStyle = { family: "Helvetica", bold: false, italic: false };
export const BOLD: FontStyle = { family: "Helvetica", bold: true, italic: false };

export function block(text: string, overrides: Partial<TextBlock> = {}): TextBlock {
  return {
    text,
    fontSize: 10,
    font: REGULAR,
    lineCount: 1,
    pageNumber: 1,
    documentId: "doc.pdf",
    ...overrides,
  };
}

export function heading(text: string, overrides: Partial<TextBlock> = {}): TextBlock {
  return block(text, { fontSize: 16, font: BOLD, ...overrides });
}

export function layout(documentId: string, pages: TextBlock[][]): DocumentLayout {
  return {
    documentId,
    pages: pages.map((blocks, i) => ({
      pageNumber: i + 1,
      blocks: blocks.map((b) => ({ ...b, pageNumber: i + 1, documentId })),
    })),
  };
}

export function section(title: string, body: string, overrides: Partial<Section> = {}): Section {
  return { documentId: "doc.pdf", title, body, pageNumber: 1, ...overrides };
}

export function task(overrides: Partial<TaskDescriptor> = {}): TaskDescriptor {
  return {
    role: "Analyst",
    task: "Summarize processing",
    includeKeywords: [],
    excludeKeywords: [],
    ...overrides,
  };
}

/** Counts whole-word hits of each vocabulary term; one dimension per term. */
export class VocabularyEmbedder implements EmbeddingProvider {
  readonly name = "vocabulary";
  readonly calls: string[] = [];

  constructor(private readonly vocabulary: string[]) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const words = text.toLowerCase().split(/[^a-z0-9]+/);
    return this.vocabulary.map((term) => words.filter((w) => w === term).length);
  }
}

/** Returns a fixed vector per exact input text. */
export class TableEmbedder implements EmbeddingProvider {
  readonly name = "table";

  constructor(private readonly table: Record<string, number[]>) {}

  async embed(text: string): Promise<number[]> {
    const vector = this.table[text];
    if (!vector) throw new Error(`no vector for "${text}"`);
    return vector;
  }
}
