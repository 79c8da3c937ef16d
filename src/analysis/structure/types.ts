import type { DocumentLayout, Section } from "../types.js";

export interface StructureExtractor {
  readonly name: string;
  extract(document: DocumentLayout): Section[];
}
