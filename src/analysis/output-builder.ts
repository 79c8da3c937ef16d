import type { ScoredSection } from "./types.js";
import type { TaskInput } from "./task-input.js";

export interface ExtractedSectionView {
  document: string;
  section_title: string;
  importance_rank: number;
  page_number: number;
}

export interface SubsectionView {
  document: string;
  refined_text: string;
  page_number: number;
}

export interface AnalysisOutput {
  metadata: {
    input_documents: string[];
    persona: string;
    job_to_be_done: string;
    processing_timestamp: string;
  };
  extracted_sections: ExtractedSectionView[];
  subsection_analysis: SubsectionView[];
}

export function selectTop(ranked: readonly ScoredSection[], k: number): ScoredSection[] {
  return ranked.slice(0, Math.max(0, Math.floor(k)));
}

export function refineText(section: ScoredSection): string {
  return section.body.trim();
}

export function buildOutput(
  input: TaskInput,
  ranked: readonly ScoredSection[],
  topK: number,
  now: Date = new Date(),
): AnalysisOutput {
  const top = selectTop(ranked, topK);

  return {
    metadata: {
      input_documents: input.documents.map((d) => d.filename),
      persona: input.persona.role,
      job_to_be_done: input.job_to_be_done.task,
      processing_timestamp: now.toISOString(),
    },
    extracted_sections: top.map((s) => ({
      document: s.documentId,
      section_title: s.title,
      importance_rank: s.rank,
      page_number: s.pageNumber,
    })),
    subsection_analysis: top.map((s) => ({
      document: s.documentId,
      refined_text: refineText(s),
      page_number: s.pageNumber,
    })),
  };
}
