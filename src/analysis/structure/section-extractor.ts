import { ANALYSIS_CONFIG, type ExtractorConfig } from "../config.js";
import type { DocumentLayout, Section, TextBlock } from "../types.js";
import { normalizeWhitespace } from "../text.js";
import { computePageFontProfile } from "./font-profile.js";
import { isTitleBlock } from "./title-classifier.js";
import type { StructureExtractor } from "./types.js";

interface SectionDraft {
  title: string;
  pageNumber: number;
  parts: string[];
}

type SegmenterState =
  | { kind: "idle" }
  | { kind: "open"; draft: SectionDraft };

function finalize(documentId: string, draft: SectionDraft): Section {
  return Object.freeze({
    documentId,
    title: draft.title,
    body: normalizeWhitespace(draft.parts.join(" ")),
    pageNumber: draft.pageNumber,
  });
}

function advance(
  state: SegmenterState,
  block: TextBlock,
  isTitle: boolean,
  close: (draft: SectionDraft) => void,
): SegmenterState {
  if (isTitle) {
    if (state.kind === "open") close(state.draft);
    return {
      kind: "open",
      draft: { title: normalizeWhitespace(block.text), pageNumber: block.pageNumber, parts: [] },
    };
  }

  if (state.kind === "idle") {
    return {
      kind: "open",
      draft: { title: "", pageNumber: block.pageNumber, parts: [block.text] },
    };
  }

  state.draft.parts.push(block.text);
  return state;
}

/**
 * Splits a document into sections at every block that looks like a title:
 * short, larger than the page's dominant font and visually emphasized.
 * Content seen before the first title lands in an untitled section.
 */
export class SectionExtractor implements StructureExtractor {
  readonly name = "font-layout";

  constructor(private readonly config: ExtractorConfig = ANALYSIS_CONFIG.extractor) {}

  extract(document: DocumentLayout): Section[] {
    const sections: Section[] = [];
    let state: SegmenterState = { kind: "idle" };

    for (const page of document.pages) {
      const profile = computePageFontProfile(page, this.config.fontSizePrecision);
      for (const block of page.blocks) {
        if (!block.text.trim()) continue;
        state = advance(state, block, isTitleBlock(block, profile, this.config), (draft) =>
          sections.push(finalize(document.documentId, draft)),
        );
      }
    }

    if (state.kind === "open") sections.push(finalize(document.documentId, state.draft));
    return sections;
  }
}
