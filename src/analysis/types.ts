export interface FontStyle {
  family: string;
  bold: boolean;
  italic: boolean;
}

export interface TextBlock {
  readonly text: string;
  readonly fontSize: number;
  readonly font: FontStyle;
  readonly lineCount: number;
  readonly pageNumber: number;
  readonly documentId: string;
}

export interface PageLayout {
  pageNumber: number;
  blocks: TextBlock[];
}

export interface DocumentLayout {
  documentId: string;
  pages: PageLayout[];
}

export interface PageFontProfile {
  fontSize: number;
  font: FontStyle;
}

export interface Section {
  readonly documentId: string;
  readonly title: string;
  readonly body: string;
  readonly pageNumber: number;
}

export interface ScoredSection extends Section {
  readonly score: number;
  readonly rank: number;
}

export interface TaskDescriptor {
  readonly role: string;
  readonly task: string;
  readonly includeKeywords: readonly string[];
  readonly excludeKeywords: readonly string[];
}

export type LogFn = (msg: string) => void;

export const noopLog: LogFn = () => {};
