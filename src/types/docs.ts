/**
 * Google Docs API Types
 * Subset of the Docs v1 document resource that text extraction reads
 */

export type DocumentReferenceKind = 'url' | 'short-url' | 'id';

/**
 * Resolved document parameter
 */
export interface DocumentReference {
  input: string;
  documentId: string;
  kind: DocumentReferenceKind;
}

export interface TextRun {
  content?: string;
}

export interface ParagraphElement {
  startIndex?: number;
  endIndex?: number;
  textRun?: TextRun;
}

export interface Paragraph {
  elements?: ParagraphElement[];
}

export interface TableCell {
  content?: StructuralElement[];
}

export interface TableRow {
  tableCells?: TableCell[];
}

export interface Table {
  rows?: number;
  columns?: number;
  tableRows?: TableRow[];
}

export interface TableOfContents {
  content?: StructuralElement[];
}

export interface StructuralElement {
  startIndex?: number;
  endIndex?: number;
  paragraph?: Paragraph;
  table?: Table;
  tableOfContents?: TableOfContents;
  sectionBreak?: Record<string, unknown>;
}

export interface Body {
  content?: StructuralElement[];
}

/**
 * documents.get response
 */
export interface GoogleDocument {
  documentId: string;
  title?: string;
  revisionId?: string;
  body?: Body;
}

/**
 * Summary printed by `doc info`
 */
export interface DocumentInfo {
  documentId: string;
  title: string;
  url: string;
  revisionId?: string;
  characters: number;
  words: number;
  paragraphs: number;
}
