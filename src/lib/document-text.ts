/**
 * Document Text
 * Plain-text extraction from the Docs v1 structural element tree
 */

import type {
  GoogleDocument,
  Paragraph,
  StructuralElement,
} from '../types/docs.js';

/**
 * Paragraph texts in document order, tables and table of contents included
 */
export function collectParagraphs(document: GoogleDocument): string[] {
  const paragraphs: string[] = [];
  walk(document.body?.content ?? [], paragraphs);
  return paragraphs;
}

/**
 * Extract plain text; paragraphs are joined by a blank line
 */
export function extractDocumentText(document: GoogleDocument): string {
  return collectParagraphs(document).join('\n\n');
}

export function paragraphText(paragraph: Paragraph): string {
  let text = '';
  for (const element of paragraph.elements ?? []) {
    if (element.textRun?.content) {
      text += element.textRun.content;
    }
  }
  return text;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return 0;
  }
  return trimmed.split(/\s+/).length;
}

function walk(elements: StructuralElement[], out: string[]): void {
  for (const element of elements) {
    if (element.paragraph) {
      out.push(paragraphText(element.paragraph));
    } else if (element.table) {
      for (const row of element.table.tableRows ?? []) {
        for (const cell of row.tableCells ?? []) {
          walk(cell.content ?? [], out);
        }
      }
    } else if (element.tableOfContents) {
      walk(element.tableOfContents.content ?? [], out);
    }
    // sectionBreak carries no text
  }
}
