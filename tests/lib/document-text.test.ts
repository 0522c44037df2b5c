import { describe, it, expect } from 'vitest';
import {
  collectParagraphs,
  countWords,
  extractDocumentText,
  paragraphText,
} from '../../src/lib/document-text.js';
import type { GoogleDocument, StructuralElement } from '../../src/types/docs.js';

function paragraph(...runs: string[]): StructuralElement {
  return { paragraph: { elements: runs.map((content) => ({ textRun: { content } })) } };
}

describe('document text', () => {
  const document: GoogleDocument = {
    documentId: 'doc-1',
    title: 'Notes',
    body: {
      content: [
        { sectionBreak: {} },
        paragraph('Hello ', 'world\n'),
        paragraph('Second\n'),
      ],
    },
  };

  it('concatenates the text runs of a paragraph', () => {
    expect(paragraphText({ elements: [{ textRun: { content: 'a' } }, {}, { textRun: { content: 'b' } }] })).toBe('ab');
  });

  it('collects paragraphs and skips section breaks', () => {
    expect(collectParagraphs(document)).toEqual(['Hello world\n', 'Second\n']);
  });

  it('joins paragraphs with a blank line', () => {
    expect(extractDocumentText(document)).toBe('Hello world\n\n\nSecond\n');
  });

  it('includes table cells in row order', () => {
    const withTable: GoogleDocument = {
      documentId: 'doc-2',
      body: {
        content: [
          paragraph('Intro\n'),
          {
            table: {
              tableRows: [
                { tableCells: [{ content: [paragraph('A1\n')] }, { content: [paragraph('B1\n')] }] },
                { tableCells: [{ content: [paragraph('A2\n')] }, { content: [paragraph('B2\n')] }] },
              ],
            },
          },
        ],
      },
    };
    expect(collectParagraphs(withTable)).toEqual(['Intro\n', 'A1\n', 'B1\n', 'A2\n', 'B2\n']);
  });

  it('includes the table of contents', () => {
    const withToc: GoogleDocument = {
      documentId: 'doc-3',
      body: { content: [{ tableOfContents: { content: [paragraph('Chapter 1\n')] } }] },
    };
    expect(collectParagraphs(withToc)).toEqual(['Chapter 1\n']);
  });

  it('returns an empty string for a document without a body', () => {
    expect(extractDocumentText({ documentId: 'empty' })).toBe('');
  });
});

describe('countWords', () => {
  it('counts whitespace-separated words', () => {
    expect(countWords('  one two\n\nthree ')).toBe(3);
  });

  it('returns 0 for blank text', () => {
    expect(countWords('')).toBe(0);
    expect(countWords(' \n\t ')).toBe(0);
  });
});
