/**
 * Doc Command
 * Resolve document references and read document text
 */

import fs from 'node:fs';
import { Command } from 'commander';
import { getDocsClient, resolveFormat } from '../lib/context.js';
import { documentUrl, parseDocumentReference } from '../lib/document-ref.js';
import { countWords } from '../lib/document-text.js';
import { fail, formatJSON, formatKeyValues } from '../utils/output.js';

export function createDocCommand(): Command {
  const docCommand = new Command('doc')
    .description('Google Docs documents');

  /**
   * gdocs doc id <ref>
   * Works offline
   */
  docCommand
    .command('id <ref>')
    .description('Extract the document ID from a URL, short URL or bare ID')
    .action((ref: string, _options, cmd: Command) => {
      try {
        const format = resolveFormat(cmd);
        const reference = parseDocumentReference(ref);
        if (format === 'json') {
          console.log(formatJSON({ ...reference, url: documentUrl(reference.documentId) }));
        } else {
          console.log(reference.documentId);
        }
      } catch (error) {
        fail(error);
      }
    });

  /**
   * gdocs doc text <ref>
   */
  docCommand
    .command('text <ref>')
    .description('Fetch a document and print its plain text')
    .option('-o, --output <file>', 'write the text to a file instead of stdout')
    .action(async (ref: string, options: { output?: string }, cmd: Command) => {
      try {
        const format = resolveFormat(cmd);
        const { documentId } = parseDocumentReference(ref);
        const text = await getDocsClient().getDocumentText(ref);

        if (options.output) {
          fs.writeFileSync(options.output, text, 'utf-8');
          if (format === 'json') {
            console.log(formatJSON({ documentId, output: options.output, characters: text.length }));
          } else {
            console.log(`Wrote ${text.length} characters to ${options.output}`);
          }
          return;
        }

        if (format === 'json') {
          console.log(formatJSON({ documentId, characters: text.length, words: countWords(text), text }));
        } else {
          process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
        }
      } catch (error) {
        fail(error);
      }
    });

  /**
   * gdocs doc info <ref>
   */
  docCommand
    .command('info <ref>')
    .description('Show title and size of a document')
    .action(async (ref: string, _options, cmd: Command) => {
      try {
        const format = resolveFormat(cmd);
        const info = await getDocsClient().getDocumentInfo(ref);
        if (format === 'json') {
          console.log(formatJSON(info));
        } else {
          console.log(
            formatKeyValues([
              ['Title', info.title],
              ['Document ID', info.documentId],
              ['URL', info.url],
              ['Revision', info.revisionId],
              ['Paragraphs', info.paragraphs],
              ['Words', info.words],
              ['Characters', info.characters],
            ])
          );
        }
      } catch (error) {
        fail(error);
      }
    });

  return docCommand;
}
