import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { InvalidConfigurationError } from '@/lib/errors';

/** Plain text of every page, line breaks kept, pages separated by a blank line. */
export async function extractPdfText(data: Uint8Array): Promise<string> {
  const pdf = await getDocument({ data, isEvalSupported: false, useSystemFonts: true }).promise;
  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      let buffer = '';
      for (const item of content.items) {
        if (!('str' in item)) continue;
        buffer += item.str;
        buffer += item.hasEOL ? '\n' : ' ';
      }
      pages.push(buffer.replace(/[ \t]+\n/g, '\n').trim());
      page.cleanup();
    }
    return pages.filter(Boolean).join('\n\n');
  } finally {
    await pdf.destroy();
  }
}

/** Reads a transcript file: `.pdf` through pdf.js, anything else as UTF-8. */
export async function readTranscript(path: string): Promise<string> {
  const bytes = await readFile(path);
  const text =
    extname(path).toLowerCase() === '.pdf' ? await extractPdfText(new Uint8Array(bytes)) : bytes.toString('utf8');
  if (!text.trim()) {
    throw new InvalidConfigurationError(`no text could be read from ${path}`);
  }
  return text;
}
