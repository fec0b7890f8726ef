/**
 * PDF text extraction utilities
 */

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ExtractionError, toError } from '../errors/index.js';

/**
 * Extract text content from PDF bytes, one paragraph per page
 */
export async function extractTextFromPDF(data: Uint8Array): Promise<string> {
  if (!isPDFBuffer(data)) {
    throw new ExtractionError('Not a PDF document');
  }

  // pdfjs takes ownership of the bytes it is given
  const loadingTask = getDocument({
    data: new Uint8Array(data),
    isEvalSupported: false,
    useSystemFonts: true,
  });

  try {
    const pdf = await loadingTask.promise;
    const textPages: string[] = [];

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      let pageText = '';
      for (const item of textContent.items) {
        if ('str' in item) {
          pageText += item.str + (item.hasEOL ? '\n' : ' ');
        }
      }

      textPages.push(pageText.trim());
    }

    return textPages.join('\n\n');
  } catch (error) {
    throw new ExtractionError(`PDF text extraction failed: ${toError(error).message}`);
  } finally {
    await loadingTask.destroy();
  }
}

/**
 * Check if buffer appears to be a valid PDF
 */
export function isPDFBuffer(buffer: Uint8Array): boolean {
  // Check for PDF magic number: %PDF
  return (
    buffer.length >= 4 &&
    buffer[0] === 0x25 && // %
    buffer[1] === 0x50 && // P
    buffer[2] === 0x44 && // D
    buffer[3] === 0x46 // F
  );
}
