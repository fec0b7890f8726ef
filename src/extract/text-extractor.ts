/**
 * Converts downloaded Drive files to plain text
 */

import mammoth from 'mammoth';
import { ExtractionError, toError } from '../errors/index.js';
import {
  CSV_MIME,
  DOCX_MIME,
  EXPORT_FORMATS,
  MARKDOWN_MIME,
  PDF_MIME,
  PLAIN_TEXT_MIME,
  XLS_MIME,
  XLSX_MIME,
} from '../drive/mime-types.js';
import type { DownloadedFile, RemoteFile } from '../types/index.js';
import { extractTextFromPDF } from './pdf-extractor.js';
import { extractTextFromSpreadsheet } from './sheet-extractor.js';

export interface TextExtractor {
  /**
   * Whether files of this remote type can be converted at all. Unsupported
   * files are recorded without being downloaded.
   */
  supports(mimeType: string): boolean;

  /**
   * Plain text of a downloaded file. Throws ExtractionError when the content
   * cannot be parsed.
   */
  extract(file: RemoteFile, download: DownloadedFile): Promise<string>;
}

type Parser = (data: Buffer) => Promise<string>;

const utf8 = new TextDecoder('utf-8', { fatal: true });

async function decodeText(data: Buffer): Promise<string> {
  try {
    return utf8.decode(data);
  } catch {
    throw new ExtractionError('Text file is not valid UTF-8');
  }
}

async function extractDocx(data: Buffer): Promise<string> {
  try {
    const result = await mammoth.extractRawText({ buffer: data });
    return result.value;
  } catch (error) {
    throw new ExtractionError(`DOCX text extraction failed: ${toError(error).message}`);
  }
}

const PARSERS: ReadonlyMap<string, Parser> = new Map<string, Parser>([
  [DOCX_MIME, extractDocx],
  [PDF_MIME, extractTextFromPDF],
  [XLSX_MIME, extractTextFromSpreadsheet],
  [XLS_MIME, extractTextFromSpreadsheet],
  [PLAIN_TEXT_MIME, decodeText],
  [MARKDOWN_MIME, decodeText],
  ['text/x-markdown', decodeText],
  [CSV_MIME, decodeText],
  ['application/csv', decodeText],
]);

export class DocumentTextExtractor implements TextExtractor {
  supports(mimeType: string): boolean {
    return EXPORT_FORMATS.has(mimeType) || PARSERS.has(mimeType);
  }

  async extract(file: RemoteFile, download: DownloadedFile): Promise<string> {
    const parser = PARSERS.get(download.mimeType);
    if (!parser) {
      throw new ExtractionError(`No text extractor for ${download.mimeType}`, {
        fileId: file.id,
      });
    }

    try {
      return await parser(download.data);
    } catch (error) {
      if (error instanceof ExtractionError) {
        throw new ExtractionError(error.message, { ...error.context, fileId: file.id, name: file.name });
      }
      throw error;
    }
  }
}
