/**
 * Rendering of one document inside a merged output file
 */

import type { LedgerRecord } from '../types/index.js';
import { fileViewUrl } from '../drive/drive-url.js';

/**
 * Render a record's text with its metadata block.
 *
 * Only stable record fields go into the section, so unchanged inputs render
 * byte-identically across runs.
 *
 * @param position - 1-based position of the document in merge order
 */
export function renderDocumentSection(record: LedgerRecord, text: string, position: number): string {
  return [
    `\`\`\`START OF FILE ${position} \`\`\``,
    '## METADATA ##',
    `Title: ${record.name}`,
    `Path: ${record.path}`,
    `URL: ${fileViewUrl(record.id)}`,
    `Last Modified: ${record.modifiedTime}`,
    '',
    text.trimEnd(),
    `\`\`\`END OF FILE ${position} \`\`\``,
    '',
  ].join('\n');
}
