/**
 * Drive MIME types the sync cares about
 */

export const FOLDER_MIME = 'application/vnd.google-apps.folder';
export const SHORTCUT_MIME = 'application/vnd.google-apps.shortcut';

export const GOOGLE_DOC_MIME = 'application/vnd.google-apps.document';
export const GOOGLE_SHEET_MIME = 'application/vnd.google-apps.spreadsheet';
export const GOOGLE_SLIDES_MIME = 'application/vnd.google-apps.presentation';

export const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
export const PDF_MIME = 'application/pdf';
export const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
export const XLS_MIME = 'application/vnd.ms-excel';
export const CSV_MIME = 'text/csv';
export const PLAIN_TEXT_MIME = 'text/plain';
export const MARKDOWN_MIME = 'text/markdown';

/**
 * Google-native documents have no binary content and must be exported.
 * Docs go through DOCX so headings and lists survive as paragraphs. Sheets
 * go through XLSX because a CSV export holds only the first tab.
 */
export const EXPORT_FORMATS: ReadonlyMap<string, string> = new Map([
  [GOOGLE_DOC_MIME, DOCX_MIME],
  [GOOGLE_SHEET_MIME, XLSX_MIME],
  [GOOGLE_SLIDES_MIME, PLAIN_TEXT_MIME],
]);
