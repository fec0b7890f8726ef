/**
 * Google Drive URL parsing and output-folder naming
 */

export type DriveTargetKind = 'folder' | 'drive' | 'file' | 'item';

/**
 * What a user-supplied URL points at. `item` means the id is known but not
 * whether it is a folder or a file; the Drive client resolves it.
 */
export interface DriveTarget {
  id: string;
  kind: DriveTargetKind;
}

/**
 * Special folder id Drive uses for the user's own "My Drive"
 */
export const MY_DRIVE_ID = 'root';

const ID = '([0-9A-Za-z_-]+)';

const PERSONAL_DRIVE_PATTERNS = [/drive\/u\/\d+\/my-drive/, /drive\/my-drive/, /drive\/home/];

// Path segments after /drive/ that are views, not shared drive ids
const RESERVED_SEGMENTS = new Set([
  'u',
  'my-drive',
  'home',
  'folders',
  'file',
  'd',
  'shared-with-me',
  'shared-drives',
  'recent',
  'starred',
  'trash',
  'computers',
  'search',
]);

/**
 * Extract a folder, shared drive or file id from a Google Drive URL.
 * Returns null when nothing recognisable is found.
 */
export function parseDriveUrl(input: string): DriveTarget | null {
  const url = input.trim();
  if (!url) {
    return null;
  }

  if (PERSONAL_DRIVE_PATTERNS.some(pattern => pattern.test(url))) {
    return { id: MY_DRIVE_ID, kind: 'folder' };
  }

  const folder = url.match(new RegExp(`folders/${ID}`));
  if (folder) {
    return { id: folder[1], kind: 'folder' };
  }

  // drive.google.com/file/d/<id>, drive.google.com/drive/d/<id>, docs.google.com/document/d/<id>
  const file = url.match(new RegExp(`/d/${ID}`));
  if (file) {
    return { id: file[1], kind: 'file' };
  }

  const sharedDrive = url.match(new RegExp(`drive/${ID}`));
  if (sharedDrive && !RESERVED_SEGMENTS.has(sharedDrive[1])) {
    return { id: sharedDrive[1], kind: 'drive' };
  }

  const idParam = url.match(new RegExp(`[?&]id=${ID}`));
  if (idParam) {
    return { id: idParam[1], kind: 'item' };
  }

  // A bare id pasted on its own
  if (/^[0-9A-Za-z_-]{10,}$/.test(url)) {
    return { id: url, kind: 'item' };
  }

  return null;
}

const INVALID_NAME_CHARS: Record<string, string> = {
  '/': '',
  '\\': '',
  ':': '',
  '*': '',
  '?': '',
  '"': '',
  '<': '',
  '>': '',
  '|': '',
  '.': '_',
};

/**
 * Make a Drive folder name safe to use as a local directory and file prefix
 */
export function sanitizeFolderName(name: string): string {
  const sanitized = Array.from(name, char => INVALID_NAME_CHARS[char] ?? char)
    .join('')
    .trim();

  return sanitized || 'untitled';
}

/**
 * Browser URL for a Drive file, written into merged output
 */
export function fileViewUrl(fileId: string): string {
  return `https://drive.google.com/file/d/${fileId}/view`;
}
