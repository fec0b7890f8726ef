import { createHash } from 'node:crypto';

/**
 * Computes a SHA-256 hash of extracted document text.
 *
 * @returns A hex-encoded SHA-256 hash string
 */
export function computeTextHash(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Drive metadata used to fingerprint a file's content
 */
export interface FingerprintSource {
  md5Checksum?: string | null;
  version?: string | null;
  modifiedTime?: string | null;
}

/**
 * Binary uploads carry an md5 of their content. Google-native documents have
 * none, so their revision counter stands in; it moves on every edit.
 */
export function computeFingerprint(source: FingerprintSource): string {
  if (source.md5Checksum) {
    return `md5:${source.md5Checksum}`;
  }

  if (source.version) {
    return `rev:${source.version}`;
  }

  return `mtime:${source.modifiedTime ?? ''}`;
}
