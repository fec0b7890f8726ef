/**
 * Core type definitions for the sync system
 */

/**
 * One file as reported by the remote listing
 */
export interface RemoteFile {
  id: string;
  name: string;
  /** Folder hierarchy + name, relative to the synced root */
  path: string;
  mimeType: string;
  modifiedTime: string;
  /** Content/version marker, see computeFingerprint */
  fingerprint: string;
  size?: number;
}

/**
 * Bytes fetched for a file. `mimeType` is the format actually delivered,
 * which differs from the file's own type for exported Google documents.
 */
export interface DownloadedFile {
  data: Buffer;
  mimeType: string;
}

export type RecordStatus = 'active' | 'deleted' | 'unsupported';

/**
 * Last known state of a tracked remote file
 */
export interface LedgerRecord {
  id: string;
  name: string;
  path: string;
  mimeType: string;
  modifiedTime: string;
  fingerprint: string;
  status: RecordStatus;
  /** Key of the cached extracted text; absent unless the text was extracted */
  textRef?: string;
  textHash?: string;
  unsupportedReason?: string;
  syncedAt: string;
  deletedAt?: string;
}

/**
 * Persisted change-tracking state for one synced folder
 */
export interface SyncLedger {
  version: 1;
  folderId: string;
  folderName: string;
  createdAt: string;
  lastRunAt: string | null;
  records: Record<string, LedgerRecord>;
}

/**
 * One merged output file
 */
export interface MergedChunk {
  /** 0-based position among the chunks of one merge pass */
  sequenceIndex: number;
  byteSize: number;
  wordCount: number;
  /** Record ids in write order */
  memberIds: string[];
}

/**
 * Summary of one sync run
 */
export interface SyncReport {
  folderId: string;
  folderName: string;
  outputDir: string;
  added: number;
  modified: number;
  deleted: number;
  unchanged: number;
  unsupported: number;
  failed: number;
  activeDocuments: number;
  chunkFiles: string[];
  totalBytes: number;
  totalWords: number;
  downloadedBytes: number;
  duration: number;
  errors: string[];
}
