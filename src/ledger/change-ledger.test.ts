import { describe, it, expect, beforeEach } from 'vitest';
import type { ExtractionOutcome } from './change-ledger.js';
import {
  createLedger,
  diffLedger,
  applyLedgerChanges,
  activeRecords,
  countByStatus,
} from './change-ledger.js';
import type { RemoteFile, SyncLedger } from '../types/index.js';

const T0 = new Date('2025-03-01T10:00:00.000Z');
const T1 = new Date('2025-03-02T10:00:00.000Z');

function remoteFile(id: string, overrides: Partial<RemoteFile> = {}): RemoteFile {
  return {
    id,
    name: `${id}.docx`,
    path: `docs/${id}.docx`,
    mimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    modifiedTime: '2025-02-01T00:00:00.000Z',
    fingerprint: `md5:${id}-v1`,
    ...overrides,
  };
}

function extracted(id: string): ExtractionOutcome {
  return { status: 'extracted', textRef: `${id}.txt`, textHash: `hash-${id}` };
}

/**
 * Build a ledger that has fully synced the given listing
 */
function syncedLedger(listing: RemoteFile[]): SyncLedger {
  const ledger = createLedger('folder-1', 'Folder', T0);
  const diff = diffLedger(ledger, listing);
  applyLedgerChanges(ledger, diff, new Map(listing.map(f => [f.id, extracted(f.id)] as const)), T0);
  return ledger;
}

describe('createLedger', () => {
  it('should start empty with no previous run', () => {
    expect(createLedger('folder-1', 'Folder', T0)).toEqual({
      version: 1,
      folderId: 'folder-1',
      folderName: 'Folder',
      createdAt: '2025-03-01T10:00:00.000Z',
      lastRunAt: null,
      records: {},
    });
  });
});

describe('diffLedger', () => {
  let listing: RemoteFile[];
  let ledger: SyncLedger;

  beforeEach(() => {
    listing = [remoteFile('a'), remoteFile('b'), remoteFile('c')];
    ledger = syncedLedger(listing);
  });

  it('should report every file as added against an empty ledger', () => {
    const diff = diffLedger(createLedger('folder-1', 'Folder', T0), listing);

    expect(diff.added.map(c => c.file.id)).toEqual(['a', 'b', 'c']);
    expect(diff.modified).toHaveLength(0);
    expect(diff.deleted).toHaveLength(0);
    expect(diff.unchanged).toHaveLength(0);
  });

  it('should classify exactly the file with a new fingerprint as modified', () => {
    const changed = listing.map(f => (f.id === 'b' ? { ...f, fingerprint: 'md5:b-v2' } : f));

    const diff = diffLedger(ledger, changed);

    expect(diff.modified.map(c => c.file.id)).toEqual(['b']);
    expect(diff.unchanged.map(c => c.file.id)).toEqual(['a', 'c']);
    expect(diff.added).toHaveLength(0);
    expect(diff.deleted).toHaveLength(0);
  });

  it('should classify a new modification time as modified', () => {
    const changed = listing.map(f =>
      f.id === 'c' ? { ...f, modifiedTime: '2025-02-15T00:00:00.000Z' } : f
    );

    expect(diffLedger(ledger, changed).modified.map(c => c.file.id)).toEqual(['c']);
  });

  it('should report stored records missing from the listing as deleted', () => {
    const diff = diffLedger(ledger, [listing[0], listing[2]]);

    expect(diff.deleted.map(c => c.previous.id)).toEqual(['b']);
  });

  it('should not mutate the ledger', () => {
    const before = structuredClone(ledger);

    diffLedger(ledger, [remoteFile('z')]);

    expect(ledger).toEqual(before);
  });

  it('should treat a reappearing deleted id as added', () => {
    applyLedgerChanges(ledger, diffLedger(ledger, [listing[0], listing[2]]), new Map(), T1);
    expect(ledger.records.b.status).toBe('deleted');

    const diff = diffLedger(ledger, listing);

    expect(diff.added.map(c => c.file.id)).toEqual(['b']);
    expect(diff.added[0].previous?.status).toBe('deleted');
  });

  it('should list a file only once when Drive reports it under two parents', () => {
    const diff = diffLedger(createLedger('f', 'F', T0), [remoteFile('a'), remoteFile('a')]);

    expect(diff.added).toHaveLength(1);
  });

  it('should keep the smallest path of a file listed under several parents', () => {
    const later = remoteFile('a', { path: 'zeta/a.docx' });
    const earlier = remoteFile('a', { path: 'alpha/a.docx' });

    for (const order of [[later, earlier], [earlier, later]]) {
      const diff = diffLedger(createLedger('f', 'F', T0), order);
      expect(diff.added.map(change => change.file.path)).toEqual(['alpha/a.docx']);
    }
  });

  it('should not report a file as deleted when its duplicate listing comes first', () => {
    const diff = diffLedger(ledger, [
      remoteFile('b', { path: 'other/b.docx' }),
      ...listing,
    ]);

    expect(diff.deleted).toEqual([]);
    expect(diff.unchanged.map(change => change.file.id)).toEqual(['b', 'a', 'c']);
  });

  it('should report unsupported records that disappear as deleted', () => {
    const fresh = createLedger('folder-1', 'Folder', T0);
    const video = remoteFile('v', { mimeType: 'video/mp4' });
    applyLedgerChanges(
      fresh,
      diffLedger(fresh, [video]),
      new Map<string, ExtractionOutcome>([['v', { status: 'unsupported', reason: 'video/mp4' }]]),
      T0
    );

    expect(diffLedger(fresh, []).deleted.map(c => c.previous.id)).toEqual(['v']);
  });
});

describe('applyLedgerChanges', () => {
  it('should insert active records for extracted files', () => {
    const ledger = createLedger('folder-1', 'Folder', T0);
    const file = remoteFile('a');

    const summary = applyLedgerChanges(ledger, diffLedger(ledger, [file]), new Map([['a', extracted('a')]]), T0);

    expect(summary).toEqual({
      added: 1,
      modified: 0,
      deleted: 0,
      unsupported: 0,
      failed: 0,
      moved: 0,
      releasedTextRefs: [],
    });
    expect(ledger.records.a).toEqual({
      id: 'a',
      name: 'a.docx',
      path: 'docs/a.docx',
      mimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
      modifiedTime: '2025-02-01T00:00:00.000Z',
      fingerprint: 'md5:a-v1',
      status: 'active',
      textRef: 'a.txt',
      textHash: 'hash-a',
      syncedAt: '2025-03-01T10:00:00.000Z',
    });
  });

  it('should record unsupported files without a text reference', () => {
    const ledger = createLedger('folder-1', 'Folder', T0);

    const summary = applyLedgerChanges(
      ledger,
      diffLedger(ledger, [remoteFile('x')]),
      new Map<string, ExtractionOutcome>([['x', { status: 'unsupported', reason: 'Corrupt PDF' }]]),
      T0
    );

    expect(summary.added).toBe(1);
    expect(summary.unsupported).toBe(1);
    expect(ledger.records.x.status).toBe('unsupported');
    expect(ledger.records.x.textRef).toBeUndefined();
    expect(ledger.records.x.unsupportedReason).toBe('Corrupt PDF');
  });

  it('should release the old text when a modified file becomes unsupported', () => {
    const ledger = syncedLedger([remoteFile('a')]);

    const summary = applyLedgerChanges(
      ledger,
      diffLedger(ledger, [remoteFile('a', { fingerprint: 'md5:a-v2' })]),
      new Map<string, ExtractionOutcome>([['a', { status: 'unsupported', reason: 'Encrypted PDF' }]]),
      T1
    );

    expect(ledger.records.a.status).toBe('unsupported');
    expect(summary.releasedTextRefs).toEqual(['a.txt']);
  });

  it('should not release text that was rewritten under the same reference', () => {
    const ledger = syncedLedger([remoteFile('a')]);

    const summary = applyLedgerChanges(
      ledger,
      diffLedger(ledger, [remoteFile('a', { fingerprint: 'md5:a-v2' })]),
      new Map([['a', extracted('a')]]),
      T1
    );

    expect(summary.releasedTextRefs).toEqual([]);
  });

  it('should replace fields of modified files', () => {
    const ledger = syncedLedger([remoteFile('a')]);
    const updated = remoteFile('a', { fingerprint: 'md5:a-v2', modifiedTime: '2025-02-20T00:00:00.000Z' });

    const summary = applyLedgerChanges(
      ledger,
      diffLedger(ledger, [updated]),
      new Map<string, ExtractionOutcome>([
        ['a', { status: 'extracted', textRef: 'a.txt', textHash: 'hash-a2' }],
      ]),
      T1
    );

    expect(summary.modified).toBe(1);
    expect(ledger.records.a.fingerprint).toBe('md5:a-v2');
    expect(ledger.records.a.textHash).toBe('hash-a2');
    expect(ledger.records.a.syncedAt).toBe('2025-03-02T10:00:00.000Z');
  });

  it('should leave the previous record untouched when fetching failed', () => {
    const ledger = syncedLedger([remoteFile('a')]);
    const before = structuredClone(ledger.records.a);
    const updated = remoteFile('a', { fingerprint: 'md5:a-v2' });

    const summary = applyLedgerChanges(
      ledger,
      diffLedger(ledger, [updated, remoteFile('n')]),
      new Map<string, ExtractionOutcome>([
        ['a', { status: 'failed', error: new Error('socket hang up') }],
        ['n', { status: 'failed', error: new Error('socket hang up') }],
      ]),
      T1
    );

    expect(summary.failed).toBe(2);
    expect(summary.modified).toBe(0);
    expect(ledger.records.a).toEqual(before);
    expect(ledger.records.n).toBeUndefined();
    // Retried on the next run
    expect(diffLedger(ledger, [updated]).modified.map(c => c.file.id)).toEqual(['a']);
  });

  it('should mark deleted files and keep their records', () => {
    const ledger = syncedLedger([remoteFile('a'), remoteFile('d')]);

    const summary = applyLedgerChanges(ledger, diffLedger(ledger, [remoteFile('a')]), new Map(), T1);

    expect(summary.deleted).toBe(1);
    expect(ledger.records.d.status).toBe('deleted');
    expect(ledger.records.d.deletedAt).toBe('2025-03-02T10:00:00.000Z');
    expect(ledger.records.d.textRef).toBeUndefined();
    expect(summary.releasedTextRefs).toEqual(['d.txt']);
  });

  it('should not report the same deletion twice', () => {
    const ledger = syncedLedger([remoteFile('a'), remoteFile('d')]);
    applyLedgerChanges(ledger, diffLedger(ledger, [remoteFile('a')]), new Map(), T1);

    for (let run = 0; run < 3; run++) {
      const diff = diffLedger(ledger, [remoteFile('a')]);
      expect(diff.deleted).toHaveLength(0);
      expect(applyLedgerChanges(ledger, diff, new Map(), T1).deleted).toBe(0);
      expect(activeRecords(ledger).map(r => r.id)).toEqual(['a']);
    }
  });

  it('should rebuild a reappearing file as a fresh record', () => {
    const ledger = syncedLedger([remoteFile('a')]);
    applyLedgerChanges(ledger, diffLedger(ledger, []), new Map(), T1);

    applyLedgerChanges(
      ledger,
      diffLedger(ledger, [remoteFile('a')]),
      new Map([['a', extracted('a')]]),
      T1
    );

    expect(ledger.records.a.status).toBe('active');
    expect(ledger.records.a.deletedAt).toBeUndefined();
  });

  it('should refresh the path of moved files without re-extracting them', () => {
    const ledger = syncedLedger([remoteFile('a')]);
    const moved = remoteFile('a', { path: 'archive/a.docx' });
    const diff = diffLedger(ledger, [moved]);

    expect(diff.unchanged).toHaveLength(1);
    const summary = applyLedgerChanges(ledger, diff, new Map(), T1);

    expect(summary.moved).toBe(1);
    expect(ledger.records.a.path).toBe('archive/a.docx');
    expect(ledger.records.a.syncedAt).toBe('2025-03-01T10:00:00.000Z');
  });

  it('should leave an unchanged ledger identical', () => {
    const listing = [remoteFile('a'), remoteFile('b')];
    const ledger = syncedLedger(listing);
    const before = structuredClone(ledger);

    applyLedgerChanges(ledger, diffLedger(ledger, listing), new Map(), T1);

    expect(ledger).toEqual(before);
  });
});

describe('activeRecords', () => {
  it('should order active records by path then id and skip the rest', () => {
    const ledger = createLedger('folder-1', 'Folder', T0);
    const files = [
      remoteFile('z1', { path: 'b/second.docx' }),
      remoteFile('y1', { path: 'a/first.docx' }),
      remoteFile('x2', { path: 'Z/upper.docx' }),
      remoteFile('x1', { path: 'b/second.docx' }),
      remoteFile('u1', { path: 'a/skipped.mp4' }),
    ];
    applyLedgerChanges(
      ledger,
      diffLedger(ledger, files),
      new Map<string, ExtractionOutcome>([
        ['z1', extracted('z1')],
        ['y1', extracted('y1')],
        ['x2', extracted('x2')],
        ['x1', extracted('x1')],
        ['u1', { status: 'unsupported', reason: 'video/mp4' }],
      ]),
      T0
    );

    // Uppercase sorts before lowercase by code unit
    expect(activeRecords(ledger).map(r => r.id)).toEqual(['x2', 'y1', 'x1', 'z1']);
    expect(countByStatus(ledger)).toEqual({ active: 4, deleted: 0, unsupported: 1 });
  });
});
