import { extname } from 'node:path';
import { extractBsgNumber, rechtsbuchOf } from '../belex/bsg';
import type { FileStoreDocument } from '../gemini/gemini.types';
import type {
  DuplicateReport,
  GroupedDocuments,
  RechtsbuchEntry,
} from './documents.types';

export const UNKNOWN_DISPLAY_NAME = 'Unbekannt';
export const ALLOWED_UPLOAD_EXTENSIONS = [
  '.pdf',
  '.txt',
  '.md',
  '.doc',
  '.docx',
  '.html',
  '.csv',
  '.json',
];
export const MAX_UPLOAD_BYTES = 100 * 1024 * 1024;
export const WEBAPP_UPLOAD_MARKER = { key: 'uploaded_via', value: 'webapp' };

const MIB = 1024 * 1024;
const NON_NUMERIC_RECHTSBUCH = 999_999;

const byCodePoint = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export function displayNameOf(doc: FileStoreDocument): string {
  return doc.displayName ?? UNKNOWN_DISPLAY_NAME;
}

export function isAllowedUpload(filename: string): boolean {
  return ALLOWED_UPLOAD_EXTENSIONS.includes(extname(filename).toLowerCase());
}

/**
 * Groups documents by Rechtsbuch, numerically ordered; entries within a
 * group are ordered by BSG number.
 */
export function groupByRechtsbuch(docs: FileStoreDocument[]): GroupedDocuments {
  const groups = new Map<string, RechtsbuchEntry[]>();
  const withoutBsg: FileStoreDocument[] = [];

  for (const document of docs) {
    const bsgNumber = extractBsgNumber(displayNameOf(document));
    if (!bsgNumber) {
      withoutBsg.push(document);
      continue;
    }
    const rechtsbuch = rechtsbuchOf(bsgNumber);
    const entries = groups.get(rechtsbuch) ?? [];
    entries.push({ bsgNumber, document });
    groups.set(rechtsbuch, entries);
  }

  const sortKey = (rechtsbuch: string) =>
    /^\d+$/.test(rechtsbuch) ? parseInt(rechtsbuch, 10) : NON_NUMERIC_RECHTSBUCH;

  const rechtsbuecher = [...groups.entries()]
    .sort(
      ([a], [b]) => sortKey(a) - sortKey(b) || byCodePoint(a, b),
    )
    .map(([rechtsbuch, entries]) => ({
      rechtsbuch,
      entries: [...entries].sort((x, y) => byCodePoint(x.bsgNumber, y.bsgNumber)),
    }));

  return { rechtsbuecher, withoutBsg };
}

/** Newest first; documents without createTime go last. */
export function sortByUploadDate(docs: FileStoreDocument[]): FileStoreDocument[] {
  return [...docs].sort((a, b) =>
    byCodePoint(b.createTime ?? '', a.createTime ?? ''),
  );
}

export function findDuplicates(docs: FileStoreDocument[]): DuplicateReport {
  const byName = new Map<string, FileStoreDocument[]>();
  for (const doc of docs) {
    const name = displayNameOf(doc);
    byName.set(name, [...(byName.get(name) ?? []), doc]);
  }

  const groups = [...byName.entries()]
    .filter(([, documents]) => documents.length > 1)
    .sort(([a], [b]) => byCodePoint(a, b))
    .map(([displayName, documents]) => ({ displayName, documents }));

  return {
    totalDuplicates: groups.reduce((sum, g) => sum + g.documents.length - 1, 0),
    groups,
  };
}

export function isOwnUpload(doc: FileStoreDocument): boolean {
  return (doc.customMetadata ?? []).some(
    (meta) =>
      meta.key === WEBAPP_UPLOAD_MARKER.key &&
      meta.stringValue === WEBAPP_UPLOAD_MARKER.value,
  );
}

export function ownUploads(docs: FileStoreDocument[]): FileStoreDocument[] {
  return sortByUploadDate(docs.filter(isOwnUpload));
}

export function sizeInBytes(doc: FileStoreDocument): number {
  const bytes = parseInt(doc.sizeBytes ?? '0', 10);
  return Number.isNaN(bytes) ? 0 : bytes;
}

export function formatSize(bytes: number): string {
  if (bytes >= MIB) return `${(bytes / MIB).toFixed(2)} MB`;
  return `${bytes.toLocaleString('en-US')} Bytes`;
}

/** "2025-03-04T10:11:12.345Z" → "2025-03-04 10:11:12" */
export function formatUploadTime(createTime: string): string {
  const [date, time] = createTime.split('T');
  if (!time) return date;
  return `${date} ${time.split('.')[0].replace(/Z$/, '')}`;
}

/** Last path segment of a resource name ("…/documents/abc" → "abc"). */
export function documentIdOf(name: string): string {
  return name.slice(name.lastIndexOf('/') + 1);
}
