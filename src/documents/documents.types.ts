import type { FileStoreDocument } from '../gemini/gemini.types';

export interface RechtsbuchEntry {
  bsgNumber: string;
  document: FileStoreDocument;
}

export interface RechtsbuchGroup {
  rechtsbuch: string;
  entries: RechtsbuchEntry[];
}

export interface GroupedDocuments {
  rechtsbuecher: RechtsbuchGroup[];
  withoutBsg: FileStoreDocument[];
}

export interface DuplicateGroup {
  displayName: string;
  documents: FileStoreDocument[];
}

export interface DuplicateReport {
  totalDuplicates: number;
  groups: DuplicateGroup[];
}

/** A file store document prepared for display. */
export interface DocumentView {
  name: string;
  id: string;
  displayName: string;
  bsgNumber: string | null;
  url: string | null;
  lawName: string | null;
  uploadedAt: string | null;
  sizeBytes: number;
  size: string;
  ownUpload: boolean;
}

export type DocumentSort = 'rechtsbuch' | 'date';

export type GroupedDocumentsView = {
  sort: 'rechtsbuch';
  total: number;
  rechtsbuecher: { rechtsbuch: string; count: number; documents: DocumentView[] }[];
  withoutBsg: DocumentView[];
};

export type DatedDocumentsView = {
  sort: 'date';
  total: number;
  documents: DocumentView[];
};

export type IncomingUpload = {
  path: string;
  originalname: string;
  mimetype: string;
  size: number;
};

export interface UploadResponse {
  displayName: string;
  sizeBytes: number;
  operationName?: string;
  documentName?: string;
}
