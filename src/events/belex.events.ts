export const BELEX_EVENTS = {
  SEARCH_COMPLETED: 'search.completed',
  DOCUMENT_UPLOADED: 'document.uploaded',
  DOCUMENT_DELETED: 'document.deleted',
} as const;

export type BelexEventName = (typeof BELEX_EVENTS)[keyof typeof BELEX_EVENTS];

export interface SearchCompletedEvent {
  query: string;
  answerLength: number;
  sourceCount: number;
  customPrompt: boolean;
}

export interface DocumentUploadedEvent {
  displayName: string;
  sizeBytes: number;
  operationName?: string;
}

export interface DocumentDeletedEvent {
  documentName: string;
}
