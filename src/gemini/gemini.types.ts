export type CustomMetadata = {
  key: string;
  stringValue?: string;
  numericValue?: number;
};

/** Document resource of a file search store, as returned by the REST API. */
export type FileStoreDocument = {
  name: string;
  displayName?: string;
  createTime?: string; // RFC 3339
  updateTime?: string;
  sizeBytes?: string; // int64 serialized as string
  mimeType?: string;
  state?: string;
  customMetadata?: CustomMetadata[];
};

export type ListDocumentsResponse = {
  documents?: FileStoreDocument[];
  nextPageToken?: string;
};

export type RetrievedContext = {
  title?: string;
  text?: string;
  uri?: string;
};

export type GroundingChunk = {
  retrievedContext?: RetrievedContext;
};

export type FileSearchAnswer = {
  text: string | undefined;
  groundingChunks: GroundingChunk[];
};

export type FileSearchOptions = {
  systemInstruction?: string;
  model?: string;
};

export type UploadOptions = {
  displayName: string;
  mimeType?: string;
  customMetadata?: CustomMetadata[];
};

export type UploadResult = {
  operationName?: string;
  documentName?: string;
};
