import {
  HttpException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ApiError,
  GoogleGenAI,
  type Operation,
  type UploadToFileSearchStoreResponse,
} from '@google/genai';
import { setTimeout as sleep } from 'node:timers/promises';
import { GENAI_CLIENT } from './gemini.constants';
import type {
  FileSearchAnswer,
  FileSearchOptions,
  FileStoreDocument,
  GroundingChunk,
  ListDocumentsResponse,
  UploadOptions,
  UploadResult,
} from './gemini.types';

const PAGE_SIZE = 20;

@Injectable()
export class GeminiService {
  private readonly logger = new Logger(GeminiService.name);
  private readonly apiKey: string;
  private readonly filestoreId: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly pollIntervalMs: number;

  constructor(
    private readonly config: ConfigService,
    @Inject(GENAI_CLIENT) private readonly ai: GoogleGenAI,
  ) {
    this.apiKey = this.config.getOrThrow<string>('gemini.apiKey');
    this.filestoreId = this.config.getOrThrow<string>('gemini.filestoreId');
    this.baseUrl =
      this.config.get<string>('GEMINI_API_BASE_URL') ??
      'https://generativelanguage.googleapis.com/v1beta';
    this.model = this.config.get<string>('GEMINI_MODEL') ?? 'gemini-2.5-flash';
    this.pollIntervalMs = Number(
      this.config.get('UPLOAD_POLL_INTERVAL_MS') ?? 2000,
    );
  }

  get storeName(): string {
    return this.filestoreId;
  }

  async searchFileStore(
    query: string,
    options: FileSearchOptions = {},
  ): Promise<FileSearchAnswer> {
    const model = options.model ?? this.model;
    this.logger.debug(`Calling Gemini generateContent (${model})`);
    try {
      const response = await this.ai.models.generateContent({
        model,
        contents: query,
        config: {
          ...(options.systemInstruction !== undefined
            ? { systemInstruction: options.systemInstruction }
            : {}),
          tools: [{ fileSearch: { fileSearchStoreNames: [this.filestoreId] } }],
        },
      });

      const chunks =
        response.candidates?.[0]?.groundingMetadata?.groundingChunks ?? [];

      return {
        text: response.text,
        groundingChunks: chunks.map(
          (chunk): GroundingChunk => ({
            ...(chunk.retrievedContext
              ? {
                  retrievedContext: {
                    title: chunk.retrievedContext.title,
                    text: chunk.retrievedContext.text,
                    uri: chunk.retrievedContext.uri,
                  },
                }
              : {}),
          }),
        ),
      };
    } catch (error) {
      this.logger.error('Gemini generateContent error', error);
      throw this.toHttpException(error);
    }
  }

  async listDocuments(): Promise<FileStoreDocument[]> {
    const documents: FileStoreDocument[] = [];
    let pageToken: string | undefined;

    do {
      const url = new URL(`${this.baseUrl}/${this.filestoreId}/documents`);
      url.searchParams.set('pageSize', String(PAGE_SIZE));
      if (pageToken) url.searchParams.set('pageToken', pageToken);

      const res = await this.request(url, 'GET');
      if (!res.ok) {
        throw new InternalServerErrorException(
          `Fehler beim Abrufen der Dokumente: ${res.status} ${await res.text()}`,
        );
      }

      const json = (await res.json()) as ListDocumentsResponse;
      documents.push(...(json.documents ?? []));
      pageToken = json.nextPageToken || undefined;
    } while (pageToken);

    this.logger.debug(`${documents.length} Dokument(e) im Filestore`);
    return documents;
  }

  /** Deletes the document and, with `force`, all of its chunks. */
  async deleteDocument(documentName: string): Promise<void> {
    const url = new URL(`${this.baseUrl}/${documentName}`);
    url.searchParams.set('force', 'true');

    const res = await this.request(url, 'DELETE');
    if (res.status !== 200 && res.status !== 204) {
      throw new InternalServerErrorException(
        `Fehler beim Löschen: Status ${res.status} ${await res.text()}`,
      );
    }
  }

  async uploadDocument(
    filePath: string,
    options: UploadOptions,
  ): Promise<UploadResult> {
    try {
      let operation: Operation<UploadToFileSearchStoreResponse> =
        await this.ai.fileSearchStores.uploadToFileSearchStore({
          file: filePath,
          fileSearchStoreName: this.filestoreId,
          config: {
            displayName: options.displayName,
            ...(options.mimeType ? { mimeType: options.mimeType } : {}),
            ...(options.customMetadata
              ? { customMetadata: options.customMetadata }
              : {}),
          },
        });

      while (!operation.done) {
        await sleep(this.pollIntervalMs);
        operation = await this.ai.operations.get<
          UploadToFileSearchStoreResponse,
          Operation<UploadToFileSearchStoreResponse>
        >({ operation });
      }

      if (operation.error) {
        throw new InternalServerErrorException(
          `Indexierung fehlgeschlagen: ${JSON.stringify(operation.error)}`,
        );
      }

      return {
        operationName: operation.name,
        documentName: operation.response?.documentName,
      };
    } catch (error) {
      this.logger.error(`Upload von "${options.displayName}" fehlgeschlagen`, error);
      throw this.toHttpException(error);
    }
  }

  private async request(url: URL, method: 'GET' | 'DELETE'): Promise<Response> {
    this.logger.debug(`${method} ${url.pathname}`);
    try {
      return await fetch(url, {
        method,
        headers: { 'x-goog-api-key': this.apiKey },
      });
    } catch (error) {
      this.logger.error(`Gemini REST ${method} error`, error);
      throw new ServiceUnavailableException('Gemini API nicht erreichbar');
    }
  }

  private toHttpException(error: unknown): HttpException {
    if (error instanceof HttpException) return error;
    if (error instanceof ApiError) {
      return new InternalServerErrorException(
        `Gemini: ${error.status} ${error.message}`,
      );
    }
    return new ServiceUnavailableException('Gemini API nicht erreichbar');
  }
}
