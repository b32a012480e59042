import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { unlink } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { GeminiService } from '../gemini/gemini.service';
import type { FileStoreDocument } from '../gemini/gemini.types';
import { BelexService } from '../belex/belex.service';
import { extractBsgNumber } from '../belex/bsg';
import {
  BELEX_EVENTS,
  type DocumentDeletedEvent,
  type DocumentUploadedEvent,
} from '../events/belex.events';
import {
  MAX_UPLOAD_BYTES,
  WEBAPP_UPLOAD_MARKER,
  displayNameOf,
  documentIdOf,
  findDuplicates,
  formatSize,
  formatUploadTime,
  groupByRechtsbuch,
  isAllowedUpload,
  isOwnUpload,
  ownUploads,
  sizeInBytes,
  sortByUploadDate,
} from './documents.utils';
import type {
  DatedDocumentsView,
  DocumentView,
  DuplicateReport,
  GroupedDocumentsView,
  UploadResponse,
  IncomingUpload,
} from './documents.types';

const DOCUMENT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);
  private readonly deleteSyncDelayMs: number;

  constructor(
    private readonly config: ConfigService,
    private readonly gemini: GeminiService,
    private readonly belex: BelexService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.deleteSyncDelayMs = Number(
      this.config.get('DELETE_SYNC_DELAY_MS') ?? 0,
    );
  }

  async list(): Promise<FileStoreDocument[]> {
    return this.gemini.listDocuments();
  }

  async listByRechtsbuch(): Promise<GroupedDocumentsView> {
    const documents = await this.list();
    const { rechtsbuecher, withoutBsg } = groupByRechtsbuch(documents);

    return {
      sort: 'rechtsbuch',
      total: documents.length,
      rechtsbuecher: await Promise.all(
        rechtsbuecher.map(async (group) => ({
          rechtsbuch: group.rechtsbuch,
          count: group.entries.length,
          documents: await Promise.all(
            group.entries.map((e) => this.toView(e.document)),
          ),
        })),
      ),
      withoutBsg: await Promise.all(withoutBsg.map((d) => this.toView(d))),
    };
  }

  async listByUploadDate(): Promise<DatedDocumentsView> {
    const documents = sortByUploadDate(await this.list());
    return {
      sort: 'date',
      total: documents.length,
      documents: await Promise.all(documents.map((d) => this.toView(d))),
    };
  }

  async duplicates(): Promise<DuplicateReport> {
    return findDuplicates(await this.list());
  }

  async ownUploads(): Promise<DocumentView[]> {
    const documents = ownUploads(await this.list());
    return Promise.all(documents.map((d) => this.toView(d)));
  }

  async upload(file: IncomingUpload, displayName?: string): Promise<UploadResponse> {
    try {
      if (!isAllowedUpload(file.originalname)) {
        throw new BadRequestException(
          `Dateityp nicht unterstützt: ${file.originalname}`,
        );
      }
      if (file.size > MAX_UPLOAD_BYTES) {
        throw new BadRequestException('Datei ist zu groß! Maximum: 100 MB');
      }

      const name = displayName?.trim() || file.originalname;
      const result = await this.gemini.uploadDocument(file.path, {
        displayName: name,
        mimeType: file.mimetype,
        customMetadata: [
          {
            key: WEBAPP_UPLOAD_MARKER.key,
            stringValue: WEBAPP_UPLOAD_MARKER.value,
          },
          { key: 'upload_timestamp', stringValue: new Date().toISOString() },
        ],
      });

      this.eventEmitter.emit(BELEX_EVENTS.DOCUMENT_UPLOADED, {
        displayName: name,
        sizeBytes: file.size,
        ...(result.operationName ? { operationName: result.operationName } : {}),
      } satisfies DocumentUploadedEvent);

      return { displayName: name, sizeBytes: file.size, ...result };
    } finally {
      await unlink(file.path).catch((error: unknown) =>
        this.logger.warn(
          `Temporäre Datei ${file.path} nicht gelöscht: ${String(error)}`,
        ),
      );
    }
  }

  /**
   * Accepts a bare document id or a full resource name inside the configured
   * store. Anything else, dot segments and other stores included, is refused.
   */
  resolveDocumentName(idOrName: string): string {
    const prefix = `${this.gemini.storeName}/documents/`;
    const id = idOrName.startsWith(prefix)
      ? idOrName.slice(prefix.length)
      : idOrName;

    if (!DOCUMENT_ID_PATTERN.test(id)) {
      throw new BadRequestException(`Ungültige Dokument-ID: ${idOrName}`);
    }
    return `${prefix}${id}`;
  }

  async delete(idOrName: string): Promise<{ deleted: string }> {
    const documentName = this.resolveDocumentName(idOrName);
    await this.gemini.deleteDocument(documentName);

    this.eventEmitter.emit(BELEX_EVENTS.DOCUMENT_DELETED, {
      documentName,
    } satisfies DocumentDeletedEvent);

    // Listing right after a delete can still return the document.
    if (this.deleteSyncDelayMs > 0) await sleep(this.deleteSyncDelayMs);
    return { deleted: documentName };
  }

  private async toView(doc: FileStoreDocument): Promise<DocumentView> {
    const displayName = displayNameOf(doc);
    const bsgNumber = extractBsgNumber(displayName);
    const sizeBytes = sizeInBytes(doc);

    return {
      name: doc.name,
      id: documentIdOf(doc.name),
      displayName,
      bsgNumber,
      url: bsgNumber ? this.belex.urlFor(bsgNumber) : null,
      lawName: bsgNumber ? await this.belex.getLawName(bsgNumber) : null,
      uploadedAt: doc.createTime ? formatUploadTime(doc.createTime) : null,
      sizeBytes,
      size: formatSize(sizeBytes),
      ownUpload: isOwnUpload(doc),
    };
  }
}
