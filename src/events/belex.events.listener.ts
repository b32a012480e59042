import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  BELEX_EVENTS,
  type DocumentDeletedEvent,
  type DocumentUploadedEvent,
  type SearchCompletedEvent,
} from './belex.events';

@Injectable()
export class BelexEventsListener {
  private readonly logger = new Logger('BelexEventsListener');

  @OnEvent(BELEX_EVENTS.SEARCH_COMPLETED)
  onSearchCompleted(event: SearchCompletedEvent) {
    this.logger.log(
      `[search.completed] query="${event.query.slice(0, 60)}${event.query.length > 60 ? '…' : ''}" answer=${event.answerLength} chars sources=${event.sourceCount}${event.customPrompt ? ' (custom prompt)' : ''}`,
    );
  }

  @OnEvent(BELEX_EVENTS.DOCUMENT_UPLOADED)
  onDocumentUploaded(event: DocumentUploadedEvent) {
    this.logger.log(
      `[document.uploaded] "${event.displayName}" ${event.sizeBytes} bytes${event.operationName ? ` op=${event.operationName}` : ''}`,
    );
  }

  @OnEvent(BELEX_EVENTS.DOCUMENT_DELETED)
  onDocumentDeleted(event: DocumentDeletedEvent) {
    this.logger.log(`[document.deleted] ${event.documentName}`);
  }
}
