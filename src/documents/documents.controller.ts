import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Post,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { diskStorage } from 'multer';
import { DocumentsService } from './documents.service';
import { ListDocumentsQueryDto, UploadDocumentDto } from './documents.dto';
import { MAX_UPLOAD_BYTES, isAllowedUpload } from './documents.utils';
import type {
  DatedDocumentsView,
  DocumentView,
  DuplicateReport,
  GroupedDocumentsView,
  UploadResponse,
} from './documents.types';

@Controller('documents')
export class DocumentsController {
  constructor(private readonly documents: DocumentsService) {}

  @Get()
  async list(
    @Query() query: ListDocumentsQueryDto,
  ): Promise<GroupedDocumentsView | DatedDocumentsView> {
    return query.sort === 'date'
      ? this.documents.listByUploadDate()
      : this.documents.listByRechtsbuch();
  }

  @Get('duplicates')
  async duplicates(): Promise<DuplicateReport> {
    return this.documents.duplicates();
  }

  @Get('own')
  async own(): Promise<DocumentView[]> {
    return this.documents.ownUploads();
  }

  @Post()
  @UseInterceptors(
    FileInterceptor('file', {
      storage: diskStorage({
        destination: './uploads',
        filename: (_req, file, cb) =>
          cb(null, `${Date.now()}-${file.originalname}`),
      }),
      limits: { fileSize: MAX_UPLOAD_BYTES },
      fileFilter: (_req, file, cb) => {
        if (isAllowedUpload(file.originalname)) {
          cb(null, true);
        } else {
          cb(
            new BadRequestException(
              `Dateityp nicht unterstützt: ${file.originalname}`,
            ),
            false,
          );
        }
      },
    }),
  )
  async upload(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: UploadDocumentDto,
  ): Promise<UploadResponse> {
    if (!file) throw new BadRequestException('Keine Datei übermittelt');
    return this.documents.upload(file, dto.displayName);
  }

  @Delete(':id')
  async remove(@Param('id') id: string): Promise<{ deleted: string }> {
    return this.documents.delete(id);
  }
}
