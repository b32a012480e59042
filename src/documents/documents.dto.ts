import { IsIn, IsOptional, IsString, MaxLength } from 'class-validator';
import type { DocumentSort } from './documents.types';

export class ListDocumentsQueryDto {
  @IsOptional()
  @IsIn(['rechtsbuch', 'date'])
  sort?: DocumentSort;
}

export class UploadDocumentDto {
  @IsOptional()
  @IsString()
  @MaxLength(512)
  displayName?: string;
}
