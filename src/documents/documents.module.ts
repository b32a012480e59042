import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { BelexModule } from '../belex/belex.module';
import { DocumentsService } from './documents.service';
import { DocumentsController } from './documents.controller';

@Module({
  imports: [GeminiModule, BelexModule],
  providers: [DocumentsService],
  controllers: [DocumentsController],
})
export class DocumentsModule {}
