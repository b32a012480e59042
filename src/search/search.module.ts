import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { BelexModule } from '../belex/belex.module';
import { PromptModule } from '../prompt/prompt.module';
import { SearchService } from './search.service';
import { SearchController } from './search.controller';

@Module({
  imports: [GeminiModule, BelexModule, PromptModule],
  providers: [SearchService],
  controllers: [SearchController],
  exports: [SearchService],
})
export class SearchModule {}
