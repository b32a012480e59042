import { Body, Controller, Get, HttpCode, Post } from '@nestjs/common';
import { SearchService } from './search.service';
import { SearchDto } from './search.dto';
import { EXAMPLE_QUERIES } from './example-queries';
import type { SearchResult } from './search.types';

@Controller('search')
export class SearchController {
  constructor(private readonly searchService: SearchService) {}

  @Post()
  @HttpCode(200)
  async search(@Body() dto: SearchDto): Promise<SearchResult> {
    return this.searchService.search(dto.query, { sessionId: dto.sessionId });
  }

  @Get('examples')
  examples(): { examples: readonly string[] } {
    return { examples: EXAMPLE_QUERIES };
  }
}
