import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { GeminiService } from '../gemini/gemini.service';
import { BelexService } from '../belex/belex.service';
import { extractBsgNumber } from '../belex/bsg';
import { PromptService } from '../prompt/prompt.service';
import { collectSources, type GroupedSnippets } from './grounding';
import type { SearchOptions, SearchResult, SearchSource } from './search.types';
import {
  BELEX_EVENTS,
  type SearchCompletedEvent,
} from '../events/belex.events';

@Injectable()
export class SearchService {
  private readonly logger = new Logger(SearchService.name);

  constructor(
    private readonly gemini: GeminiService,
    private readonly belex: BelexService,
    private readonly prompts: PromptService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult> {
    const q = query.trim();
    if (!q) throw new BadRequestException('Bitte geben Sie eine Rechtsfrage ein');

    const active = options.plain
      ? undefined
      : this.prompts.getActive(options.sessionId);

    this.logger.debug(`Suche: "${q.slice(0, 60)}"`);
    const response = await this.gemini.searchFileStore(
      q,
      active ? { systemInstruction: active.prompt } : {},
    );

    const grouped = collectSources(response.groundingChunks);
    const sources = await Promise.all(
      grouped.map((g) => this.toSource(g, options.lawNames ?? true)),
    );
    const answer = response.text ? response.text : null;

    this.eventEmitter.emit(BELEX_EVENTS.SEARCH_COMPLETED, {
      query: q,
      answerLength: answer?.length ?? 0,
      sourceCount: sources.length,
      customPrompt: active?.custom ?? false,
    } satisfies SearchCompletedEvent);

    return { query: q, answer, sources };
  }

  private async toSource(
    { title, snippets }: GroupedSnippets,
    resolveLawName: boolean,
  ): Promise<SearchSource> {
    const bsgNumber = extractBsgNumber(title);
    if (!bsgNumber) {
      return { title, bsgNumber: null, url: null, lawName: null, snippets };
    }

    return {
      title,
      bsgNumber,
      url: this.belex.urlFor(bsgNumber),
      lawName: resolveLawName ? await this.belex.getLawName(bsgNumber) : null,
      snippets,
    };
  }
}
