import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_BELEX_API_BASE_URL, lawUrl } from './bsg';
import type { TextOfLawResponse } from './belex.types';

type CacheEntry = {
  value: Promise<string | null>;
  expiresAt: number;
};

@Injectable()
export class BelexService {
  private readonly logger = new Logger(BelexService.name);
  private readonly cache = new Map<string, CacheEntry>();
  private readonly baseUrl: string;
  private readonly ttlMs: number;
  private readonly timeoutMs: number;

  constructor(private readonly config: ConfigService) {
    this.baseUrl =
      this.config.get<string>('BELEX_API_BASE_URL') ??
      DEFAULT_BELEX_API_BASE_URL;
    this.ttlMs = Number(this.config.get('LAW_TITLE_CACHE_TTL_MS') ?? 3_600_000);
    this.timeoutMs = Number(this.config.get('LAW_TITLE_TIMEOUT_MS') ?? 5000);
  }

  urlFor(bsgNumber: string): string {
    return lawUrl(bsgNumber, this.baseUrl);
  }

  /**
   * Official title of a law, "Titel (Abkürzung)" when an abbreviation exists.
   * Lookup failures yield null and are cached like any other answer. The
   * pending lookup is cached too, so concurrent callers share one request.
   */
  getLawName(bsgNumber: string): Promise<string | null> {
    const cached = this.cache.get(bsgNumber);
    if (cached && cached.expiresAt > Date.now()) return cached.value;

    const value = this.fetchLawName(bsgNumber);
    this.cache.set(bsgNumber, { value, expiresAt: Date.now() + this.ttlMs });
    return value;
  }

  private async fetchLawName(bsgNumber: string): Promise<string | null> {
    try {
      const res = await fetch(this.urlFor(bsgNumber), {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (res.status !== 200) {
        this.logger.debug(`BELEX ${bsgNumber}: Status ${res.status}`);
        return null;
      }

      const json = (await res.json()) as TextOfLawResponse;
      const title = json.text_of_law?.title ?? '';
      const abbreviation = json.text_of_law?.abbreviation ?? '';
      if (title && abbreviation) return `${title} (${abbreviation})`;
      return title || null;
    } catch (error) {
      this.logger.debug(`BELEX ${bsgNumber} nicht abrufbar: ${String(error)}`);
      return null;
    }
  }
}
