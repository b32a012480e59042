export interface SearchSource {
  title: string;
  bsgNumber: string | null;
  url: string | null;
  lawName: string | null;
  snippets: string[];
}

export interface SearchResult {
  query: string;
  answer: string | null;
  sources: SearchSource[];
}

export interface SearchOptions {
  sessionId?: string;
  /** Skip the system instruction entirely (plain File Search query). */
  plain?: boolean;
  /** Resolve official law titles via BELEX (default true). */
  lawNames?: boolean;
}
