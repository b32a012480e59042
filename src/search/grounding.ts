import type { GroundingChunk } from '../gemini/gemini.types';

export type GroupedSnippets = {
  title: string;
  snippets: string[];
};

const byCodePoint = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Groups the retrieved snippets of a File Search answer by source title.
 * Titles without any text are kept with an empty snippet list.
 */
export function collectSources(chunks: GroundingChunk[]): GroupedSnippets[] {
  const byTitle = new Map<string, string[]>();

  for (const chunk of chunks) {
    const context = chunk.retrievedContext;
    if (context?.title === undefined) continue;

    const snippets = byTitle.get(context.title) ?? [];
    if (context.text) snippets.push(context.text.trim());
    byTitle.set(context.title, snippets);
  }

  return [...byTitle.entries()]
    .sort(([a], [b]) => byCodePoint(a, b))
    .map(([title, snippets]) => ({ title, snippets }));
}
