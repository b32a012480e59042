import type { SearchResult } from '../search/search.types';

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

export function formatSearchResult(result: SearchResult): string {
  const lines: string[] = [];

  if (result.answer) {
    lines.push('Antwort:', THIN_RULE, result.answer, '', RULE);
  } else {
    lines.push('Keine Antwort generiert');
  }

  if (result.sources.length > 0) {
    lines.push('', 'Quellen:', THIN_RULE);
    result.sources.forEach((source, i) => {
      lines.push('', `${i + 1}. ${source.lawName ?? source.title}`);
      if (source.url) lines.push(`   URL: ${source.url}`);
      // first snippet as preview
      if (source.snippets.length > 0) lines.push(`   "${source.snippets[0]}"`);
    });
    lines.push('', RULE);
  }

  return lines.join('\n');
}

const EXIT_COMMANDS = new Set(['quit', 'exit', 'q']);

export function isExitCommand(input: string): boolean {
  return EXIT_COMMANDS.has(input.trim().toLowerCase());
}
