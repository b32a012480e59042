#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { createInterface } from 'node:readline';
import { SearchService } from '../search/search.service';
import { CliModule } from './cli.module';
import { formatSearchResult, isExitCommand } from './search.formatter';

const logger = new Logger('belex-search');
const RULE = '='.repeat(80);

async function runSearch(search: SearchService, query: string): Promise<void> {
  console.log(`\nSuche nach: '${query}'\n`);
  console.log(RULE);
  try {
    const result = await search.search(query, { plain: true, lawNames: false });
    console.log(formatSearchResult(result));
  } catch (error) {
    logger.error(
      `Suche fehlgeschlagen: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

async function interactive(search: SearchService): Promise<void> {
  console.log(RULE);
  console.log('BELEX Suche - Interaktiver Modus');
  console.log(RULE);
  console.log("\nFragen eingeben (oder 'quit' zum Beenden)\n");

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.on('SIGINT', () => rl.close());
  rl.setPrompt('Suche: ');
  rl.prompt();

  for await (const line of rl) {
    const query = line.trim();
    if (!query) {
      rl.prompt();
      continue;
    }
    if (isExitCommand(query)) break;

    await runSearch(search, query);
    console.log('\n');
    rl.prompt();
  }

  rl.close();
  console.log('\nAuf Wiedersehen!');
}

async function main(): Promise<void> {
  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: ['error', 'warn'],
    abortOnError: false,
  });
  const search = app.get(SearchService);

  const args = process.argv.slice(2);
  if (args.length > 0) {
    await runSearch(search, args.join(' '));
  } else {
    await interactive(search);
  }
  await app.close();
}

main().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
