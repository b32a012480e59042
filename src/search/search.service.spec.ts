import { BadRequestException } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test } from '@nestjs/testing';
import { BelexService } from '../belex/belex.service';
import { GeminiService } from '../gemini/gemini.service';
import { DEFAULT_SYSTEM_PROMPT } from '../prompt/default-system-prompt';
import { PromptService } from '../prompt/prompt.service';
import { BELEX_EVENTS } from '../events/belex.events';
import { SearchService } from './search.service';

describe('SearchService', () => {
  let service: SearchService;
  let prompts: PromptService;
  const gemini = { searchFileStore: jest.fn() };
  const belex = {
    urlFor: jest.fn((bsg: string) => `https://belex.test/${bsg}`),
    getLawName: jest.fn(),
  };
  const eventEmitter = { emit: jest.fn() };

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [
        SearchService,
        PromptService,
        { provide: GeminiService, useValue: gemini },
        { provide: BelexService, useValue: belex },
        { provide: EventEmitter2, useValue: eventEmitter },
      ],
    }).compile();

    service = moduleRef.get(SearchService);
    prompts = moduleRef.get(PromptService);
  });

  it('rejects an empty question', async () => {
    await expect(service.search('   ')).rejects.toBeInstanceOf(
      BadRequestException,
    );
    expect(gemini.searchFileStore).not.toHaveBeenCalled();
  });

  it('returns the answer with grouped, resolved sources', async () => {
    gemini.searchFileStore.mockResolvedValueOnce({
      text: 'Die Schulpflicht dauert elf Jahre.',
      groundingChunks: [
        {
          retrievedContext: {
            title: 'BSG 432.210 Volksschulgesetz.pdf',
            text: ' Art. 1 Zweck ',
          },
        },
        { retrievedContext: { title: 'Merkblatt Schulreisen', text: 'Reisen' } },
        {
          retrievedContext: {
            title: 'BSG 432.210 Volksschulgesetz.pdf',
            text: 'Art. 2',
          },
        },
        { retrievedContext: { title: 'Merkblatt Schulreisen' } },
      ],
    });
    belex.getLawName.mockResolvedValueOnce('Volksschulgesetz (VSG)');

    const result = await service.search('  Wie lange dauert die Schulpflicht? ');

    expect(result).toEqual({
      query: 'Wie lange dauert die Schulpflicht?',
      answer: 'Die Schulpflicht dauert elf Jahre.',
      sources: [
        {
          title: 'BSG 432.210 Volksschulgesetz.pdf',
          bsgNumber: '432.210',
          url: 'https://belex.test/432.210',
          lawName: 'Volksschulgesetz (VSG)',
          snippets: ['Art. 1 Zweck', 'Art. 2'],
        },
        {
          title: 'Merkblatt Schulreisen',
          bsgNumber: null,
          url: null,
          lawName: null,
          snippets: ['Reisen'],
        },
      ],
    });
    expect(belex.getLawName).toHaveBeenCalledWith('432.210');
  });

  it('uses the default system prompt without a session', async () => {
    gemini.searchFileStore.mockResolvedValueOnce({
      text: 'Antwort',
      groundingChunks: [],
    });

    await service.search('Frage');

    expect(gemini.searchFileStore).toHaveBeenCalledWith('Frage', {
      systemInstruction: DEFAULT_SYSTEM_PROMPT,
    });
    expect(eventEmitter.emit).toHaveBeenCalledWith(
      BELEX_EVENTS.SEARCH_COMPLETED,
      {
        query: 'Frage',
        answerLength: 7,
        sourceCount: 0,
        customPrompt: false,
      },
    );
  });

  it("uses the session's custom prompt", async () => {
    prompts.apply('session-1', 'Antworte in einem Satz.');
    gemini.searchFileStore.mockResolvedValueOnce({
      text: 'Ja.',
      groundingChunks: [],
    });

    await service.search('Frage', { sessionId: 'session-1' });

    expect(gemini.searchFileStore).toHaveBeenCalledWith('Frage', {
      systemInstruction: 'Antworte in einem Satz.',
    });
    expect(eventEmitter.emit).toHaveBeenCalledWith(
      BELEX_EVENTS.SEARCH_COMPLETED,
      expect.objectContaining({ customPrompt: true }),
    );
  });

  it('runs a plain query without law name lookups', async () => {
    gemini.searchFileStore.mockResolvedValueOnce({
      text: 'Antwort',
      groundingChunks: [{ retrievedContext: { title: 'BSG 153.01', text: 'x' } }],
    });

    const result = await service.search('Frage', { plain: true, lawNames: false });

    expect(gemini.searchFileStore).toHaveBeenCalledWith('Frage', {});
    expect(belex.getLawName).not.toHaveBeenCalled();
    expect(result.sources[0]).toEqual({
      title: 'BSG 153.01',
      bsgNumber: '153.01',
      url: 'https://belex.test/153.01',
      lawName: null,
      snippets: ['x'],
    });
  });

  it('reports a missing answer as null', async () => {
    gemini.searchFileStore.mockResolvedValueOnce({
      text: undefined,
      groundingChunks: [],
    });

    await expect(service.search('Frage')).resolves.toEqual({
      query: 'Frage',
      answer: null,
      sources: [],
    });
  });
});
