import { ConfigService } from '@nestjs/config';
import { BelexService } from './belex.service';

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

describe('BelexService', () => {
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  const service = (config: Record<string, unknown> = {}) =>
    new BelexService(new ConfigService(config));

  it('combines title and abbreviation', async () => {
    fetchMock.mockResolvedValueOnce(
      json({ text_of_law: { title: 'Volksschulgesetz', abbreviation: 'VSG' } }),
    );

    await expect(service().getLawName('432.210')).resolves.toBe(
      'Volksschulgesetz (VSG)',
    );
    expect(String(fetchMock.mock.calls[0][0])).toBe(
      'https://www.belex.sites.be.ch/api/de/texts_of_law/432.210',
    );
  });

  it('falls back to the title alone', async () => {
    fetchMock.mockResolvedValueOnce(
      json({ text_of_law: { title: 'Personalgesetz', abbreviation: '' } }),
    );

    await expect(service().getLawName('153.01')).resolves.toBe(
      'Personalgesetz',
    );
  });

  it('returns null without a title', async () => {
    fetchMock.mockResolvedValueOnce(json({ text_of_law: {} }));

    await expect(service().getLawName('999.1')).resolves.toBeNull();
  });

  it('returns null on a non-200 answer', async () => {
    fetchMock.mockResolvedValueOnce(json({ error: 'not found' }, 404));

    await expect(service().getLawName('999.1')).resolves.toBeNull();
  });

  it('returns null when BELEX is unreachable', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(service().getLawName('432.210')).resolves.toBeNull();
  });

  it('caches answers per BSG number', async () => {
    fetchMock.mockResolvedValueOnce(
      json({ text_of_law: { title: 'Volksschulgesetz', abbreviation: 'VSG' } }),
    );
    const belex = service();

    await belex.getLawName('432.210');
    await expect(belex.getLawName('432.210')).resolves.toBe(
      'Volksschulgesetz (VSG)',
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('shares one request between concurrent lookups', async () => {
    fetchMock.mockResolvedValueOnce(
      json({ text_of_law: { title: 'Volksschulgesetz', abbreviation: 'VSG' } }),
    );
    const belex = service();

    await expect(
      Promise.all([belex.getLawName('432.210'), belex.getLawName('432.210')]),
    ).resolves.toEqual(['Volksschulgesetz (VSG)', 'Volksschulgesetz (VSG)']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('fetches again once the cache entry expired', async () => {
    fetchMock
      .mockResolvedValueOnce(json({ text_of_law: { title: 'Alt' } }))
      .mockResolvedValueOnce(json({ text_of_law: { title: 'Neu' } }));
    const belex = service({ LAW_TITLE_CACHE_TTL_MS: 0 });

    await expect(belex.getLawName('430.11')).resolves.toBe('Alt');
    await expect(belex.getLawName('430.11')).resolves.toBe('Neu');
  });

  it('builds urls from the configured base', () => {
    expect(
      service({ BELEX_API_BASE_URL: 'https://belex.test/laws' }).urlFor('430.11'),
    ).toBe('https://belex.test/laws/430.11');
  });
});
