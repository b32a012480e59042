import { extractBsgNumber, lawUrl, rechtsbuchOf } from './bsg';

describe('extractBsgNumber', () => {
  it.each([
    ['BSG 432.311', '432.311'],
    ['BSG432.210', '432.210'],
    ['BSG 153.01-1 Personalverordnung', '153.01-1'],
    ['Volksschulgesetz BSG 432.210.pdf', '432.210.'],
  ])('reads %p as %p', (title, expected) => {
    expect(extractBsgNumber(title)).toBe(expected);
  });

  it('returns null without a BSG reference', () => {
    expect(extractBsgNumber('Merkblatt Schulreisen.pdf')).toBeNull();
    expect(extractBsgNumber('BSG-Übersicht')).toBeNull();
  });
});

describe('lawUrl', () => {
  it('points at the BELEX text of law', () => {
    expect(lawUrl('432.210')).toBe(
      'https://www.belex.sites.be.ch/api/de/texts_of_law/432.210',
    );
  });

  it('accepts another base url', () => {
    expect(lawUrl('430.11', 'https://belex.test/laws')).toBe(
      'https://belex.test/laws/430.11',
    );
  });
});

describe('rechtsbuchOf', () => {
  it('takes the part before the first dot', () => {
    expect(rechtsbuchOf('430.11')).toBe('430');
    expect(rechtsbuchOf('153.01-1')).toBe('153');
    expect(rechtsbuchOf('432')).toBe('432');
  });
});
