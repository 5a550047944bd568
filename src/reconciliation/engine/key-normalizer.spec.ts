import { normalizeKey } from './key-normalizer';

describe('normalizeKey', () => {
  it('trims surrounding whitespace and upper-cases', () => {
    expect(normalizeKey('  abc-1\t')).toBe('ABC-1');
  });

  it('treats differently spelled identifiers as the same product', () => {
    expect(normalizeKey('Sku-42 ')).toBe(normalizeKey(' SKU-42'));
  });

  it('keeps inner whitespace and punctuation', () => {
    expect(normalizeKey(' red shirt / m ')).toBe('RED SHIRT / M');
  });

  it('upper-cases without locale rules', () => {
    expect(normalizeKey('istanbul')).toBe('ISTANBUL');
  });

  it('is idempotent', () => {
    const samples = ['abc-1', '  Mixed Case  ', '00123', 'straße', 'ÄÖÜ-x', '', '   '];

    samples.forEach((sample) => {
      const once = normalizeKey(sample);
      expect(normalizeKey(once)).toBe(once);
    });
  });
});
