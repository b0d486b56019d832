import { describe, expect, it } from 'vitest';
import { MAX_SLUG_LENGTH, slug, syntheticName } from '../slug';

describe('slug', () => {
  it('strips accents and title-cases hyphenated tokens', () => {
    expect(slug('Rose mécanique')).toBe('Rose-Mecanique');
    expect(slug('  Sunset over the sea!  ')).toBe('Sunset-Over-The-Sea');
  });

  it('drops characters outside ASCII', () => {
    expect(slug('L’été à Paris')).toBe('Lete-A-Paris');
  });

  it('returns an empty string when nothing usable remains', () => {
    expect(slug('!!!')).toBe('');
    expect(slug('東京タワー')).toBe('');
  });

  it('is bounded and never ends with a hyphen', () => {
    expect(slug('a'.repeat(80))).toHaveLength(MAX_SLUG_LENGTH);
    const cut = slug(`${'x'.repeat(49)} yz`);
    expect(cut).toBe(`X${'x'.repeat(48)}`);
  });

  it('is deterministic', () => {
    const title = 'Ciel d’orage sur la plaine';
    expect(slug(title)).toBe(slug(title));
    expect(slug(title)).toBe('Ciel-Dorage-Sur-La-Plaine');
  });
});

describe('syntheticName', () => {
  it('uses unix seconds', () => {
    expect(syntheticName(1_700_000_000_999)).toBe('image_1700000000');
  });
});
