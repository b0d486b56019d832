import { describe, expect, it } from 'vitest';
import { buildXmpPacket, escapeXml, parseXmpPacket } from '../xmp';

describe('xmp', () => {
  it('escapes markup and drops characters XML cannot hold', () => {
    expect(escapeXml(`Fish & "Chips" <deluxe> l'été\u0007`)).toBe(
      'Fish &amp; &quot;Chips&quot; &lt;deluxe&gt; l&apos;été'
    );
  });

  it('reads back every field it writes', () => {
    const packet = buildXmpPacket({
      title: 'Fish & Chips <deluxe>',
      headline: 'Fish & Chips <deluxe>',
      description: 'Line one\n\nLine two',
      keywords: ['food', 'café'],
      category: 'Cuisine',
      supplementalCategories: ['Street food'],
      instructions: 'A short story.',
    });

    expect(packet).toContain('<rdf:li xml:lang="x-default">Fish &amp; Chips &lt;deluxe&gt;</rdf:li>');
    expect(parseXmpPacket(packet)).toEqual({
      title: 'Fish & Chips <deluxe>',
      headline: 'Fish & Chips <deluxe>',
      description: 'Line one\n\nLine two',
      keywords: ['food', 'café'],
      category: 'Cuisine',
      supplementalCategories: ['Street food'],
      instructions: 'A short story.',
    });
  });

  it('leaves out optional properties that are empty', () => {
    const packet = buildXmpPacket({ title: 'T', description: 'D', keywords: [] });
    expect(packet).not.toContain('dc:subject');
    expect(packet).not.toContain('photoshop:Instructions');
    expect(parseXmpPacket(packet)).toEqual({
      title: 'T',
      headline: undefined,
      description: 'D',
      keywords: [],
      category: undefined,
      supplementalCategories: [],
      instructions: undefined,
    });
  });

  it('understands the attribute shorthand of other writers', () => {
    const packet =
      '<x:xmpmeta xmlns:x="adobe:ns:meta/"><rdf:RDF><rdf:Description rdf:about="" dc:title="Quai &amp; phare" dc:description="Nuit"/></rdf:RDF></x:xmpmeta>';
    const parsed = parseXmpPacket(packet);
    expect(parsed.title).toBe('Quai & phare');
    expect(parsed.description).toBe('Nuit');
    expect(parsed.keywords).toEqual([]);
  });
});
