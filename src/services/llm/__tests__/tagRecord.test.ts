import { describe, expect, it } from 'vitest';
import { defaultTagRecord, mergeKeywords, repairTagRecord } from '../tagRecord';

describe('repairTagRecord', () => {
  it('fills French fallbacks for an empty answer', () => {
    expect(repairTagRecord({}, 'fr')).toEqual({
      title: 'Image sans titre',
      description: 'Aucune description disponible',
      comment: '',
      story: '',
      mainCategory: 'Non catégorisé',
      secondaryCategory: '',
      contentKeywords: ['image'],
      technicalCharacteristics: ['non spécifié'],
      keywords: ['image', 'non spécifié'],
    });
  });

  it('fills English fallbacks', () => {
    const record = repairTagRecord({ title: '   ', main_genre: '' }, 'en');
    expect(record.title).toBe('Untitled image');
    expect(record.description).toBe('No description available');
    expect(record.mainCategory).toBe('Uncategorized');
    expect(record.technicalCharacteristics).toEqual(['unspecified']);
  });

  it('splits comma-separated keyword strings and merges both lists', () => {
    const record = repairTagRecord(
      {
        title: 'Plage',
        description: 'Sable',
        content_keywords: 'mer, Soleil , plage',
        technical_characteristics: ['soleil', 'HDR'],
      },
      'fr'
    );
    expect(record.contentKeywords).toEqual(['mer', 'Soleil', 'plage']);
    expect(record.technicalCharacteristics).toEqual(['soleil', 'HDR']);
    expect(record.keywords).toEqual(['mer', 'Soleil', 'plage', 'HDR']);
  });

  it('replaces keyword fields that are not lists', () => {
    const record = repairTagRecord({ content_keywords: 42, technical_characteristics: {} }, 'en');
    expect(record.contentKeywords).toEqual(['image']);
    expect(record.technicalCharacteristics).toEqual(['unspecified']);
  });

  it('accepts a plain keywords list as content keywords', () => {
    expect(repairTagRecord({ keywords: ['quai', 'barque'] }, 'fr').contentKeywords).toEqual([
      'quai',
      'barque',
    ]);
  });
});

describe('defaultTagRecord', () => {
  it('carries the generation error', () => {
    const record = defaultTagRecord('en', 'quota exceeded');
    expect(record.title).toBe('Untitled image');
    expect(record.generationError).toBe('quota exceeded');
  });
});

describe('mergeKeywords', () => {
  it('keeps the first spelling of case-insensitive duplicates', () => {
    expect(mergeKeywords(['Mer', 'ciel'], ['mer', 'grand angle', 'Ciel'])).toEqual([
      'Mer',
      'ciel',
      'grand angle',
    ]);
  });
});
