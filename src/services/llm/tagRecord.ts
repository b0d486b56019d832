import type { Language } from '../../types/config';
import type { TagRecord } from '../../types/image';
import type { JsonObject } from './responseParser';

interface Fallbacks {
  title: string;
  description: string;
  mainCategory: string;
  contentKeyword: string;
  technicalCharacteristic: string;
}

export const FALLBACKS: Record<Language, Fallbacks> = {
  fr: {
    title: 'Image sans titre',
    description: 'Aucune description disponible',
    mainCategory: 'Non catégorisé',
    contentKeyword: 'image',
    technicalCharacteristic: 'non spécifié',
  },
  en: {
    title: 'Untitled image',
    description: 'No description available',
    mainCategory: 'Uncategorized',
    contentKeyword: 'image',
    technicalCharacteristic: 'unspecified',
  },
};

/**
 * Builds a complete TagRecord out of whatever the model returned. Title,
 * description and main category are never empty; both keyword lists hold at
 * least one entry.
 */
export function repairTagRecord(raw: JsonObject, language: Language): TagRecord {
  const fallback = FALLBACKS[language];

  const contentKeywords =
    toList(raw.content_keywords) ?? toList(raw.keywords) ?? [fallback.contentKeyword];
  const technicalCharacteristics = toList(raw.technical_characteristics) ?? [
    fallback.technicalCharacteristic,
  ];

  return {
    title: toText(raw.title) || fallback.title,
    description: toText(raw.description) || fallback.description,
    comment: toText(raw.comment),
    story: toText(raw.story),
    mainCategory: toText(raw.main_genre) || fallback.mainCategory,
    secondaryCategory: toText(raw.secondary_genre),
    contentKeywords,
    technicalCharacteristics,
    keywords: mergeKeywords(contentKeywords, technicalCharacteristics),
  };
}

export function defaultTagRecord(language: Language, generationError: string): TagRecord {
  return { ...repairTagRecord({}, language), generationError };
}

/** Case-insensitive de-duplication; the first spelling seen is kept. */
export function mergeKeywords(...lists: string[][]): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const keyword of lists.flat()) {
    const key = keyword.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(keyword);
  }
  return merged;
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return '';
}

/** Lists stay lists, comma-separated strings are split; anything else is missing. */
function toList(value: unknown): string[] | undefined {
  let items: string[];
  if (Array.isArray(value)) {
    items = value.map(toText);
  } else if (typeof value === 'string') {
    items = value.split(',').map((item) => item.trim());
  } else {
    return undefined;
  }
  const cleaned = items.filter(Boolean);
  return cleaned.length > 0 ? cleaned : undefined;
}
