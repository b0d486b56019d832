export const MAX_SLUG_LENGTH = 50;

/**
 * Turns a free-text title into a file-name stem such as `Rose-Mecanique`.
 *
 * Returns an empty string when nothing usable survives (e.g. a title made of
 * punctuation or non-Latin script); callers must substitute their own name.
 */
export function slug(title: string): string {
  const ascii = title
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\x00-\x7f]/g, '');

  const hyphenated = ascii
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');

  const titled = hyphenated
    .split('-')
    .filter(Boolean)
    .map((token) => token.charAt(0).toUpperCase() + token.slice(1))
    .join('-');

  return titled.slice(0, MAX_SLUG_LENGTH).replace(/-+$/, '');
}

/** Fallback stem used when `slug()` yields nothing. */
export function syntheticName(now: number = Date.now()): string {
  return `image_${Math.floor(now / 1000)}`;
}
