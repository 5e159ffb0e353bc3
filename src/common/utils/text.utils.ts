const SKILL_TOKEN_REGEX = /[a-z0-9+#.\-]+/g;

export const countWords = (value: string): number =>
  value.split(/\s+/).filter((word) => word.length > 0).length;

/**
 * Lowercased, punctuation-normalized tokens used for taxonomy lookups.
 * Keeps `+`, `#`, inner dots and hyphens so `c++`, `c#`, `node.js` and
 * `scikit-learn` survive; trailing dots and dashes are dropped.
 */
export const tokenizeForSkills = (value: string): string[] =>
  (value.toLowerCase().match(SKILL_TOKEN_REGEX) ?? [])
    .map((token) => token.replace(/[.\-]+$/, '').replace(/^-+/, ''))
    .filter((token) => token.length > 0);

export const skillKey = (value: string): string =>
  tokenizeForSkills(value).join(' ');

export const FUZZY_MIN_LENGTH = 4;

// Separator-insensitive form used for fuzzy taxonomy matches
export const compactKey = (value: string): string =>
  value.replace(/[\s.\-]+/g, '');

export const normalizeHeading = (value: string): string =>
  value
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[^a-z0-9\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
