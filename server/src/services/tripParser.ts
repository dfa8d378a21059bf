import knownCityData from '../data/cities.json';

export type ParsedTripQuery = {
  city: string;
  durationDays: number | null;
};

/**
 * A single extraction heuristic. `extract` returns null when the rule does not
 * apply so the next rule in the list gets a turn.
 */
export interface ExtractionRule<T> {
  name: string;
  extract: (query: string) => T | null;
}

export const KNOWN_CITIES: readonly string[] = Object.freeze([...knownCityData]);

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const knownCityPatterns = KNOWN_CITIES.map((city) => ({
  city,
  pattern: new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(city.toLowerCase())}(?![\\p{L}\\p{N}_])`, 'u'),
}));

const findKnownCity = (word: string): string | null => {
  const lower = word.toLowerCase();
  return KNOWN_CITIES.find((city) => city.toLowerCase() === lower) ?? null;
};

const CONTEXT_PATTERNS = [
  /\b(?:in|to|visiting|going to|traveling to)\s+([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)/,
  /\b([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)\s+(?:for|from|starting)/,
];

const NOT_A_CITY = new Set([
  'nov', 'dec', 'jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct',
  'the', 'and', 'for', 'with', 'from',
]);

const knownCityRule: ExtractionRule<string> = {
  name: 'known-city',
  extract: (query) => {
    const lower = query.toLowerCase();
    return knownCityPatterns.find(({ pattern }) => pattern.test(lower))?.city ?? null;
  },
};

// Only the first pattern that matches is considered. A stoplisted capture ends
// this rule without trying the later patterns.
const contextualRule: ExtractionRule<string> = {
  name: 'contextual',
  extract: (query) => {
    for (const pattern of CONTEXT_PATTERNS) {
      const match = query.match(pattern);
      if (!match) continue;
      const candidate = match[1];
      return NOT_A_CITY.has(candidate.toLowerCase()) ? null : candidate;
    }
    return null;
  },
};

// Best guess: the first capitalized word that looks long enough to be a name.
const capitalizedWordRule: ExtractionRule<string> = {
  name: 'capitalized-word',
  extract: (query) => {
    for (const word of query.split(/\s+/)) {
      const cleaned = word.replace(/[^\p{L}\p{N}_\s]/gu, '');
      const length = [...cleaned].length;
      if (!/^\p{Lu}/u.test(cleaned) || length <= 2) continue;
      const known = findKnownCity(cleaned);
      if (known) return known;
      if (length > 3) return cleaned;
    }
    return null;
  },
};

export const cityRules: readonly ExtractionRule<string>[] = [knownCityRule, contextualRule, capitalizedWordRule];

const MIN_DAYS = 1;
const MAX_DAYS = 365;

const DAY_COUNT_PATTERNS = [
  /for\s+(\p{Nd}+)\s+days?/u,
  /(\p{Nd}+)\s+days?/u,
  /(\p{Nd}+)-day/u,
  /(\p{Nd}+)\s+day\s+trip/u,
];

const DECIMAL_DIGIT = /^\p{Nd}$/u;

// Every Unicode decimal digit block runs 0-9 in code point order, so the
// distance from the start of the run is the digit's value.
const digitValue = (char: string): number => {
  let codePoint = char.codePointAt(0) ?? 0;
  let offset = 0;
  while (DECIMAL_DIGIT.test(String.fromCodePoint(codePoint - 1))) {
    codePoint -= 1;
    offset += 1;
  }
  return offset % 10;
};

const parseDigits = (digits: string): number =>
  [...digits].reduce((total, char) => total * 10 + digitValue(char), 0);

const dayCountRule: ExtractionRule<number> = {
  name: 'day-count',
  extract: (query) => {
    for (const pattern of DAY_COUNT_PATTERNS) {
      const match = query.match(pattern);
      if (!match) continue;
      const days = parseDigits(match[1]);
      if (days >= MIN_DAYS && days <= MAX_DAYS) return days;
    }
    return null;
  },
};

// Must run before the week rule so a weekend is never read as seven days.
const weekendRule: ExtractionRule<number> = {
  name: 'weekend',
  extract: (query) => (query.includes('weekend') ? 2 : null),
};

const weekRule: ExtractionRule<number> = {
  name: 'week',
  extract: (query) => {
    if (!query.includes('week') || query.includes('weekend')) return null;
    return /(?:a|one|1)\s+week/.test(query) ? 7 : null;
  },
};

const monthRule: ExtractionRule<number> = {
  name: 'month',
  extract: (query) => {
    if (!query.includes('month')) return null;
    return /(?:a|one|1)\s+month/.test(query) ? 30 : null;
  },
};

// Duration rules expect a lower-cased query.
export const durationRules: readonly ExtractionRule<number>[] = [dayCountRule, weekendRule, weekRule, monthRule];

const firstMatch = <T>(rules: readonly ExtractionRule<T>[], query: string): T | null => {
  for (const rule of rules) {
    const value = rule.extract(query);
    if (value !== null) return value;
  }
  return null;
};

export const extractCity = (query: string): string => firstMatch(cityRules, query) ?? '';

export const extractDuration = (query: string): number | null => firstMatch(durationRules, query.toLowerCase());

/**
 * Pulls a destination city and a trip length out of a free-text request such as
 * "3 days in Melbourne". Never throws: an empty city and a null duration mean
 * nothing was found.
 */
export const parseTripQuery = (query: string): ParsedTripQuery => ({
  city: extractCity(query),
  durationDays: extractDuration(query),
});

export const DEFAULT_LOOKUP_DAYS = 3;
export const DEFAULT_SUGGESTION_LIMIT = 10;

// Two suggestions per day when the length is known.
export const suggestionLimit = (durationDays: number | null): number =>
  durationDays ? durationDays * 2 : DEFAULT_SUGGESTION_LIMIT;
