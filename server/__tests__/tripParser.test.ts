import {
  KNOWN_CITIES,
  cityRules,
  durationRules,
  extractCity,
  extractDuration,
  parseTripQuery,
  suggestionLimit,
} from '../src/services/tripParser';

describe('parseTripQuery', () => {
  it.each([
    ['3 days in Melbourne', 'Melbourne', 3],
    ['going to Sydney for 5 days', 'Sydney', 5],
    ['weekend trip to Tokyo', 'Tokyo', 2],
    ['a week in Paris', 'Paris', 7],
    ['a month in Lisbon', 'Lisbon', 30],
    ['5-day trip to Cairo', 'Cairo', 5],
    ['Spend 1 week in Seoul', 'Seoul', 7],
  ])('parses "%s"', (query, city, durationDays) => {
    expect(parseTripQuery(query)).toEqual({ city, durationDays });
  });

  it('returns empty fields for an empty query', () => {
    expect(parseTripQuery('')).toEqual({ city: '', durationDays: null });
  });

  it('returns empty fields when nothing looks like a city or a length', () => {
    expect(parseTripQuery('somewhere warm please')).toEqual({ city: '', durationDays: null });
  });

  it('is repeatable for the same input', () => {
    const first = parseTripQuery('heading to Springfield for 4 days');
    const second = parseTripQuery('heading to Springfield for 4 days');
    expect(second).toEqual(first);
    expect(first).toEqual({ city: 'Springfield', durationDays: 4 });
  });
});

describe('city extraction', () => {
  it('every known city is found in any case and returned in canonical spelling', () => {
    for (const city of KNOWN_CITIES) {
      expect(extractCity(`trip to ${city.toUpperCase()} soon`)).toBe(city);
      expect(extractCity(`trip to ${city.toLowerCase()} soon`)).toBe(city);
    }
  });

  it('several known cities resolve to the first one in the reference list', () => {
    expect(extractCity('Paris and then Melbourne')).toBe('Melbourne');
  });

  it('known cities only match whole words', () => {
    expect(cityRules[0].extract('Roman holiday')).toBeNull();
    // Falls through to the capitalized-word guess.
    expect(extractCity('Roman holiday')).toBe('Roman');
  });

  it('treats accented letters as part of the word', () => {
    expect(cityRules[0].extract('Romeño festival')).toBeNull();
    expect(extractCity('Romeño festival')).toBe('Romeño');
    expect(parseTripQuery('Parisé trip')).toEqual({ city: 'Parisé', durationDays: null });
  });

  it('takes a one or two word name after a travel cue', () => {
    expect(extractCity('moving to Port Moresby starting June')).toBe('Port Moresby');
  });

  it('takes a name that precedes "for", "from" or "starting"', () => {
    expect(extractCity('Visit Gotham from Monday')).toBe('Visit Gotham');
  });

  it('a stoplisted cue match skips the second pattern and goes straight to the word scan', () => {
    const query = 'Holiday in Dec, Springfield for a week';
    expect(cityRules[1].extract(query)).toBeNull();
    expect(parseTripQuery(query)).toEqual({ city: 'Holiday', durationDays: 7 });
  });

  it('word scan strips punctuation and maps known cities to canonical spelling', () => {
    expect(extractCity('Par-is getaway')).toBe('Paris');
  });

  it('word scan skips capitalized words of three letters', () => {
    expect(extractCity('The Big Apple')).toBe('Apple');
  });

  it('the city list is frozen', () => {
    expect(Object.isFrozen(KNOWN_CITIES)).toBe(true);
  });
});

describe('duration extraction', () => {
  it('ignores day counts outside 1-365', () => {
    expect(parseTripQuery('400 days in Rome')).toEqual({ city: 'Rome', durationDays: null });
  });

  it('an out-of-range count falls through to the next numeric pattern', () => {
    expect(extractDuration('0 days, then a 4-day trip')).toBe(4);
  });

  it('reads day counts written in other decimal digits', () => {
    expect(extractDuration('３ days in Paris')).toBe(3);
    expect(parseTripQuery('٣ days in Cairo')).toEqual({ city: 'Cairo', durationDays: 3 });
    expect(extractDuration('for １２ days')).toBe(12);
  });

  it('weekend wins over week', () => {
    expect(extractDuration('a weekend in Rome')).toBe(2);
  });

  it('an unmatched week mention falls through to the month rule', () => {
    expect(extractDuration('two weeks off, then a month in Lisbon')).toBe(30);
  });

  it('week and month need a single unit', () => {
    expect(extractDuration('two weeks in Rome')).toBeNull();
    expect(extractDuration('months in Rome')).toBeNull();
  });
});

describe('rule order', () => {
  it('rules run in a fixed order', () => {
    expect(cityRules.map((r) => r.name)).toEqual(['known-city', 'contextual', 'capitalized-word']);
    expect(durationRules.map((r) => r.name)).toEqual(['day-count', 'weekend', 'week', 'month']);
  });
});

describe('suggestionLimit', () => {
  it.each([
    [1, 2],
    [3, 6],
    [5, 10],
    [null, 10],
  ])('duration %p asks for %p suggestions', (days, limit) => {
    expect(suggestionLimit(days)).toBe(limit);
  });
});
