import { RequestInit, Response } from 'node-fetch';
import { PoiProviderError } from '../src/errors';
import { logWarn } from '../src/logger';
import { FoursquareProvider, PoiProvider, SuggestionRequest, YelpProvider } from '../src/services/poiProviders';
import { PoiService } from '../src/services/poiService';
import { ActivitySuggestion } from '../src/types';

jest.mock('../src/logger', () => ({ logWarn: jest.fn(), logError: jest.fn() }));

const respond = (body: string, status = 200) =>
  jest.fn<Promise<Response>, [string, RequestInit?]>(async () => new Response(body, { status }));

const suggestion = (name: string): ActivitySuggestion => ({
  name,
  category: null,
  rating: null,
  address: null,
  phone: null,
  url: null,
  image_url: null,
  price: null,
});

class FakeProvider implements PoiProvider {
  readonly calls: SuggestionRequest[] = [];

  constructor(
    readonly name: string,
    private readonly outcome: ActivitySuggestion[] | Error,
    private readonly configured = true
  ) {}

  isConfigured(): boolean {
    return this.configured;
  }

  async search(request: SuggestionRequest): Promise<ActivitySuggestion[]> {
    this.calls.push(request);
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

const request = (limit: number): SuggestionRequest => ({ city: 'Sydney', durationDays: 3, limit });

describe('YelpProvider', () => {
  it('maps businesses and skips unnamed ones', async () => {
    const fetchImpl = respond(
      JSON.stringify({
        businesses: [
          {
            name: 'Harbour Walk',
            categories: [{ title: 'Parks' }, { title: 'Tours' }],
            rating: 4.5,
            location: { display_address: ['1 Quay St', 'Sydney NSW 2000'] },
            display_phone: '+61 2 0000 0000',
            url: 'https://example.com/harbour',
            image_url: '',
            price: '$$',
          },
          { categories: [] },
        ],
      })
    );
    const provider = new YelpProvider({ apiKey: 'test-secret', fetchImpl });

    const results = await provider.search(request(6));

    expect(results).toEqual([
      {
        name: 'Harbour Walk',
        category: 'Parks',
        rating: 4.5,
        address: '1 Quay St, Sydney NSW 2000',
        phone: '+61 2 0000 0000',
        url: 'https://example.com/harbour',
        image_url: null,
        price: '$$',
      },
    ]);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://api.yelp.com/v3/businesses/search?location=Sydney&limit=6');
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-secret', Accept: 'application/json' });
  });

  it('tolerates fields of the wrong shape', async () => {
    const fetchImpl = respond(
      JSON.stringify({
        businesses: [
          {
            name: 'Circular Quay',
            categories: 'Landmarks',
            rating: '4.5',
            location: { display_address: 'Alfred St, Sydney' },
            display_phone: 42,
          },
          'not a business',
          { name: '   ' },
        ],
      })
    );
    const provider = new YelpProvider({ apiKey: 'test-secret', fetchImpl });

    await expect(provider.search(request(5))).resolves.toEqual([
      {
        name: 'Circular Quay',
        category: null,
        rating: null,
        address: 'Alfred St, Sydney',
        phone: null,
        url: null,
        image_url: null,
        price: null,
      },
    ]);
  });

  it('returns nothing when the payload has no business list', async () => {
    const provider = new YelpProvider({ apiKey: 'test-secret', fetchImpl: respond(JSON.stringify({ businesses: 'none' })) });

    await expect(provider.search(request(5))).resolves.toEqual([]);
  });

  it('caps the page size at 50', async () => {
    const fetchImpl = respond(JSON.stringify({ businesses: [] }));
    const provider = new YelpProvider({ apiKey: 'test-secret', fetchImpl });

    await expect(provider.search({ city: 'New York', durationDays: 40, limit: 80 })).resolves.toEqual([]);
    expect(fetchImpl.mock.calls[0][0]).toBe('https://api.yelp.com/v3/businesses/search?location=New+York&limit=50');
  });

  it('reports a non-success status with the response text', async () => {
    const fetchImpl = respond('{"error":"bad key"}', 401);
    const provider = new YelpProvider({ apiKey: 'test-secret', fetchImpl });

    await expect(provider.search(request(4))).rejects.toMatchObject({
      name: 'PoiProviderError',
      message: 'yelp request failed with status 401: {"error":"bad key"}',
      provider: 'yelp',
      statusCode: 401,
    });
  });

  it('refuses to call out without an API key', async () => {
    const fetchImpl = respond('{}');
    const provider = new YelpProvider({ apiKey: '   ', fetchImpl });

    expect(provider.isConfigured()).toBe(false);
    await expect(provider.search(request(4))).rejects.toThrow('yelp API key is not configured');
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe('FoursquareProvider', () => {
  it('maps places onto the shared suggestion shape', async () => {
    const fetchImpl = respond(
      JSON.stringify({
        results: [
          {
            name: 'Old Town Market',
            categories: [{ name: 'Market' }],
            location: { formatted_address: '2 Main St' },
            rating: 9,
            price: 2,
            photos: [{ prefix: 'https://img.example.com/p/', suffix: '/m.jpg' }],
          },
        ],
      })
    );
    const provider = new FoursquareProvider({ apiKey: 'test-secret', fetchImpl });

    const results = await provider.search({ city: 'Lisbon', durationDays: 2, limit: 4 });

    expect(results).toEqual([
      {
        name: 'Old Town Market',
        category: 'Market',
        rating: 4.5,
        address: '2 Main St',
        phone: null,
        url: null,
        image_url: 'https://img.example.com/p/original/m.jpg',
        price: '$$',
      },
    ]);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url.startsWith('https://api.foursquare.com/v3/places/search?near=Lisbon&limit=4&fields=')).toBe(true);
    expect(init?.headers).toEqual({ Authorization: 'test-secret', Accept: 'application/json' });
  });

  it('wraps transport failures', async () => {
    const fetchImpl = jest.fn<Promise<Response>, [string, RequestInit?]>(async () => {
      throw new Error('socket hang up');
    });
    const provider = new FoursquareProvider({ apiKey: 'test-secret', fetchImpl });

    await expect(provider.search(request(4))).rejects.toThrow('foursquare request failed: socket hang up');
  });
});

describe('PoiService.getActivitiesMultiProvider', () => {
  beforeEach(() => {
    jest.mocked(logWarn).mockClear();
  });

  it('fills the remaining slots from the next provider and drops duplicate names', async () => {
    const yelp = new FakeProvider('yelp', [suggestion('Harbour Walk'), suggestion('Opera House')]);
    const foursquare = new FakeProvider('foursquare', [suggestion(' harbour walk '), suggestion('Botanic Garden')]);
    const service = new PoiService([yelp, foursquare]);

    const results = await service.getActivitiesMultiProvider(request(3));

    expect(results.map((a) => a.name)).toEqual(['Harbour Walk', 'Opera House', 'Botanic Garden']);
    expect(yelp.calls[0].limit).toBe(3);
    expect(foursquare.calls[0].limit).toBe(1);
  });

  it('stops once the limit is reached', async () => {
    const yelp = new FakeProvider('yelp', [suggestion('A1'), suggestion('A2'), suggestion('A3')]);
    const foursquare = new FakeProvider('foursquare', [suggestion('B1')]);
    const service = new PoiService([yelp, foursquare]);

    const results = await service.getActivitiesMultiProvider(request(2));

    expect(results.map((a) => a.name)).toEqual(['A1', 'A2']);
    expect(foursquare.calls).toHaveLength(0);
  });

  it('follows the configured order and skips unconfigured providers', async () => {
    const yelp = new FakeProvider('yelp', [suggestion('From Yelp')]);
    const foursquare = new FakeProvider('foursquare', [suggestion('From Foursquare')]);
    const idle = new FakeProvider('idle', [suggestion('Never')], false);
    const service = new PoiService([yelp, foursquare, idle], ['idle', 'foursquare', 'unknown', 'yelp']);

    const results = await service.getActivitiesMultiProvider(request(5));

    expect(results.map((a) => a.name)).toEqual(['From Foursquare', 'From Yelp']);
    expect(idle.calls).toHaveLength(0);
  });

  it('falls back to the next provider when one fails', async () => {
    const yelp = new FakeProvider('yelp', new PoiProviderError('yelp request failed with status 500', 'yelp', 500));
    const foursquare = new FakeProvider('foursquare', [suggestion('Botanic Garden')]);
    const service = new PoiService([yelp, foursquare]);

    const results = await service.getActivitiesMultiProvider(request(4));

    expect(results.map((a) => a.name)).toEqual(['Botanic Garden']);
    expect(logWarn).toHaveBeenCalledTimes(1);
  });

  it('fails with every provider message when all of them fail', async () => {
    const yelp = new FakeProvider('yelp', new PoiProviderError('yelp request failed with status 500', 'yelp', 500));
    const foursquare = new FakeProvider('foursquare', new Error('offline'));
    const service = new PoiService([yelp, foursquare]);

    await expect(service.getActivitiesMultiProvider(request(4))).rejects.toThrow(
      'yelp request failed with status 500; offline'
    );
  });

  it('returns an empty list when providers answer with nothing', async () => {
    const service = new PoiService([new FakeProvider('yelp', []), new FakeProvider('foursquare', [])]);

    await expect(service.getActivitiesMultiProvider(request(4))).resolves.toEqual([]);
  });

  it('fails when no provider is configured', async () => {
    const service = new PoiService([new FakeProvider('yelp', [], false)]);

    await expect(service.getActivitiesMultiProvider(request(4))).rejects.toThrow('No POI provider is configured');
  });
});

describe('PoiService.getActivities', () => {
  it('queries the named provider and trims to the limit', async () => {
    const yelp = new FakeProvider('yelp', [suggestion('A1'), suggestion('A2'), suggestion('A3')]);
    const service = new PoiService([yelp]);

    const results = await service.getActivities(request(2), 'yelp');

    expect(results.map((a) => a.name)).toEqual(['A1', 'A2']);
    expect(service.hasProvider('yelp')).toBe(true);
    expect(service.providerNames()).toEqual(['yelp']);
  });

  it('rejects an unknown provider', async () => {
    const service = new PoiService([new FakeProvider('yelp', [])]);

    await expect(service.getActivities(request(2), 'tripadvisor')).rejects.toThrow(
      'Unsupported provider: tripadvisor'
    );
  });
});
