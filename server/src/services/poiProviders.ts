import fetch, { RequestInit, Response } from 'node-fetch';
import { PoiProviderError, errorMessage } from '../errors';
import { ActivitySuggestion } from '../types';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface SuggestionRequest {
  city: string;
  durationDays: number;
  limit: number;
}

export interface PoiProvider {
  readonly name: string;
  isConfigured(): boolean;
  search(request: SuggestionRequest): Promise<ActivitySuggestion[]>;
}

export interface ProviderOptions {
  apiKey: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

// Both APIs cap a single page at 50 results.
const MAX_PAGE_SIZE = 50;

const pageSize = (limit: number): number => Math.max(1, Math.min(limit, MAX_PAGE_SIZE));

abstract class HttpPoiProvider implements PoiProvider {
  abstract readonly name: string;
  protected readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor({ apiKey, timeoutMs = 10000, fetchImpl = fetch }: ProviderOptions) {
    this.apiKey = apiKey.trim();
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  abstract search(request: SuggestionRequest): Promise<ActivitySuggestion[]>;

  protected async getJson(url: string, headers: Record<string, string>): Promise<unknown> {
    if (!this.isConfigured()) {
      throw new PoiProviderError(`${this.name} API key is not configured`, this.name);
    }
    let res: Response;
    try {
      res = await this.fetchImpl(url, { method: 'GET', headers, timeout: this.timeoutMs });
    } catch (err) {
      throw new PoiProviderError(`${this.name} request failed: ${errorMessage(err)}`, this.name);
    }
    if (!res.ok) {
      const text = await res.text();
      throw new PoiProviderError(
        `${this.name} request failed with status ${res.status}${text ? `: ${text.slice(0, 200)}` : ''}`,
        this.name,
        res.status
      );
    }
    return res.json();
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Provider payloads are untrusted; every field is read through these guards.
const records = (value: unknown): Record<string, unknown>[] => (Array.isArray(value) ? value.filter(isRecord) : []);

const field = (value: unknown, key: string): unknown => (isRecord(value) ? value[key] : undefined);

const text = (value: unknown): string | null => (typeof value === 'string' && value.trim() ? value : null);

const finite = (value: unknown): number | null => (typeof value === 'number' && Number.isFinite(value) ? value : null);

const isSuggestion = (value: ActivitySuggestion | null): value is ActivitySuggestion => value !== null;

export class YelpProvider extends HttpPoiProvider {
  readonly name = 'yelp';

  async search({ city, limit }: SuggestionRequest): Promise<ActivitySuggestion[]> {
    const params = new URLSearchParams({ location: city, limit: String(pageSize(limit)) });
    const payload = await this.getJson(`https://api.yelp.com/v3/businesses/search?${params.toString()}`, {
      Authorization: `Bearer ${this.apiKey}`,
      Accept: 'application/json',
    });
    return records(field(payload, 'businesses')).map(mapYelpBusiness).filter(isSuggestion);
  }
}

const mapYelpBusiness = (b: Record<string, unknown>): ActivitySuggestion | null => {
  const name = text(b.name);
  if (!name) return null;
  const displayAddress = field(b.location, 'display_address');
  const lines = Array.isArray(displayAddress) ? displayAddress.filter((line): line is string => Boolean(text(line))) : [];
  return {
    name,
    category: text(records(b.categories)[0]?.title),
    rating: finite(b.rating),
    address: lines.length ? lines.join(', ') : text(displayAddress),
    phone: text(b.display_phone),
    url: text(b.url),
    image_url: text(b.image_url),
    price: text(b.price),
  };
};

const FOURSQUARE_FIELDS = 'name,categories,location,tel,website,rating,price,photos';

export class FoursquareProvider extends HttpPoiProvider {
  readonly name = 'foursquare';

  async search({ city, limit }: SuggestionRequest): Promise<ActivitySuggestion[]> {
    const params = new URLSearchParams({ near: city, limit: String(pageSize(limit)), fields: FOURSQUARE_FIELDS });
    const payload = await this.getJson(`https://api.foursquare.com/v3/places/search?${params.toString()}`, {
      Authorization: this.apiKey,
      Accept: 'application/json',
    });
    return records(field(payload, 'results')).map(mapFoursquarePlace).filter(isSuggestion);
  }
}

// Foursquare rates out of 10 and prices on a 1-4 scale.
const mapFoursquarePlace = (p: Record<string, unknown>): ActivitySuggestion | null => {
  const name = text(p.name);
  if (!name) return null;
  const rating = finite(p.rating);
  const price = finite(p.price);
  const photo = records(p.photos)[0];
  const prefix = text(photo?.prefix);
  const suffix = text(photo?.suffix);
  return {
    name,
    category: text(records(p.categories)[0]?.name),
    rating: rating === null ? null : Math.round((rating / 2) * 10) / 10,
    address: text(field(p.location, 'formatted_address')),
    phone: text(p.tel),
    url: text(p.website),
    image_url: prefix && suffix ? `${prefix}original${suffix}` : null,
    price: price !== null && Number.isInteger(price) && price > 0 ? '$'.repeat(price) : null,
  };
};
