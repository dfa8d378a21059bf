import { getSettings } from '../config';
import { PoiProviderError, errorMessage } from '../errors';
import { logWarn } from '../logger';
import { ActivitySuggestion } from '../types';
import { FoursquareProvider, PoiProvider, SuggestionRequest, YelpProvider } from './poiProviders';

export class PoiService {
  private readonly providers: Map<string, PoiProvider>;

  constructor(providers: PoiProvider[], private readonly order: string[] = providers.map((p) => p.name)) {
    this.providers = new Map(providers.map((p) => [p.name, p]));
  }

  providerNames(): string[] {
    return [...this.providers.keys()];
  }

  hasProvider(name: string): boolean {
    return this.providers.has(name);
  }

  async getActivities(request: SuggestionRequest, providerName: string): Promise<ActivitySuggestion[]> {
    const provider = this.providers.get(providerName);
    if (!provider) {
      throw new PoiProviderError(`Unsupported provider: ${providerName}`, providerName);
    }
    const activities = await provider.search(request);
    return activities.slice(0, request.limit);
  }

  /**
   * Walks the configured providers in order until `limit` distinct suggestions
   * are collected. A failing provider is skipped; the call only fails when
   * nothing could be fetched because every provider errored.
   */
  async getActivitiesMultiProvider(request: SuggestionRequest): Promise<ActivitySuggestion[]> {
    const configured = this.order
      .map((name) => this.providers.get(name))
      .filter((p): p is PoiProvider => p !== undefined && p.isConfigured());
    if (!configured.length) {
      throw new PoiProviderError('No POI provider is configured');
    }

    const seen = new Set<string>();
    const collected: ActivitySuggestion[] = [];
    const failures: PoiProviderError[] = [];

    for (const provider of configured) {
      if (collected.length >= request.limit) break;
      try {
        const results = await provider.search({ ...request, limit: request.limit - collected.length });
        for (const activity of results) {
          const key = activity.name.trim().toLowerCase();
          if (!key || seen.has(key)) continue;
          seen.add(key);
          collected.push(activity);
          if (collected.length >= request.limit) break;
        }
      } catch (err) {
        logWarn(`[poi] ${provider.name} lookup failed for ${request.city} (${request.durationDays} days)`, err);
        failures.push(err instanceof PoiProviderError ? err : new PoiProviderError(errorMessage(err), provider.name));
      }
    }

    if (!collected.length && failures.length === configured.length) {
      throw new PoiProviderError(failures.map((f) => f.message).join('; '));
    }
    return collected;
  }
}

export const createPoiService = (): PoiService => {
  const settings = getSettings();
  const timeoutMs = settings.poiTimeoutMs;
  return new PoiService(
    [
      new YelpProvider({ apiKey: settings.yelpApiKey, timeoutMs }),
      new FoursquareProvider({ apiKey: settings.foursquareApiKey, timeoutMs }),
    ],
    settings.poiProviders
  );
};

let poiService: PoiService | null = null;

export const getPoiService = (): PoiService => {
  if (!poiService) {
    poiService = createPoiService();
  }
  return poiService;
};

// Tests swap in a service backed by fake providers; null resets to the default.
export const setPoiService = (service: PoiService | null): void => {
  poiService = service;
};
