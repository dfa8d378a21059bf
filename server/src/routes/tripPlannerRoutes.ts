import { Router } from 'express';
import bodyParser from 'body-parser';
import { errorMessage } from '../errors';
import { logError } from '../logger';
import { getPoiService } from '../services/poiService';
import { DEFAULT_LOOKUP_DAYS, DEFAULT_SUGGESTION_LIMIT, parseTripQuery, suggestionLimit } from '../services/tripParser';
import { TripPlanResponse } from '../types';

// Trip planner API: free-text query -> city + duration -> activity suggestions.
const router = Router();
router.use(bodyParser.json());

const DEFAULT_PROVIDER = 'yelp';

const positiveInt = (value: unknown, fallback: number): number | null => {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
};

router.post('/plan', async (req, res) => {
  const { query } = req.body ?? {};
  if (typeof query !== 'string') {
    res.status(400).json({ error: 'query is required' });
    return;
  }

  const { city, durationDays } = parseTripQuery(query);
  if (!city) {
    res.status(400).json({ error: 'Could not extract city from query. Please specify a city name.' });
    return;
  }

  try {
    const activities = await getPoiService().getActivitiesMultiProvider({
      city,
      durationDays: durationDays ?? DEFAULT_LOOKUP_DAYS,
      limit: suggestionLimit(durationDays),
    });
    const body: TripPlanResponse = { city, duration_days: durationDays, activities };
    res.json(body);
  } catch (err) {
    logError(`[trip-planner] Error planning trip for "${query}"`, err);
    res.status(500).json({ error: 'Failed to plan trip', detail: errorMessage(err) });
  }
});

router.get('/activities/:city', async (req, res) => {
  const city = req.params.city.trim();
  const durationDays = positiveInt(req.query.duration_days, DEFAULT_LOOKUP_DAYS);
  const limit = positiveInt(req.query.limit, DEFAULT_SUGGESTION_LIMIT);
  const provider = String(req.query.provider ?? DEFAULT_PROVIDER).trim().toLowerCase();

  if (!city) {
    res.status(400).json({ error: 'city is required' });
    return;
  }
  if (durationDays === null || limit === null) {
    res.status(400).json({ error: 'duration_days and limit must be positive integers' });
    return;
  }
  const service = getPoiService();
  if (!service.hasProvider(provider)) {
    res.status(400).json({ error: `Unsupported provider: ${provider}. Use one of ${service.providerNames().join(', ')}` });
    return;
  }

  try {
    const activities = await service.getActivities({ city, durationDays, limit }, provider);
    const body: TripPlanResponse = { city, duration_days: durationDays, activities };
    res.json(body);
  } catch (err) {
    logError(`[trip-planner] Error fetching activities for ${city} from ${provider}`, err);
    res.status(500).json({ error: 'Failed to fetch activities', detail: errorMessage(err) });
  }
});

export default router;
