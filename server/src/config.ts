import path from 'path';
import fs from 'fs';
import dotenv from 'dotenv';

// Load env vars from server/.env if present, otherwise fall back to repo root .env or existing process env
const envPaths = [path.resolve(__dirname, '../.env'), path.resolve(__dirname, '../../.env')];
let envLoadedFrom: string | null = null;
for (const envPath of envPaths) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    envLoadedFrom = envPath;
    break;
  }
}
if (!envLoadedFrom) {
  dotenv.config(); // default search (process cwd)
  envLoadedFrom = 'process.env/default';
}

export { envLoadedFrom };

export interface Settings {
  port: number;
  corsOrigins: string[];
  yelpApiKey: string;
  foursquareApiKey: string;
  poiProviders: string[];
  poiTimeoutMs: number;
  logDir: string;
}

const DEFAULT_CORS_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];
const DEFAULT_POI_PROVIDERS = ['yelp', 'foursquare'];

const splitList = (value: string | undefined, fallback: string[]): string[] => {
  const items = String(value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length ? items : fallback;
};

const positiveNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

// Read lazily so tests can adjust process.env between suites.
export const getSettings = (): Settings => ({
  port: positiveNumber(process.env.PORT, 4000),
  corsOrigins: splitList(process.env.CORS_ORIGINS, DEFAULT_CORS_ORIGINS),
  yelpApiKey: process.env.YELP_API_KEY?.trim() ?? '',
  foursquareApiKey: process.env.FOURSQUARE_API_KEY?.trim() ?? '',
  poiProviders: splitList(process.env.POI_PROVIDERS, DEFAULT_POI_PROVIDERS).map((p) => p.toLowerCase()),
  poiTimeoutMs: positiveNumber(process.env.POI_TIMEOUT_MS, 10000),
  logDir: process.env.LOG_DIR?.trim() || path.resolve(__dirname, '..', '..', 'logs'),
});
