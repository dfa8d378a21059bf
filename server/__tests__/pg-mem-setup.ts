import os from 'os';
import path from 'path';
import { newDb } from 'pg-mem';

// Create a shared in-memory database for the test suite.
const db = newDb({ autoCreateForeignKeyIndices: true, noAstCoverageCheck: true });
const mockPg = db.adapters.createPg();

// Mock the 'pg' module so Pool/Client use the in-memory implementation.
jest.mock('pg', () => mockPg);

// Allow longer async flows in integration tests.
jest.setTimeout(30000);

// Provide a dummy connection string so code that validates DATABASE_URL passes.
if (!process.env.DATABASE_URL) {
  process.env.DATABASE_URL = 'pg-mem://localhost/test';
}

// Keep test error logs out of the working tree, and never reach a real provider.
process.env.LOG_DIR = path.join(os.tmpdir(), 'trip-planner-test-logs');
process.env.YELP_API_KEY = '';
process.env.FOURSQUARE_API_KEY = '';

export { db };
