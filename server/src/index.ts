import { envLoadedFrom, getSettings } from './config';
import { app } from './app';
import { initDb } from './db';
import { logError } from './logger';

const { port } = getSettings();

console.log('Environment loaded from', envLoadedFrom);

initDb()
  .then(() => {
    app.listen(port, () => console.log(`API server running on port ${port}`));
  })
  .catch((err: unknown) => {
    logError('Failed to initialize database', err);
    console.error('Failed to initialize database', err);
    process.exit(1);
  });
