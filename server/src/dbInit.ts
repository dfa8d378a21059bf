import './config';
import { closePool, dropDb, initDb } from './db';

// Usage: node dist/dbInit.js [drop]
const main = async (): Promise<void> => {
  try {
    if (process.argv[2] === 'drop') {
      console.log('Dropping database tables...');
      await dropDb();
      console.log('Database tables dropped successfully!');
    } else {
      console.log('Creating database tables...');
      await initDb();
      console.log('Database tables created successfully!');
    }
  } finally {
    await closePool();
  }
};

main().catch((err: unknown) => {
  console.error('Database script failed', err);
  process.exitCode = 1;
});
