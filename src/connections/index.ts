// Database
export { pool, connectDatabase, runMigrations, rollbackLast, seedProducts } from './db';

// Config - All configurations in one place
export {
  appConfig,
  dbConfig,
  loggingConfigValues,
} from './config';
