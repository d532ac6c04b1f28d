export { pool, connectDatabase } from './connection';
export { runMigrations, rollbackLast } from './migrate';
export { seedProducts } from './seed';
