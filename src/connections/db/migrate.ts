import type { Pool } from 'pg';
import { pool } from './connection';
import { migrations } from './migrations';
import type { Migration } from './migrations/types';
import { logger } from '../../utils/logging';
import { describeError } from '../../utils/errors';

// Create migrations table if not exists
const createMigrationsTable = async (db: Pool) => {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const isMigrationExecuted = async (db: Pool, name: string): Promise<boolean> => {
  const result = await db.query(
    'SELECT id FROM migrations WHERE name = $1',
    [name]
  );
  return result.rows.length > 0;
};

const runMigration = async (db: Pool, name: string, migration: Migration) => {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    await migration.up(client);
    await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
    await client.query('COMMIT');
    logger.info(`Migration ${name} executed successfully`);
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error(`Migration ${name} failed`, describeError(error));
    throw error;
  } finally {
    client.release();
  }
};

const rollbackMigration = async (db: Pool, name: string, migration: Migration) => {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    await migration.down(client);
    await client.query('DELETE FROM migrations WHERE name = $1', [name]);
    await client.query('COMMIT');
    logger.info(`Migration ${name} rolled back successfully`);
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error(`Migration ${name} rollback failed`, describeError(error));
    throw error;
  } finally {
    client.release();
  }
};

/**
 * Run all pending migrations against an open pool
 */
export const runMigrations = async (db: Pool = pool): Promise<void> => {
  await createMigrationsTable(db);

  logger.info(`Found ${migrations.length} migration files`);

  for (const { name, migration } of migrations) {
    if (await isMigrationExecuted(db, name)) {
      logger.info(`Migration ${name} already executed, skipping...`);
      continue;
    }

    await runMigration(db, name, migration);
  }

  logger.info('All migrations completed successfully!');
};

/**
 * Roll back the most recently executed migration
 */
export const rollbackLast = async (db: Pool = pool): Promise<void> => {
  await createMigrationsTable(db);

  const result = await db.query<{ name: string }>(
    'SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1'
  );

  if (result.rows.length === 0) {
    logger.info('No migrations to rollback');
    return;
  }

  const lastMigrationName = result.rows[0].name;
  const migrationInfo = migrations.find(m => m.name === lastMigrationName);

  if (!migrationInfo) {
    throw new Error(`Migration ${lastMigrationName} not found in migrations list`);
  }

  await rollbackMigration(db, lastMigrationName, migrationInfo.migration);
};

// Run if called directly
if (require.main === module) {
  const command = process.argv[2];
  const task = command === 'rollback' ? rollbackLast : runMigrations;

  task()
    .catch((error) => {
      logger.error('Migration error', describeError(error));
      process.exitCode = 1;
    })
    .finally(() => pool.end());
}
