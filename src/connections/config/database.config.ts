import dotenv from 'dotenv';
import type { PoolConfig } from 'pg';

dotenv.config();

export const dbConfig = {
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432'),
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD || 'postgres',
  database: process.env.DB_NAME || 'catalog',
  max: parseInt(process.env.DB_MAX_CONNECTIONS || '10'),
} satisfies PoolConfig;
