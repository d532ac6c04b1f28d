import dotenv from 'dotenv';
import path from 'path';
import { parseBoolean } from './app.config';

dotenv.config();

export const loggingConfigValues = {
  level: process.env.LOG_LEVEL || 'info',
  logDir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
  toFile: parseBoolean(process.env.LOG_TO_FILE, false),
  rotation: '10MB',
  retention: '30d',
  compression: true,
  silent: process.env.NODE_ENV === 'test',
};

export type LoggingConfigValues = typeof loggingConfigValues;
