import dotenv from 'dotenv';

dotenv.config();

/**
 * Parse a boolean flag from an environment variable.
 * Accepts 1/true/yes (any case); anything else is false.
 */
export const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
};

const nodeEnv = process.env.NODE_ENV || 'development';

export const appConfig = {
  serviceName: 'catalog-products',
  version: '1.0.0',
  nodeEnv,
  httpPort: parseInt(process.env.APP_PORT || process.env.PORT || '7001'),
  grpcHost: process.env.GRPC_HOST || '0.0.0.0',
  grpcPort: parseInt(process.env.GRPC_PORT || '7002'),
  // Reflection is on in development unless GRPC_REFLECTION says otherwise
  grpcReflection: parseBoolean(process.env.GRPC_REFLECTION, nodeEnv === 'development'),
  // Sample catalog is loaded on an empty table unless disabled
  seedDatabase: parseBoolean(process.env.SEED_DATABASE, nodeEnv !== 'production'),
  maxMessageBytes: 4 * 1024 * 1024, // 4MB
};
