import express from 'express';
import { appConfig } from './connections/config/app.config';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import type { ServiceInfo } from './types/response.types';
import { describeError } from './utils/errors';
import { logger } from './utils/logging';
import { ResponseHandler } from './utils/response';

export interface AppDependencies {
  // rejects when storage is unreachable
  healthCheck: () => Promise<void>;
}

export const serviceInfo = (): ServiceInfo => ({
  service: appConfig.serviceName,
  version: appConfig.version,
  description: 'Product catalog service over gRPC',
  operations: [
    'GetProduct - Get a product by ID',
    'GetProducts - List products with pagination (streaming)',
    'SearchProducts - Search products by term, name matches first (streaming)',
    'CreateProduct - Create a new product',
    'UpdateProduct - Update an existing product',
    'DeleteProduct - Deactivate a product (logical delete)',
  ],
  grpcPort: appConfig.grpcPort,
  healthCheck: '/health',
});

/**
 * HTTP side of the process: health and service info only, the catalog itself is gRPC
 */
export const createApp = ({ healthCheck }: AppDependencies) => {
  const app = express();

  app.get('/health', async (req, res) => {
    try {
      await healthCheck();
      res.json({ status: 'ok', database: 'connected' });
    } catch (error) {
      logger.warn('Health check failed', describeError(error));
      res.status(500).json({ status: 'error', database: 'disconnected' });
    }
  });

  app.get('/', (req, res) => {
    ResponseHandler.success(res, serviceInfo(), 'Service information');
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
