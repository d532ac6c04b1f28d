import type { Server } from 'http';
import { createApp } from './app';
import { appConfig } from './connections/config/app.config';
import { connectDatabase, pool, runMigrations, seedProducts } from './connections';
import { createGrpcServer, shutdownGrpcServer, startGrpcServer } from './grpc/server';
import { createProductsController } from './modules/products/products.controller';
import { PgProductRepository } from './modules/products/products.repository';
import { ProductsService } from './modules/products/products.service';
import { describeError } from './utils/errors';
import { getLogger, logger } from './utils/logging';

/**
 * Initialize connections and start servers
 */
const startServer = async () => {
  try {
    logger.info('Connecting to database...');
    await connectDatabase();

    logger.info('Running migrations...');
    await runMigrations(pool);

    const repository = new PgProductRepository(pool);

    if (appConfig.seedDatabase) {
      await seedProducts(repository);
    }

    const service = new ProductsService(repository, getLogger('ProductsService'));
    const grpcServer = createGrpcServer(createProductsController(service, getLogger('ProductsController')));
    await startGrpcServer(grpcServer, appConfig.grpcHost, appConfig.grpcPort);

    const app = createApp({ healthCheck: () => repository.ping() });
    const httpServer: Server = app.listen(appConfig.httpPort, () => {
      logger.info(`HTTP server is running on port ${appConfig.httpPort}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
      logger.info('All services are ready!');
    });

    const shutdown = async (signal: string) => {
      logger.info(`${signal} received, shutting down...`);
      httpServer.close();
      await shutdownGrpcServer(grpcServer);
      await pool.end();
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        shutdown(signal).catch((error) => {
          logger.error('Shutdown failed', describeError(error));
          process.exitCode = 1;
        });
      });
    }
  } catch (error) {
    logger.error('Failed to start server:', describeError(error));
    logger.error('Exiting application...');
    process.exit(1);
  }
};

// Start the application
void startServer();
