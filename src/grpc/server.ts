import path from 'path';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { ReflectionService } from '@grpc/reflection';
import { appConfig } from '../connections/config/app.config';
import type { ProductsController } from '../modules/products/products.controller';
import { logger } from '../utils/logging';

// proto/ sits two levels above both src/grpc and dist/grpc
export const PROTO_PATH = path.resolve(__dirname, '../../proto/products.proto');
export const PRODUCTS_SERVICE_NAME = 'catalog.v1.Products';

const isServiceDefinition = (
  definition: protoLoader.AnyDefinition | undefined
): definition is protoLoader.ServiceDefinition => definition !== undefined && !('format' in definition);

/**
 * Parse the .proto file at run time. Field names arrive camelCased and unset
 * fields carry their defaults.
 */
export const loadProductsPackage = (protoPath: string = PROTO_PATH): protoLoader.PackageDefinition =>
  protoLoader.loadSync(protoPath, {
    keepCase: false,
    longs: Number,
    enums: String,
    defaults: true,
    oneofs: true,
  });

export const findProductsService = (
  packageDefinition: protoLoader.PackageDefinition,
  source: string = PROTO_PATH
): protoLoader.ServiceDefinition => {
  const definition = packageDefinition[PRODUCTS_SERVICE_NAME];
  if (!isServiceDefinition(definition)) {
    throw new Error(`Service ${PRODUCTS_SERVICE_NAME} not found in ${source}`);
  }

  return definition;
};

export const loadProductsDefinition = (protoPath: string = PROTO_PATH): protoLoader.ServiceDefinition =>
  findProductsService(loadProductsPackage(protoPath), protoPath);

export interface GrpcServerOptions {
  // server reflection, for grpcurl and similar tools
  reflection?: boolean;
}

export const createGrpcServer = (
  controller: ProductsController,
  { reflection = appConfig.grpcReflection }: GrpcServerOptions = {}
): grpc.Server => {
  const server = new grpc.Server({
    'grpc.max_receive_message_length': appConfig.maxMessageBytes,
    'grpc.max_send_message_length': appConfig.maxMessageBytes,
  });

  const packageDefinition = loadProductsPackage();
  server.addService(findProductsService(packageDefinition), controller);

  if (reflection) {
    new ReflectionService(packageDefinition).addToServer(server);
    logger.info('gRPC server reflection enabled');
  }

  return server;
};

/**
 * Bind and start serving; resolves with the bound port
 */
export const startGrpcServer = (server: grpc.Server, host: string, port: number): Promise<number> =>
  new Promise((resolve, reject) => {
    server.bindAsync(`${host}:${port}`, grpc.ServerCredentials.createInsecure(), (error, boundPort) => {
      if (error) {
        reject(error);
        return;
      }

      logger.info(`gRPC server listening on ${host}:${boundPort}`);
      resolve(boundPort);
    });
  });

export const shutdownGrpcServer = (server: grpc.Server): Promise<void> =>
  new Promise((resolve) => {
    server.tryShutdown((error) => {
      if (error) {
        logger.warn('Graceful gRPC shutdown failed, forcing', { error: error.message });
        server.forceShutdown();
      }
      resolve();
    });
  });
