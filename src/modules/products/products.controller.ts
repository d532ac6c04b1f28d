import type { ServerUnaryCall, sendUnaryData } from '@grpc/grpc-js';
import type { DeleteProductResponse, ProductResponse } from '../../types/response.types';
import { describeError } from '../../utils/errors';
import { RpcResponder, type Outcome, type StreamCall } from '../../utils/rpc-response';
import type { RecordSink, StreamSummary } from './products.pager';
import type { ProductsLogger, ProductsService } from './products.service';
import type {
  CreateProductRequest,
  DeleteProductRequest,
  GetProductRequest,
  GetProductsRequest,
  SearchProductsRequest,
  UpdateProductRequest,
} from './products.validation';

type UnaryCall<Req> = Pick<ServerUnaryCall<Req, unknown>, 'request'>;

/**
 * Aborts once grpc-js reports the client went away
 */
export const cancellationSignal = <Req, Res>(call: StreamCall<Req, Res>): AbortSignal => {
  const controller = new AbortController();

  if (call.cancelled) {
    controller.abort();
  } else {
    call.on('cancelled', () => controller.abort());
  }

  return controller.signal;
};

/**
 * Writes one message and, when the transport buffer is full, waits for it to drain
 * (or for the call to be cancelled) before accepting the next.
 */
export const streamSink = <Req, Res>(call: StreamCall<Req, Res>): RecordSink<Res> => ({
  write: (item: Res) =>
    new Promise<void>((resolve) => {
      if (call.write(item)) {
        resolve();
        return;
      }

      const release = () => {
        call.off('drain', release);
        call.off('cancelled', release);
        resolve();
      };
      call.once('drain', release);
      call.once('cancelled', release);
    }),
});

export const createProductsController = (service: ProductsService, logger: ProductsLogger) => {
  const deliver = <T>(operation: string, pending: Promise<Outcome<T>>, send: (outcome: Outcome<T>) => void): void => {
    pending.then(send).catch((error: unknown) => {
      logger.error(`Failed to deliver ${operation} response`, describeError(error));
    });
  };

  const unary =
    <Req, Res>(operation: string, handle: (request: Req) => Promise<Outcome<Res>>) =>
    (call: UnaryCall<Req>, callback: sendUnaryData<Res>): void => {
      deliver(operation, handle(call.request), (outcome) => RpcResponder.reply(callback, outcome));
    };

  const serverStream =
    <Req>(
      operation: string,
      handle: (request: Req, sink: RecordSink<ProductResponse>, signal: AbortSignal) => Promise<Outcome<StreamSummary>>
    ) =>
    (call: StreamCall<Req, ProductResponse>): void => {
      const pending = handle(call.request, streamSink(call), cancellationSignal(call));
      deliver(operation, pending, (outcome) => RpcResponder.finish(call, outcome));
    };

  return {
    GetProduct: unary<GetProductRequest, ProductResponse>('GetProduct', (request) => service.getProduct(request)),
    GetProducts: serverStream<GetProductsRequest>('GetProducts', (request, sink, signal) =>
      service.getProducts(request, sink, signal)
    ),
    SearchProducts: serverStream<SearchProductsRequest>('SearchProducts', (request, sink, signal) =>
      service.searchProducts(request, sink, signal)
    ),
    CreateProduct: unary<CreateProductRequest, ProductResponse>('CreateProduct', (request) =>
      service.createProduct(request)
    ),
    UpdateProduct: unary<UpdateProductRequest, ProductResponse>('UpdateProduct', (request) =>
      service.updateProduct(request)
    ),
    DeleteProduct: unary<DeleteProductRequest, DeleteProductResponse>('DeleteProduct', (request) =>
      service.deleteProduct(request)
    ),
  };
};

export type ProductsController = ReturnType<typeof createProductsController>;
