import { EventEmitter } from 'events';
import type { ServiceError } from '@grpc/grpc-js';
import { vi } from 'vitest';
import type { Product } from '../../src/connections/db/models/product.model';
import type { RecordSink } from '../../src/modules/products/products.pager';
import type { ProductsLogger } from '../../src/modules/products/products.service';
import type { ProductResponse } from '../../src/types/response.types';
import type { StreamCall } from '../../src/utils/rpc-response';

export const createLoggerStub = () => {
  const stub = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  const logger: ProductsLogger = stub;
  return { logger, ...stub };
};

export const fixedClock = (iso: string) => () => new Date(iso);

/**
 * Collects streamed items; optionally aborts the controller after `cancelAfter` items
 */
export const collectingSink = (options: { controller?: AbortController; cancelAfter?: number } = {}) => {
  const items: ProductResponse[] = [];
  const sink: RecordSink<ProductResponse> = {
    async write(item) {
      items.push(item);
      if (options.controller && options.cancelAfter !== undefined && items.length >= options.cancelAfter) {
        options.controller.abort();
      }
    },
  };
  return { items, sink };
};

export const productRow = (overrides: Partial<Product> = {}): Omit<Product, 'id'> => ({
  name: 'Sample',
  description: '',
  price: '1.00',
  stock: 1,
  category: 'General',
  created_at: new Date('2026-01-01T00:00:00.000Z'),
  updated_at: null,
  is_active: true,
  ...overrides,
});

/**
 * grpc-js ServerWritableStream look-alike
 */
export class FakeStreamCall<Req> extends EventEmitter implements StreamCall<Req, ProductResponse> {
  cancelled = false;
  ended = false;
  written: ProductResponse[] = [];
  failure: ServiceError | null = null;
  private backpressure = false;

  constructor(readonly request: Req) {
    super();
    this.on('error', (error: ServiceError) => {
      this.failure = error;
    });
  }

  // next writes report a full buffer until drain() is called
  holdWrites(): void {
    this.backpressure = true;
  }

  drain(): void {
    this.backpressure = false;
    this.emit('drain');
  }

  cancel(): void {
    this.cancelled = true;
    this.emit('cancelled');
  }

  write(chunk: ProductResponse): boolean {
    this.written.push(chunk);
    return !this.backpressure;
  }

  end(): void {
    this.ended = true;
  }
}
