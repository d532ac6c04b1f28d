import { Metadata, status } from '@grpc/grpc-js';
import type { sendUnaryData } from '@grpc/grpc-js';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  cancellationSignal,
  createProductsController,
  type ProductsController,
} from '../src/modules/products/products.controller';
import type { GetProductsRequest } from '../src/modules/products/products.validation';
import { ProductsService } from '../src/modules/products/products.service';
import { RpcResponder } from '../src/utils/rpc-response';
import { InMemoryProductRepository } from './helpers/in-memory-product.repository';
import { FakeStreamCall, createLoggerStub, fixedClock, productRow } from './helpers/fakes';

interface UnaryResult<T> {
  error: Parameters<sendUnaryData<T>>[0];
  value?: T | null;
}

const invoke = <Req, Res>(
  handler: (call: { request: Req }, callback: sendUnaryData<Res>) => void,
  request: Req
): Promise<UnaryResult<Res>> =>
  new Promise((resolve) => {
    handler({ request }, (error, value) => resolve({ error, value }));
  });

const listRequest = (overrides: Partial<GetProductsRequest> = {}): GetProductsRequest => ({
  pageNumber: 1,
  pageSize: 10,
  activeOnly: false,
  ...overrides,
});

describe('products controller', () => {
  let repository: InMemoryProductRepository;
  let controller: ProductsController;

  beforeEach(() => {
    repository = new InMemoryProductRepository();
    const { logger } = createLoggerStub();
    controller = createProductsController(
      new ProductsService(repository, logger, fixedClock('2026-10-19T08:00:00.000Z')),
      logger
    );
  });

  describe('unary calls', () => {
    it('replies with the created product', async () => {
      const result = await invoke(controller.CreateProduct, {
        name: 'Widget',
        description: '',
        price: 2.5,
        stock: 1,
        category: 'Tools',
      });

      expect(result.error).toBeNull();
      expect(result.value).toMatchObject({ id: 1, name: 'Widget', price: 2.5, isActive: true, updatedAt: '' });
    });

    it('maps invalid input to INVALID_ARGUMENT', async () => {
      const result = await invoke(controller.GetProduct, { id: 0 });

      expect(result.error?.code).toBe(status.INVALID_ARGUMENT);
      expect(result.error?.details).toBe('Id must be greater than 0');
    });

    it('maps a missing product to NOT_FOUND', async () => {
      const result = await invoke(controller.DeleteProduct, { id: 5 });

      expect(result.error?.code).toBe(status.NOT_FOUND);
      expect(result.error?.details).toBe('Product with ID 5 does not exist');
    });

    it('maps a duplicate name to ALREADY_EXISTS', async () => {
      repository.insert(productRow({ name: 'Widget' }));

      const result = await invoke(controller.CreateProduct, {
        name: 'Widget',
        description: '',
        price: 1,
        stock: 0,
        category: 'Tools',
      });

      expect(result.error?.code).toBe(status.ALREADY_EXISTS);
    });

    it('maps unexpected faults to INTERNAL with a generic detail', async () => {
      vi.spyOn(repository, 'findById').mockRejectedValue(new Error('relation "products" does not exist'));

      const result = await invoke(controller.UpdateProduct, {
        id: 1,
        name: 'Widget',
        description: '',
        price: 1,
        stock: 0,
        category: 'Tools',
        isActive: true,
      });

      expect(result.error?.code).toBe(status.INTERNAL);
      expect(result.error?.details).toBe('Internal error while processing the request');
    });
  });

  describe('server streams', () => {
    beforeEach(() => {
      repository.insert(productRow({ name: 'Bolt' }));
      repository.insert(productRow({ name: 'Anchor' }));
      repository.insert(productRow({ name: 'Clamp' }));
    });

    it('writes each product and ends the call', async () => {
      const call = new FakeStreamCall(listRequest());

      controller.GetProducts(call);

      await vi.waitFor(() => expect(call.ended).toBe(true));
      expect(call.written.map((item) => item.name)).toEqual(['Anchor', 'Bolt', 'Clamp']);
      expect(call.failure).toBeNull();
    });

    it('fails the call with a status when validation rejects the request', async () => {
      const call = new FakeStreamCall({ searchTerm: '', pageNumber: 1, pageSize: 10 });

      controller.SearchProducts(call);

      await vi.waitFor(() => expect(call.failure).not.toBeNull());
      expect(call.failure?.code).toBe(status.INVALID_ARGUMENT);
      expect(call.failure?.details).toBe('SearchTerm is required');
      expect(call.written).toEqual([]);
      expect(call.ended).toBe(false);
    });

    it('waits for the transport to drain before writing the next product', async () => {
      const call = new FakeStreamCall(listRequest());
      call.holdWrites();

      controller.GetProducts(call);

      await vi.waitFor(() => expect(call.written).toHaveLength(1));
      await new Promise((resolve) => setImmediate(resolve));
      expect(call.written).toHaveLength(1);
      expect(call.ended).toBe(false);

      call.drain();

      await vi.waitFor(() => expect(call.ended).toBe(true));
      expect(call.written.map((item) => item.name)).toEqual(['Anchor', 'Bolt', 'Clamp']);
    });

    it('stops writing once the client cancels and closes the call normally', async () => {
      const call = new FakeStreamCall(listRequest());
      call.holdWrites();

      controller.GetProducts(call);

      await vi.waitFor(() => expect(call.written).toHaveLength(1));
      call.cancel();

      await vi.waitFor(() => expect(call.ended).toBe(true));
      expect(call.written.map((item) => item.name)).toEqual(['Anchor']);
      expect(call.failure).toBeNull();
    });
  });

  it('produces an aborted signal for a call that is already cancelled', () => {
    const call = new FakeStreamCall(listRequest());
    call.cancelled = true;

    expect(cancellationSignal(call).aborted).toBe(true);
  });
});

describe('RpcResponder', () => {
  it('builds a service error carrying the status, detail and empty metadata', () => {
    const error = RpcResponder.toServiceError('Conflict', "A product named 'Widget' already exists");

    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe(status.ALREADY_EXISTS);
    expect(error.details).toBe("A product named 'Widget' already exists");
    expect(error.message).toBe("A product named 'Widget' already exists");
    expect(error.metadata).toBeInstanceOf(Metadata);
  });
});
