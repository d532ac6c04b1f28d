import type { Product } from '../../connections/db/models/product.model';
import type { DeleteProductResponse, ProductResponse } from '../../types/response.types';
import {
  AppError,
  ConflictError,
  INTERNAL_FAILURE_MESSAGE,
  InvalidInputError,
  NotFoundError,
  describeError,
  isUniqueViolation,
} from '../../utils/errors';
import { failure, success, type Outcome } from '../../utils/rpc-response';
import { toFixedPrice, toProductResponse } from './products.mapper';
import { resolvePage, streamRecords, type RecordSink, type StreamSummary } from './products.pager';
import { buildListSpec, buildSearchSpec } from './products.query';
import type { ProductRepository } from './products.repository';
import {
  productValidators,
  type CreateProductRequest,
  type DeleteProductRequest,
  type GetProductRequest,
  type GetProductsRequest,
  type RequestValidator,
  type SearchProductsRequest,
  type UpdateProductRequest,
} from './products.validation';

/**
 * Structured event sink; a winston logger fits, tests pass a stub.
 */
export interface ProductsLogger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export const productNotFoundMessage = (id: number) => `Product with ID ${id} does not exist`;
export const duplicateNameMessage = (name: string) => `A product named '${name}' already exists`;
export const duplicateRenameMessage = (name: string) => `Another product named '${name}' already exists`;

/**
 * Products façade. Every operation runs validate → read or check+mutate → outcome,
 * and never rejects: unexpected faults are logged and reported as InternalFailure.
 */
export class ProductsService {
  constructor(
    private readonly repository: ProductRepository,
    private readonly logger: ProductsLogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  getProduct(request: GetProductRequest): Promise<Outcome<ProductResponse>> {
    return this.run('GetProduct', { id: request.id }, async () => {
      this.logger.info(`GetProduct called for ID: ${request.id}`);

      const { id } = this.validate(productValidators.getProduct, request);
      const product = await this.requireProduct(id);

      this.logger.info(`Product ${product.id} found`);
      return toProductResponse(product);
    });
  }

  getProducts(
    request: GetProductsRequest,
    sink: RecordSink<ProductResponse>,
    signal: AbortSignal
  ): Promise<Outcome<StreamSummary>> {
    return this.run('GetProducts', { pageNumber: request.pageNumber, pageSize: request.pageSize }, async () => {
      this.logger.info(`GetProducts called with page=${request.pageNumber}, size=${request.pageSize}, activeOnly=${request.activeOnly}`);

      const valid = this.validate(productValidators.getProducts, request);
      const window = resolvePage(valid.pageNumber, valid.pageSize);
      const products = await this.repository.query(buildListSpec(valid), window);

      this.logger.info(`Found ${products.length} products`);
      return this.emit('GetProducts', products, sink, signal);
    });
  }

  searchProducts(
    request: SearchProductsRequest,
    sink: RecordSink<ProductResponse>,
    signal: AbortSignal
  ): Promise<Outcome<StreamSummary>> {
    return this.run('SearchProducts', { searchTerm: request.searchTerm }, async () => {
      this.logger.info(`SearchProducts called with term: '${request.searchTerm}'`);

      const valid = this.validate(productValidators.searchProducts, request);
      const window = resolvePage(valid.pageNumber, valid.pageSize);
      const products = await this.repository.query(buildSearchSpec(valid), window);

      this.logger.info(`Search matched ${products.length} products`);
      return this.emit('SearchProducts', products, sink, signal);
    });
  }

  createProduct(request: CreateProductRequest): Promise<Outcome<ProductResponse>> {
    return this.run('CreateProduct', { name: request.name }, async () => {
      this.logger.info(`CreateProduct called for: ${request.name}`);

      const valid = this.validate(productValidators.createProduct, request);

      const existing = await this.repository.findByName(valid.name);
      if (existing) {
        this.logger.warn(`Product named '${valid.name}' already exists`, { existingId: existing.id });
        throw new ConflictError(duplicateNameMessage(valid.name));
      }

      const product = await this.persist(
        () =>
          this.repository.create({
            name: valid.name,
            description: valid.description,
            price: toFixedPrice(valid.price),
            stock: valid.stock,
            category: valid.category,
            created_at: this.now(),
            updated_at: null,
            is_active: true,
          }),
        duplicateNameMessage(valid.name)
      );

      this.logger.info(`Product created with ID: ${product.id}`);
      return toProductResponse(product);
    });
  }

  updateProduct(request: UpdateProductRequest): Promise<Outcome<ProductResponse>> {
    return this.run('UpdateProduct', { id: request.id }, async () => {
      this.logger.info(`UpdateProduct called for ID: ${request.id}`);

      const valid = this.validate(productValidators.updateProduct, request);
      const current = await this.requireProduct(valid.id);

      // an unchanged name never needs the uniqueness check
      if (current.name !== valid.name) {
        const holder = await this.repository.findByName(valid.name, valid.id);
        if (holder) {
          this.logger.warn(`Product named '${valid.name}' already exists`, { existingId: holder.id });
          throw new ConflictError(duplicateRenameMessage(valid.name));
        }
      }

      const changed: Product = {
        ...current,
        name: valid.name,
        description: valid.description,
        price: toFixedPrice(valid.price),
        stock: valid.stock,
        category: valid.category,
        is_active: valid.isActive,
        updated_at: this.now(),
      };

      const saved = await this.persist(() => this.repository.update(changed), duplicateRenameMessage(valid.name));
      if (!saved) {
        throw new NotFoundError(productNotFoundMessage(valid.id));
      }

      this.logger.info(`Product ${saved.id} updated`);
      return toProductResponse(saved);
    });
  }

  deleteProduct(request: DeleteProductRequest): Promise<Outcome<DeleteProductResponse>> {
    return this.run('DeleteProduct', { id: request.id }, async () => {
      this.logger.info(`DeleteProduct called for ID: ${request.id}`);

      const { id } = this.validate(productValidators.deleteProduct, request);

      // single statement, so a concurrent update is never written back over
      const deactivated = await this.repository.deactivate(id);
      if (!deactivated) {
        this.logger.warn(`Product with ID ${id} not found`);
        throw new NotFoundError(productNotFoundMessage(id));
      }

      this.logger.info(`Product ${id} deactivated (logical delete)`);
      return {
        success: true,
        message: `Product with ID ${id} deleted successfully`,
      };
    });
  }

  private async run<T>(
    operation: string,
    context: Record<string, unknown>,
    body: () => Promise<T>
  ): Promise<Outcome<T>> {
    try {
      return success(await body());
    } catch (error) {
      if (error instanceof AppError) {
        return failure<T>(error.kind, error.message);
      }

      this.logger.error(`Error while handling ${operation}`, { operation, ...context, ...describeError(error) });
      return failure<T>('InternalFailure', INTERNAL_FAILURE_MESSAGE);
    }
  }

  private validate<T>(validator: RequestValidator<T>, request: unknown): T {
    const result = validator.validate(request);
    if (!result.valid) {
      const error = new InvalidInputError(result.violations);
      this.logger.warn(`Validation failed: ${error.message}`);
      throw error;
    }
    return result.value;
  }

  private async requireProduct(id: number): Promise<Product> {
    const product = await this.repository.findById(id);
    if (!product) {
      this.logger.warn(`Product with ID ${id} not found`);
      throw new NotFoundError(productNotFoundMessage(id));
    }
    return product;
  }

  /**
   * A unique violation from storage means a concurrent writer took the name
   * between the check and the write.
   */
  private async persist<T>(write: () => Promise<T>, conflictMessage: string): Promise<T> {
    try {
      return await write();
    } catch (error) {
      if (isUniqueViolation(error)) {
        this.logger.warn(`Unique constraint rejected write: ${conflictMessage}`);
        throw new ConflictError(conflictMessage);
      }
      throw error;
    }
  }

  private async emit(
    operation: string,
    products: Product[],
    sink: RecordSink<ProductResponse>,
    signal: AbortSignal
  ): Promise<StreamSummary> {
    const summary = await streamRecords(products, toProductResponse, sink, signal);

    if (summary.cancelled) {
      this.logger.warn(`${operation} cancelled by the client`, { delivered: summary.delivered });
    }
    this.logger.info(`${operation} completed - ${summary.delivered} products sent`);

    return summary;
  }
}
