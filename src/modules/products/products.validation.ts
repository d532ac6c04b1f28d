import { z } from 'zod';

// One schema per RPC request; messages are joined into a single INVALID_ARGUMENT detail

const notBlank = (value: string) => value.trim().length > 0;

const idField = z
  .number({ required_error: 'Id is required', invalid_type_error: 'Id must be a number' })
  .int('Id must be an integer')
  .positive('Id must be greater than 0');

const pageNumberField = z
  .number({ required_error: 'PageNumber is required', invalid_type_error: 'PageNumber must be a number' })
  .int('PageNumber must be an integer')
  .nonnegative('PageNumber must be greater than or equal to 0');

const pageSizeField = z
  .number({ required_error: 'PageSize is required', invalid_type_error: 'PageSize must be a number' })
  .int('PageSize must be an integer')
  .nonnegative('PageSize must be greater than or equal to 0');

const productFields = {
  name: z
    .string()
    .max(200, 'Name must not exceed 200 characters')
    .refine(notBlank, 'Name is required'),
  description: z.string().max(1000, 'Description must not exceed 1000 characters'),
  price: z
    .number({ required_error: 'Price is required', invalid_type_error: 'Price must be a number' })
    .finite('Price must be a finite number')
    .nonnegative('Price must be greater than or equal to 0'),
  stock: z
    .number({ required_error: 'Stock is required', invalid_type_error: 'Stock must be a number' })
    .int('Stock must be an integer')
    .nonnegative('Stock must be greater than or equal to 0'),
  category: z
    .string()
    .max(100, 'Category must not exceed 100 characters')
    .refine(notBlank, 'Category is required'),
};

export const getProductSchema = z.object({
  id: idField,
});

export const getProductsSchema = z.object({
  pageNumber: pageNumberField,
  pageSize: pageSizeField,
  activeOnly: z.boolean(),
});

export const searchProductsSchema = z.object({
  searchTerm: z.string().refine(notBlank, 'SearchTerm is required'),
  pageNumber: pageNumberField,
  pageSize: pageSizeField,
});

export const createProductSchema = z.object(productFields);

export const updateProductSchema = z.object({
  id: idField,
  ...productFields,
  isActive: z.boolean(),
});

export const deleteProductSchema = z.object({
  id: idField,
});

export type GetProductRequest = z.infer<typeof getProductSchema>;
export type GetProductsRequest = z.infer<typeof getProductsSchema>;
export type SearchProductsRequest = z.infer<typeof searchProductsSchema>;
export type CreateProductRequest = z.infer<typeof createProductSchema>;
export type UpdateProductRequest = z.infer<typeof updateProductSchema>;
export type DeleteProductRequest = z.infer<typeof deleteProductSchema>;

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; violations: string[] };

export interface RequestValidator<T> {
  validate(request: unknown): ValidationResult<T>;
}

/**
 * Wrap a schema so every violation is collected, in field order, instead of
 * stopping at the first one.
 */
export const createValidator = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): RequestValidator<T> => ({
  validate(request: unknown): ValidationResult<T> {
    const result = schema.safeParse(request);
    if (result.success) {
      return { valid: true, value: result.data };
    }
    return { valid: false, violations: result.error.issues.map((issue) => issue.message) };
  },
});

export const productValidators = {
  getProduct: createValidator(getProductSchema),
  getProducts: createValidator(getProductsSchema),
  searchProducts: createValidator(searchProductsSchema),
  createProduct: createValidator(createProductSchema),
  updateProduct: createValidator(updateProductSchema),
  deleteProduct: createValidator(deleteProductSchema),
};
