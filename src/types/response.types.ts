/**
 * Wire shapes of the catalog.v1.Products service (camelCase, as proto-loader hands them over)
 */

export interface ProductResponse {
  id: number;
  name: string;
  description: string;
  price: number;
  stock: number;
  category: string;
  createdAt: string; // ISO-8601
  updatedAt: string; // ISO-8601, '' until the first update
  isActive: boolean;
}

export interface DeleteProductResponse {
  success: boolean;
  message: string;
}

export interface ServiceInfo {
  service: string;
  version: string;
  description: string;
  operations: string[];
  grpcPort: number;
  healthCheck: string;
}
