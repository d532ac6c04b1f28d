import type { Product } from '../../connections/db/models/product.model';
import type { GetProductsRequest, SearchProductsRequest } from './products.validation';

export interface ProductFilter {
  activeOnly: boolean;
  // lower-cased substring matched against name, description and category
  term?: string;
}

export type ProductOrder =
  | { by: 'name' }
  | { by: 'relevance'; term: string };

/**
 * Filter + order describing which products to read. Built before anything is executed;
 * the repository decides how to run it.
 */
export interface ReadSpec {
  filter: ProductFilter;
  order: ProductOrder;
}

export const buildListSpec = (request: GetProductsRequest): ReadSpec => ({
  filter: { activeOnly: request.activeOnly },
  order: { by: 'name' },
});

export const buildSearchSpec = (request: SearchProductsRequest): ReadSpec => {
  const term = request.searchTerm.toLowerCase();

  return {
    filter: { activeOnly: true, term },
    order: { by: 'relevance', term },
  };
};

// Ordinal (code unit) comparison, same as COLLATE "C"
export const compareOrdinal = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

export const containsTerm = (value: string, term: string): boolean => value.toLowerCase().includes(term);

/**
 * 0 when the name itself contains the term, 1 when only description/category do
 */
export const relevanceRank = (product: Product, term: string): number => (containsTerm(product.name, term) ? 0 : 1);

export const matchesFilter = (product: Product, filter: ProductFilter): boolean => {
  if (filter.activeOnly && !product.is_active) {
    return false;
  }

  if (filter.term !== undefined) {
    const { term } = filter;
    return containsTerm(product.name, term) || containsTerm(product.description, term) || containsTerm(product.category, term);
  }

  return true;
};

export const compareByOrder = (order: ProductOrder) => (a: Product, b: Product): number => {
  if (order.by === 'relevance') {
    const rank = relevanceRank(a, order.term) - relevanceRank(b, order.term);
    if (rank !== 0) {
      return rank;
    }
  }

  return compareOrdinal(a.name, b.name);
};
