import { describe, expect, it } from 'vitest';
import { seedProducts } from '../src/connections/db/seed';
import { buildListSpec } from '../src/modules/products/products.query';
import { resolvePage } from '../src/modules/products/products.pager';
import { InMemoryProductRepository } from './helpers/in-memory-product.repository';
import { fixedClock, productRow } from './helpers/fakes';

describe('seedProducts', () => {
  it('fills an empty catalog with active products', async () => {
    const repository = new InMemoryProductRepository();

    expect(await seedProducts(repository, fixedClock('2026-10-19T00:00:00.000Z'))).toBe(12);

    const products = await repository.query(
      buildListSpec({ pageNumber: 1, pageSize: 20, activeOnly: true }),
      resolvePage(1, 20)
    );
    expect(products).toHaveLength(12);
    expect(products[0]).toMatchObject({
      name: 'Aluminium Laptop Stand',
      is_active: true,
      updated_at: null,
      created_at: new Date('2026-10-19T00:00:00.000Z'),
    });
  });

  it('leaves a populated catalog untouched', async () => {
    const repository = new InMemoryProductRepository();
    repository.insert(productRow());

    expect(await seedProducts(repository)).toBe(0);
    expect(await repository.count()).toBe(1);
  });
});
