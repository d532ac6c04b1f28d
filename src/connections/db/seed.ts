import { z } from 'zod';
import seedData from './seeds/products.seed.json';
import type { ProductRepository } from '../../modules/products/products.repository';
import { toFixedPrice } from '../../modules/products/products.mapper';
import { logger } from '../../utils/logging';

const seedProductSchema = z.object({
  name: z.string().min(1).max(200),
  description: z.string().max(1000),
  price: z.number().nonnegative(),
  stock: z.number().int().nonnegative(),
  category: z.string().min(1).max(100),
});

/**
 * Load the sample catalog when the products table is empty
 * @returns number of products inserted
 */
export const seedProducts = async (repository: ProductRepository, now: () => Date = () => new Date()): Promise<number> => {
  if ((await repository.count()) > 0) {
    logger.info('Database already contains products. Skipping seed.');
    return 0;
  }

  const products = z.array(seedProductSchema).parse(seedData);

  logger.info('Seeding database with sample products...');

  for (const product of products) {
    await repository.create({
      ...product,
      price: toFixedPrice(product.price),
      created_at: now(),
      updated_at: null,
      is_active: true,
    });
  }

  logger.info(`Database seeded with ${products.length} products.`);
  return products.length;
};
