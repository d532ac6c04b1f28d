import type { MigrationInfo } from './types';

import * as migration001 from './20261019_000001_create_products_table';

export const migrations: MigrationInfo[] = [
  { name: '20261019_000001_create_products_table', migration: migration001.migration },
];
