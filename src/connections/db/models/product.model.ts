// Product Model - row shape of the products table

export interface Product {
  id: number; // SERIAL, assigned on insert
  name: string; // unique, max 200
  description: string; // max 1000, may be empty
  price: string; // NUMERIC(18,2), pg returns it as a string
  stock: number;
  category: string; // max 100
  created_at: Date;
  updated_at: Date | null; // null until the first full update
  is_active: boolean; // false after logical deletion
}

export type NewProduct = Omit<Product, 'id'>;
