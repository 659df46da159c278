export interface Product {
  id: number;
  name: string;
  price: string; // numeric(10,2), pg returns it as a string
  unit: string; // default: KG
  stock_qty: number; // never below zero, mutated only through the inventory ledger
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface ProductWithUsage extends Product {
  shipments_count: number;
}

export interface CreateProductInput {
  name: string;
  price: number;
  unit?: string;
  stock_qty?: number;
  is_active?: boolean;
}

export interface UpdateProductInput {
  name?: string;
  price?: number;
  unit?: string;
  is_active?: boolean;
}
