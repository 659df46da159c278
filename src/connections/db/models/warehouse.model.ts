export interface Warehouse {
  id: number;
  name: string;
  location: string;
  created_at: Date;
  updated_at: Date;
}

export interface CreateWarehouseInput {
  name: string;
  location: string;
}

export type UpdateWarehouseInput = Partial<CreateWarehouseInput>;
