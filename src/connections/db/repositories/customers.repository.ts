import { CreateCustomerInput, Customer, CustomerSuggestion, UpdateCustomerInput } from '../models';
import { Queryable, SearchTerm, containsPattern } from './types';

export interface CustomerRepository {
  list(): Promise<Customer[]>;
  findById(id: number): Promise<Customer | null>;
  create(input: CreateCustomerInput): Promise<Customer>;
  update(id: number, input: UpdateCustomerInput): Promise<Customer | null>;
  delete(id: number): Promise<boolean>;
  /**
   * All-digit terms match the id or phone, other terms the name or phone.
   * Most recently updated first.
   */
  search(term: SearchTerm | null, limit: number): Promise<CustomerSuggestion[]>;
}

const CUSTOMER_COLUMNS = 'id, name, phone, address, address2, address3, created_at, updated_at';

export const createCustomerRepository = (db: Queryable): CustomerRepository => ({
  async list() {
    const result = await db.query<Customer>(`SELECT ${CUSTOMER_COLUMNS} FROM customers ORDER BY name, id`);
    return result.rows;
  },

  async findById(id) {
    const result = await db.query<Customer>(`SELECT ${CUSTOMER_COLUMNS} FROM customers WHERE id = $1`, [id]);
    return result.rows[0] ?? null;
  },

  async create(input) {
    const result = await db.query<Customer>(
      `INSERT INTO customers (name, phone, address, address2, address3)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${CUSTOMER_COLUMNS}`,
      [input.name, input.phone, input.address, input.address2, input.address3]
    );
    return result.rows[0];
  },

  async update(id, input) {
    const fields: string[] = [];
    const params: unknown[] = [];

    const set = (column: string, value: unknown) => {
      params.push(value);
      fields.push(`${column} = $${params.length}`);
    };

    if (input.name !== undefined) set('name', input.name);
    if (input.phone !== undefined) set('phone', input.phone);
    if (input.address !== undefined) set('address', input.address);
    if (input.address2 !== undefined) set('address2', input.address2);
    if (input.address3 !== undefined) set('address3', input.address3);

    params.push(id);
    const result = await db.query<Customer>(
      `UPDATE customers
       SET ${[...fields, 'updated_at = NOW()'].join(', ')}
       WHERE id = $${params.length}
       RETURNING ${CUSTOMER_COLUMNS}`,
      params
    );
    return result.rows[0] ?? null;
  },

  async delete(id) {
    const result = await db.query('DELETE FROM customers WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  },

  async search(term, limit) {
    const params: unknown[] = [];
    let where = '';

    if (term) {
      params.push(containsPattern(term.text));
      const conditions = ['phone ILIKE $1'];
      if (!term.digits) {
        conditions.push('name ILIKE $1');
      } else if (term.id !== null) {
        params.push(term.id);
        conditions.push(`id = $${params.length}`);
      }
      where = `WHERE ${conditions.join(' OR ')}`;
    }

    params.push(limit);
    const result = await db.query<CustomerSuggestion>(
      `SELECT id, name, phone, address FROM customers ${where}
       ORDER BY updated_at DESC, id DESC
       LIMIT $${params.length}`,
      params
    );
    return result.rows;
  },
});
