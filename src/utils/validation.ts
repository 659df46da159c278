import { z } from 'zod';
import { SearchTerm } from '../connections/db/repositories';
import { MAX_ROW_ID } from '../constants';

// Shared validation schemas
export const idParamSchema = z.object({
  id: z.coerce.number().int().positive().max(MAX_ROW_ID),
});

export const parseIdParam = (params: unknown): number => idParamSchema.parse(params).id;

// Blank strings are stored as '' so the three address slots stay comparable
export const optionalAddressSchema = z
  .string()
  .max(255)
  .nullish()
  .transform((value) => (value ?? '').trim());

export const autocompleteQuerySchema = z.object({
  q: z.string().trim().max(100).optional(),
});

/**
 * Turn an autocomplete `q` into a search term; a blank query matches everything
 */
export const parseSearchTerm = (query: unknown): SearchTerm | null => {
  const { q } = autocompleteQuerySchema.parse(query);
  if (!q) return null;

  const digits = /^\d+$/.test(q);
  const id = digits ? Number(q) : null;
  return { text: q, digits, id: id !== null && id <= MAX_ROW_ID ? id : null };
};
