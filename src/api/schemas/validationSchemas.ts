import { z } from 'zod';
import type { Product } from '../../core/types.js';

export const runValidationBodySchema = z
  .object({
    products: z.array(z.string().min(1)).optional(),
    eventsPerProduct: z.number().int().min(1).max(100).optional(),
  })
  .strict();

export function toPublicProduct(p: Product) {
  return {
    name: p.name,
    format: p.format,
    parser: p.parser,
    taxonomyVersion: p.taxonomy.version,
    ocsfCategory: p.taxonomy.ocsfCategory,
    fields: p.taxonomy.fields.length,
    mandatoryFields: p.taxonomy.fields.filter((f) => f.mandatory).length,
  };
}
