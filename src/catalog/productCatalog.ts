import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import { CatalogError, errorMessage } from '../core/errors.js';
import type { Product } from '../core/types.js';

const fieldSchema = z.union([
  z.string().min(1).transform((name) => ({ name, mandatory: false })),
  z.object({ name: z.string().min(1), mandatory: z.boolean().default(false) }),
]);

export const productSchema = z
  .object({
    name: z.string().min(1),
    format: z.enum(['json', 'keyvalue', 'syslog', 'csv']),
    parser: z.string().min(1),
    taxonomy: z.object({
      version: z.string().min(1),
      ocsfCategory: z.string().min(1),
      fields: z.array(fieldSchema).min(1),
    }),
  })
  .superRefine((p, ctx) => {
    const seen = new Set<string>();
    for (const f of p.taxonomy.fields) {
      const key = f.name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate taxonomy field "${f.name}" in product ${p.name}`,
        });
      }
      seen.add(key);
    }
  });

export const catalogSchema = z.object({
  products: z.array(productSchema),
});

function freeze(p: Product): Product {
  return Object.freeze({
    ...p,
    taxonomy: Object.freeze({
      ...p.taxonomy,
      fields: Object.freeze(p.taxonomy.fields.map((f) => Object.freeze({ ...f }))),
    }),
  });
}

export class ProductCatalog {
  private readonly byName: Map<string, Product>;

  constructor(products: Product[]) {
    this.byName = new Map();
    for (const p of products) {
      if (this.byName.has(p.name)) {
        throw new CatalogError(`duplicate product "${p.name}" in catalog`);
      }
      this.byName.set(p.name, freeze(p));
    }
  }

  static parse(raw: unknown): ProductCatalog {
    const parsed = catalogSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CatalogError(`invalid product catalog: ${parsed.error.message}`);
    }
    return new ProductCatalog(parsed.data.products);
  }

  static load(file: string): ProductCatalog {
    const full = path.resolve(process.cwd(), file);
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(full, 'utf8'));
    } catch (e) {
      throw new CatalogError(`failed to read product catalog ${full}: ${errorMessage(e)}`);
    }
    return ProductCatalog.parse(raw);
  }

  list(): Product[] {
    return Array.from(this.byName.values());
  }

  get(name: string): Product | undefined {
    return this.byName.get(name);
  }

  /** Resolves names in order; unknown names are returned separately. */
  select(names?: string[]): { products: Product[]; unknown: string[] } {
    if (!names || names.length === 0) return { products: this.list(), unknown: [] };
    const products: Product[] = [];
    const unknown: string[] = [];
    for (const n of names) {
      const p = this.byName.get(n);
      if (p) products.push(p);
      else unknown.push(n);
    }
    return { products, unknown };
  }
}
