import fs from 'fs';
import path from 'path';
import type { Product } from '../core/types.js';

// Parser artifacts live in one of these trees under the parsers root
export const PARSER_ROOTS = ['community', 'sentinelone'] as const;

export interface ParserCheck {
  product: string;
  parser: string;
  found: boolean;
  location?: string;
}

export function locateParser(parsersDir: string, parser: string): string | undefined {
  for (const root of PARSER_ROOTS) {
    const candidate = path.join(parsersDir, root, parser);
    if (fs.existsSync(candidate)) return candidate;
  }
  return undefined;
}

export function checkParsers(parsersDir: string, products: Product[]): ParserCheck[] {
  return products.map((p) => {
    const location = locateParser(parsersDir, p.parser);
    return location
      ? { product: p.name, parser: p.parser, found: true, location }
      : { product: p.name, parser: p.parser, found: false };
  });
}
