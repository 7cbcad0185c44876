import type { Product, SyntheticEvent } from '../core/types.js';

/**
 * Boundary to the per-vendor event generators. A generator builds one
 * synthetic event for a product; the pipeline adds the tracking token.
 */
export interface EventGenerator {
  produceEvent(product: Product): SyntheticEvent;
}

type Sample = (field: string, seq: number) => unknown;

// first matching pattern wins
const SAMPLES: Array<[RegExp, Sample]> = [
  [/(^|[._])(time|timestamp|ts)$|_time$/i, (_f, seq) => new Date(Date.UTC(2024, 0, 1, 0, 0, seq)).toISOString()],
  [/(^|[._])ip$|_ip$|addr$/i, (_f, seq) => `10.0.${Math.floor(seq / 250) % 250}.${(seq % 250) + 1}`],
  [/port$/i, (_f, seq) => 1024 + (seq % 60000)],
  [/(^|[._])(count|bytes|packets|duration|id_num)$/i, (_f, seq) => seq * 10],
  [/(user|username|account)(\.name)?$/i, (_f, seq) => `user${String(seq).padStart(3, '0')}`],
  [/(host|hostname|device)(\.name)?$/i, (_f, seq) => `host-${seq}`],
  [/severity(_id)?$/i, () => 3],
  [/(action|disposition)$/i, () => 'allowed'],
  [/uid$|uuid$/i, (_f, seq) => `00000000-0000-4000-8000-${String(seq).padStart(12, '0')}`],
];

/**
 * Default generator: one value per taxonomy field, keyed by the field name.
 * Values depend only on the field name and a per-generator sequence number.
 */
export class TaxonomyEventGenerator implements EventGenerator {
  private seq = 0;

  produceEvent(product: Product): SyntheticEvent {
    this.seq += 1;
    const event: Record<string, unknown> = {};
    for (const field of product.taxonomy.fields) {
      const sample = SAMPLES.find(([re]) => re.test(field.name));
      event[field.name] = sample ? sample[1](field.name, this.seq) : `${field.name}-${this.seq}`;
    }
    return event;
  }
}

/**
 * Per-product generator lookup with a fallback for products that have no
 * dedicated generator.
 */
export class GeneratorRegistry implements EventGenerator {
  private readonly generators = new Map<string, EventGenerator>();

  constructor(private readonly fallback: EventGenerator = new TaxonomyEventGenerator()) {}

  register(product: string, generator: EventGenerator): this {
    this.generators.set(product, generator);
    return this;
  }

  produceEvent(product: Product): SyntheticEvent {
    return (this.generators.get(product.name) ?? this.fallback).produceEvent(product);
  }
}
