import { ProductCatalog } from '../catalog/productCatalog.js';
import type { AppConfig } from '../config/index.js';
import {
  BoundaryUnreachableError,
  ConfigError,
  RunInProgressError,
  UnknownProductError,
} from '../core/errors.js';
import type { Product, ValidationReport } from '../core/types.js';
import { GeneratorRegistry, type EventGenerator } from '../generators/eventGenerator.js';
import { HttpIngestionClient } from '../transport/ingestionClient.js';
import { HttpQueryClient } from '../transport/queryClient.js';
import type { IngestionTransport, QueryTransport } from '../transport/types.js';
import type { Clock } from '../utils/clock.js';
import {
  ValidationOrchestrator,
  type RunOptions,
  type ValidationEvents,
} from './validationOrchestrator.js';
import type { EventBus } from '../events/eventBus.js';

export interface ValidationServiceDeps {
  catalog?: ProductCatalog;
  ingestion?: IngestionTransport;
  query?: QueryTransport;
  generator?: EventGenerator;
  clock?: Clock;
  bus?: EventBus<ValidationEvents>;
  signingKey?: string;
}

// Credentials are opaque: only their presence is checked
function requireSecret(value: string | undefined, env: string): string {
  if (!value) throw new ConfigError(`${env} is required to reach the boundary`);
  return value;
}

/**
 * Wires configuration, catalog and transports into an orchestrator and keeps
 * the latest report in memory. Only one run at a time.
 */
export class ValidationService {
  readonly catalog: ProductCatalog;
  readonly orchestrator: ValidationOrchestrator;
  private running = false;
  private latest: ValidationReport | null = null;
  private lastRunAt: Date | null = null;

  constructor(cfg: AppConfig, deps: ValidationServiceDeps = {}) {
    this.catalog = deps.catalog ?? ProductCatalog.load(cfg.catalog.path);
    const ingestion =
      deps.ingestion ??
      new HttpIngestionClient({
        url: cfg.ingestion.url,
        token: requireSecret(cfg.ingestion.token, 'INGEST_TOKEN'),
        authScheme: cfg.ingestion.authScheme,
        timeoutMs: cfg.ingestion.timeoutMs,
      });
    const query =
      deps.query ??
      new HttpQueryClient({
        url: cfg.query.url,
        token: requireSecret(cfg.query.token, 'QUERY_TOKEN'),
        timeoutMs: cfg.query.timeoutMs,
        maxCount: cfg.query.maxCount,
      });
    this.orchestrator = new ValidationOrchestrator(
      {
        ingestion,
        query,
        generator: deps.generator ?? new GeneratorRegistry(),
        clock: deps.clock,
        bus: deps.bus,
      },
      {
        maxConcurrency: cfg.orchestrator.maxConcurrency,
        eventsPerProduct: cfg.orchestrator.eventsPerProduct,
        runDeadlineMs: cfg.orchestrator.runDeadlineMs,
        trackingField: cfg.orchestrator.trackingField,
        poller: cfg.poller,
        lookbackMs: cfg.query.lookbackMs,
        grading: cfg.grading,
        signingKey: deps.signingKey ?? process.env.REPORT_SIGNING_KEY,
      },
    );
  }

  resolveProducts(names?: string[]): Product[] {
    const { products, unknown } = this.catalog.select(names);
    if (unknown.length) throw new UnknownProductError(unknown);
    return products;
  }

  async run(names?: string[], options: RunOptions = {}): Promise<ValidationReport> {
    const products = this.resolveProducts(names);
    if (this.running) throw new RunInProgressError();
    this.running = true;
    try {
      const report = await this.orchestrator.run(products, options);
      this.latest = report;
      return report;
    } catch (err) {
      // an unreachable boundary still yields a complete report
      if (err instanceof BoundaryUnreachableError) this.latest = err.report;
      throw err;
    } finally {
      this.running = false;
      this.lastRunAt = new Date();
    }
  }

  latestReport(): ValidationReport | null {
    return this.latest;
  }

  info() {
    return {
      running: this.running,
      lastRunAt: this.lastRunAt?.toISOString() || null,
      products: this.catalog.list().length,
    };
  }
}
