import { Command, InvalidArgumentError } from 'commander';
import fs from 'fs';
import path from 'path';
import { checkParsers } from '../catalog/parserArtifacts.js';
import { loadConfig, type AppConfig } from '../config/index.js';
import { BoundaryUnreachableError, UnknownProductError } from '../core/errors.js';
import type { ParsedRecord, ValidationReport } from '../core/types.js';
import { FieldScorer } from '../services/fieldScorer.js';
import { ValidationService } from '../services/validationService.js';
import { queryResponseSchema, toParsedRecord } from '../transport/queryClient.js';
import { formatReportTable } from './format.js';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  setExitCode: (code: number) => void;
}

export interface CliDeps {
  io?: Partial<CliIO>;
  loadConfig?: () => AppConfig;
  createService?: (cfg: AppConfig) => ValidationService;
}

function positiveInt(value: string): number {
  const n = parseInt(value, 10);
  if (Number.isNaN(n) || n <= 0) throw new InvalidArgumentError('must be a positive integer');
  return n;
}

// Accepts a bare parsed record or a saved query response
function readParsedRecord(file: string): ParsedRecord {
  const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(process.cwd(), file), 'utf8'));
  const asResponse = queryResponseSchema.safeParse(raw);
  if (asResponse.success && raw && typeof raw === 'object' && 'matches' in raw) {
    const first = asResponse.data.matches[0];
    if (!first) throw new Error(`${file} contains no matches`);
    return toParsedRecord(first);
  }
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new Error(`${file} must hold a JSON object`);
  }
  return Object.fromEntries(Object.entries(raw));
}

function needsAttention(report: ValidationReport): boolean {
  return report.entries.some((e) => e.grade === 'failing' || e.grade === 'submission failure');
}

export function buildProgram(deps: CliDeps = {}): Command {
  const io: CliIO = {
    out: (l) => console.log(l),
    err: (l) => console.error(l),
    setExitCode: (c) => {
      process.exitCode = c;
    },
    ...deps.io,
  };
  const config = deps.loadConfig ?? (() => loadConfig());
  const createService = deps.createService ?? ((cfg: AppConfig) => new ValidationService(cfg));

  const program = new Command();
  program
    .name('parser-validate')
    .description('Send tagged synthetic events and grade how well parsers extract their fields')
    .version('0.1.0');

  program
    .command('run')
    .description('Run a validation pass over the catalog (or selected products)')
    .option('-p, --products <names...>', 'Product names to validate (default: all)')
    .option('-e, --events <n>', 'Synthetic events per product', positiveInt)
    .option('-c, --concurrency <n>', 'Products in flight at once', positiveInt)
    .option('--json', 'Emit the full report as JSON', false)
    .action(
      async (opts: { products?: string[]; events?: number; concurrency?: number; json: boolean }) => {
        const cfg = config();
        if (opts.concurrency) cfg.orchestrator.maxConcurrency = opts.concurrency;
        const service = createService(cfg);
        const print = (report: ValidationReport) =>
          io.out(opts.json ? JSON.stringify(report, null, 2) : formatReportTable(report));
        try {
          const report = await service.run(opts.products, { eventsPerProduct: opts.events });
          print(report);
          if (needsAttention(report)) io.setExitCode(2); // partial failure, report still complete
        } catch (err) {
          if (err instanceof BoundaryUnreachableError) {
            print(err.report);
            io.err(err.message);
            io.setExitCode(1);
            return;
          }
          if (err instanceof UnknownProductError) {
            io.err(err.message);
            io.setExitCode(2);
            return;
          }
          throw err;
        }
      },
    );

  program
    .command('products')
    .description('List catalog products with their parser and taxonomy size')
    .action(() => {
      const service = createService(config());
      for (const p of service.catalog.list()) {
        const mandatory = p.taxonomy.fields.filter((f) => f.mandatory).length;
        io.out(
          `${p.name}\t${p.format}\t${p.parser}\t${p.taxonomy.fields.length} fields (${mandatory} mandatory)`,
        );
      }
    });

  program
    .command('score')
    .description('Score a saved parsed record against a product taxonomy, offline')
    .requiredOption('--product <name>', 'Catalog product name')
    .requiredOption('--record <file>', 'JSON file: parsed record or query response')
    .action((opts: { product: string; record: string }) => {
      const cfg = config();
      const service = createService(cfg);
      const product = service.catalog.get(opts.product);
      if (!product) {
        io.err(`unknown product: ${opts.product}`);
        io.setExitCode(2);
        return;
      }
      const scorer = new FieldScorer(cfg.grading, cfg.orchestrator.trackingField);
      const score = scorer.score(product, {
        token: 'offline',
        found: true,
        state: 'found',
        record: readParsedRecord(opts.record),
        retrievedAt: new Date(),
        attempts: 0,
      });
      io.out(JSON.stringify(score, null, 2));
    });

  program
    .command('check-parsers')
    .description('Verify every catalog product has a parser artifact on disk')
    .requiredOption('--parsers-dir <dir>', 'Root holding community/ and sentinelone/ parsers')
    .action((opts: { parsersDir: string }) => {
      const service = createService(config());
      const checks = checkParsers(opts.parsersDir, service.catalog.list());
      for (const c of checks) {
        io.out(c.found ? `ok\t${c.product}\t${c.location}` : `missing\t${c.product}\t${c.parser}`);
      }
      const missing = checks.filter((c) => !c.found).length;
      io.out(`${checks.length - missing}/${checks.length} parsers present`);
      if (missing) io.setExitCode(2);
    });

  return program;
}
