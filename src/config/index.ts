import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { ConfigError, errorMessage } from '../core/errors.js';
import { MIN_SECRET_LENGTH } from '../utils/redact.js';

dotenv.config();

export const gradeRuleSchema = z.object({
  grade: z.enum(['excellent', 'good', 'functional']),
  minCompliance: z.number().min(0).max(100).default(0),
  minCoverage: z.number().min(0).max(100).default(0),
  requireAboveHighWaterMark: z.boolean().default(false),
});

export const defaultGradingTable: z.input<typeof gradeRuleSchema>[] = [
  { grade: 'excellent', minCompliance: 100, minCoverage: 80, requireAboveHighWaterMark: true },
  { grade: 'good', minCompliance: 60 },
  { grade: 'functional', minCompliance: 40 },
];

const ConfigSchema = z.object({
  ingestion: z.object({
    url: z.string().url(),
    token: z.string().min(MIN_SECRET_LENGTH).optional(),
    authScheme: z.string().min(1).default('Bearer'),
    timeoutMs: z.number().int().positive().default(10_000),
  }),
  query: z.object({
    url: z.string().url(),
    token: z.string().min(MIN_SECRET_LENGTH).optional(),
    timeoutMs: z.number().int().positive().default(10_000),
    lookbackMs: z.number().int().positive().default(15 * 60 * 1000),
    maxCount: z.number().int().positive().default(10),
  }),
  poller: z
    .object({
      baseIntervalMs: z.number().int().positive().default(1000),
      maxIntervalMs: z.number().int().positive().default(8000),
      multiplier: z.number().min(1).default(2),
      deadlineMs: z.number().int().positive().default(30_000),
      maxConsecutiveErrors: z.number().int().min(0).default(3),
    })
    .refine((p) => p.maxIntervalMs >= p.baseIntervalMs, {
      message: 'poller.maxIntervalMs must be >= poller.baseIntervalMs',
    }),
  orchestrator: z.object({
    maxConcurrency: z.number().int().positive().default(4),
    eventsPerProduct: z.number().int().positive().default(1),
    runDeadlineMs: z.number().int().positive().default(300_000),
    trackingField: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/)
      .default('pv_tracking_id'),
  }),
  grading: z.object({
    highWaterMark: z.number().int().min(0).default(10),
    table: z
      .array(gradeRuleSchema)
      .default(defaultGradingTable)
      // excellent stays reserved for fully compliant parsers
      .refine((rows) => rows.every((r) => r.grade !== 'excellent' || r.minCompliance === 100), {
        message: 'an excellent grading rule must require 100% compliance',
      }),
  }),
  catalog: z.object({
    path: z.string().min(1),
  }),
  logging: z.object({
    level: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    json: z.boolean().default(true),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type PollerConfig = AppConfig['poller'];
export type GradingConfig = AppConfig['grading'];
export type GradeRule = z.infer<typeof gradeRuleSchema>;

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const n = Number(raw);
  return Number.isNaN(n) ? undefined : n;
}

function section(fileRaw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = fileRaw[key];
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

// Drops undefined env-derived values so zod defaults apply
function defined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

export function loadConfig(configPath = 'validation.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(full, 'utf8'));
      if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
        fileRaw = Object.fromEntries(Object.entries(parsed));
      }
    } catch (e) {
      throw new ConfigError(`Failed to parse config file ${full}: ${errorMessage(e)}`);
    }
  }
  const merged = {
    ingestion: {
      ...defined({
        url: process.env.INGEST_URL || 'http://localhost:8088',
        token: process.env.INGEST_TOKEN || undefined,
        authScheme: process.env.INGEST_AUTH_SCHEME || undefined,
        timeoutMs: envNumber('INGEST_TIMEOUT_MS'),
      }),
      ...section(fileRaw, 'ingestion'),
    },
    query: {
      ...defined({
        url: process.env.QUERY_URL || 'http://localhost:8080/api/query',
        token: process.env.QUERY_TOKEN || undefined,
        timeoutMs: envNumber('QUERY_TIMEOUT_MS'),
      }),
      ...section(fileRaw, 'query'),
    },
    poller: {
      ...defined({
        baseIntervalMs: envNumber('POLL_BASE_MS'),
        maxIntervalMs: envNumber('POLL_MAX_MS'),
        deadlineMs: envNumber('POLL_DEADLINE_MS'),
      }),
      ...section(fileRaw, 'poller'),
    },
    orchestrator: {
      ...defined({
        maxConcurrency: envNumber('MAX_CONCURRENCY'),
        eventsPerProduct: envNumber('EVENTS_PER_PRODUCT'),
        runDeadlineMs: envNumber('RUN_DEADLINE_MS'),
      }),
      ...section(fileRaw, 'orchestrator'),
    },
    grading: { ...section(fileRaw, 'grading') },
    catalog: {
      path: process.env.CATALOG_PATH || 'config/products.json',
      ...section(fileRaw, 'catalog'),
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      json: true,
      ...section(fileRaw, 'logging'),
    },
  };
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${parsed.error.message}`);
  }
  return parsed.data;
}
