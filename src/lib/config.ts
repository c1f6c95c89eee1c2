/**
 * Multifeed — Configuration
 *
 * Reads settings from the environment (optionally a `.env` file) and
 * validates them with zod.
 */

import { config as loadDotEnv } from 'dotenv';
import { z } from 'zod';
import { PackageSourceDescriptorSchema } from '../types';
import type { PackageSourceDescriptor } from '../types';
import { ConfigError } from './errors';

// ============================================================
// SCHEMAS
// ============================================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const TelemetryModeSchema = z.enum(['log', 'off']);
export type TelemetryMode = z.infer<typeof TelemetryModeSchema>;

const SourceListSchema = z
  .array(PackageSourceDescriptorSchema)
  .superRefine((sources, ctx) => {
    const seen = new Set<string>();
    sources.forEach((source, index) => {
      if (seen.has(source.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate source id "${source.id}"`,
          path: [index, 'id'],
        });
      }
      seen.add(source.id);
    });
  });

const EnvSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default('info'),
  NODE_ENV: z.string().default('development'),
  MULTIFEED_SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  MULTIFEED_TELEMETRY: TelemetryModeSchema.default('off'),
  MULTIFEED_SOURCES: z.string().optional(),
});

export interface MultifeedConfig {
  logLevel: LogLevel;
  production: boolean;
  /** Unset means the aggregator waits for every source */
  sourceTimeoutMs?: number;
  telemetry: TelemetryMode;
  sources: PackageSourceDescriptor[];
}

// ============================================================
// PARSING
// ============================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a list of source descriptors (already parsed from JSON).
 */
export function parseSourceDescriptors(raw: unknown): PackageSourceDescriptor[] {
  const result = SourceListSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError('Invalid package source list', formatIssues(result.error));
  }
  return result.data;
}

function parseSourcesJson(json: string | undefined): PackageSourceDescriptor[] {
  if (json === undefined || json.trim() === '') return [];

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError('MULTIFEED_SOURCES is not valid JSON', [message]);
  }
  return parseSourceDescriptors(raw);
}

/**
 * Load configuration.
 *
 * Without an explicit environment the `.env` file is applied to
 * `process.env` first.
 */
export function loadConfig(env?: NodeJS.ProcessEnv): MultifeedConfig {
  let source = env;
  if (source === undefined) {
    loadDotEnv();
    source = process.env;
  }

  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment configuration', formatIssues(parsed.error));
  }

  const vars = parsed.data;
  return {
    logLevel: vars.LOG_LEVEL,
    production: vars.NODE_ENV === 'production',
    sourceTimeoutMs: vars.MULTIFEED_SOURCE_TIMEOUT_MS,
    telemetry: vars.MULTIFEED_TELEMETRY,
    sources: parseSourcesJson(vars.MULTIFEED_SOURCES),
  };
}
