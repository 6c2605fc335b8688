/**
 * Configuration.
 *
 * Loads and validates settings from environment variables (a local .env is
 * read through dotenv). Any invalid or missing setting is fatal.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from './domain/errors';
import { LogLevel, parseLogLevel } from './logger';

const iterationCap = (fallback: number) => z.coerce.number().int().min(1).max(10).default(fallback);

const envSchema = z.object({
  GOOGLE_API_KEY: z.string().min(1, 'GOOGLE_API_KEY is required'),
  SERPER_API_KEY: z.string().min(1, 'SERPER_API_KEY is required'),

  GENERATION_MODEL: z.string().min(1).default('gemini-flash-latest'),
  GENERATION_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(1),

  ANALYSIS_MAX_STEPS: iterationCap(5),
  SEARCH_MAX_ITERATIONS: iterationCap(3),
  CHART_MAX_ITERATIONS: iterationCap(3),

  AUDIT_LOG_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  INSPECTION_PORT: z.coerce.number().int().min(0).max(65535).default(5000),
});

export interface Config {
  generation: {
    apiKey: string;
    model: string;
    maxAttempts: number;
  };
  search: {
    apiKey: string;
  };
  loops: {
    analysisMaxSteps: number;
    searchMaxIterations: number;
    chartMaxIterations: number;
  };
  auditLogPath?: string;
  logLevel: LogLevel;
  inspectionPort: number;
}

/**
 * Validate the environment and build the typed configuration.
 * @throws ConfigurationError listing every offending key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset so defaults apply.
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(cleaned);

  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    const details = parsed.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new ConfigurationError(`Configuration validation failed:\n${details}`, keys);
  }

  const data = parsed.data;
  return {
    generation: {
      apiKey: data.GOOGLE_API_KEY,
      model: data.GENERATION_MODEL,
      maxAttempts: data.GENERATION_MAX_ATTEMPTS,
    },
    search: { apiKey: data.SERPER_API_KEY },
    loops: {
      analysisMaxSteps: data.ANALYSIS_MAX_STEPS,
      searchMaxIterations: data.SEARCH_MAX_ITERATIONS,
      chartMaxIterations: data.CHART_MAX_ITERATIONS,
    },
    auditLogPath: data.AUDIT_LOG_PATH,
    logLevel: parseLogLevel(data.LOG_LEVEL),
    inspectionPort: data.INSPECTION_PORT,
  };
}
