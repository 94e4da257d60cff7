import * as z from 'zod';
import { ConfigurationError } from './errors.js';
import type { LogLevel } from './logger.js';

export type SparqlConfig = {
  queryEndpoint?: string;
  updateEndpoint?: string;
  parse: boolean;
  timeoutMs?: number;
  logLevel: LogLevel;
};

const envSchema = z.object({
  SPARQL_ENDPOINT: z.string().url().optional(),
  SPARQL_UPDATE_ENDPOINT: z.string().url().optional(),
  SPARQL_PARSE: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),
  SPARQL_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  SPARQL_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn')
});

/** Reads client settings from the environment. Empty variables count as unset. */
export function loadConfig(env: Record<string, string | undefined> = process.env): SparqlConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid ${issue.path.join('.')}: ${issue.message}`);
  }

  const { SPARQL_ENDPOINT, SPARQL_UPDATE_ENDPOINT, SPARQL_PARSE, SPARQL_TIMEOUT_MS, SPARQL_LOG_LEVEL } = parsed.data;
  return {
    queryEndpoint: SPARQL_ENDPOINT,
    updateEndpoint: SPARQL_UPDATE_ENDPOINT ?? SPARQL_ENDPOINT,
    parse: SPARQL_PARSE,
    timeoutMs: SPARQL_TIMEOUT_MS,
    logLevel: SPARQL_LOG_LEVEL
  };
}
