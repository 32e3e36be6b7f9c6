// Process configuration
//
// Everything the server reads from the environment goes through this schema,
// so a bad deployment fails at startup with every problem listed at once.

import { z } from 'zod';

/**
 * Parse `name:token,name:token` into a token -> principal map.
 */
const ApiTokensSchema = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const tokens = new Map<string, string>();
    if (!value) return tokens;

    for (const pair of value.split(',')) {
      const trimmed = pair.trim();
      if (trimmed === '') continue;

      const separator = trimmed.indexOf(':');
      const name = trimmed.slice(0, separator).trim();
      const token = trimmed.slice(separator + 1).trim();
      if (separator <= 0 || name === '' || token === '') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected name:token, got "${trimmed}"`,
        });
        return z.NEVER;
      }
      tokens.set(token, name);
    }
    return tokens;
  });

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATABASE_URL: z.string().url().optional(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  BHR_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  BHR_API_TOKENS: ApiTokensSchema,
});

export type ServerConfig = {
  env: 'development' | 'test' | 'production';
  port: number;
  host: string;
  databaseUrl?: string;
  databaseMaxConnections: number;
  sweepIntervalMs: number;
  /** Bearer token -> principal name */
  apiTokens: Map<string, string>;
};

/**
 * Error for an environment that does not satisfy the schema
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Read server configuration from environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    databaseUrl: parsed.DATABASE_URL,
    databaseMaxConnections: parsed.DATABASE_MAX_CONNECTIONS,
    sweepIntervalMs: parsed.BHR_SWEEP_INTERVAL_MS,
    apiTokens: parsed.BHR_API_TOKENS,
  };
}
