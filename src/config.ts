import { z } from 'zod/v4';
import { ConfigurationError } from './errors.js';

const configSchema = z.object({
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  locale: z.string().min(1).default('en'),
  localesDir: z.string().min(1).optional(),
  databaseUrl: z.string().min(1).optional(),
});

export type CrudforgeConfig = z.output<typeof configSchema>;
export type CrudforgeConfigInput = z.input<typeof configSchema>;

function definedEntries(values: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value !== '') out[key] = value;
  }
  return out;
}

/**
 * Resolves configuration: explicit overrides, then environment variables,
 * then defaults.
 *
 * Environment: CRUDFORGE_LOG_LEVEL, CRUDFORGE_LOCALE, CRUDFORGE_LOCALES_DIR, DATABASE_URL.
 */
export function resolveConfig(
  overrides: CrudforgeConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): CrudforgeConfig {
  const fromEnv = definedEntries({
    logLevel: env['CRUDFORGE_LOG_LEVEL'],
    locale: env['CRUDFORGE_LOCALE'],
    localesDir: env['CRUDFORGE_LOCALES_DIR'],
    databaseUrl: env['DATABASE_URL'],
  });

  const result = configSchema.safeParse({ ...fromEnv, ...overrides });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return result.data;
}
