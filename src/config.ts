import { z } from 'zod';
import { ConfigError } from './errors.js';

const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const ConfigSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  SEARCH_TABLE: z
    .string()
    .regex(/^[a-zA-Z_][a-zA-Z0-9_]{0,62}$/, 'must be a plain SQL identifier')
    .default('documents'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  // Reject deprecated field names instead of logging a warning.
  STRICT_PARSING: BooleanFlag,
});

export type SearchConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): SearchConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const [key, messages] of Object.entries(result.error.flatten().fieldErrors)) {
      if (messages !== undefined) fieldErrors[key] = messages;
    }
    throw new ConfigError(fieldErrors);
  }
  return result.data;
}
