// apps/server/src/config.ts
//
// Server configuration, read from the environment (`.env` is loaded by
// `dotenv/config` at boot).
//
//   PORT              listen port                         (8088)
//   HOST              bind address                        (0.0.0.0)
//   LOG_LEVEL         pino level                          (info)
//   DICTIONARY_FILE   newline-delimited word list         (apps/server/data/words.txt)
//   NARROW_GUESS_POOL filter suggestions with every clue  (false)
//   MAX_SESSIONS      API sessions kept before evicting   (1000)

import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export const DEFAULT_DICTIONARY_FILE = fileURLToPath(
  new URL('../data/words.txt', import.meta.url),
);

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8088),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  DICTIONARY_FILE: z.string().min(1).default(DEFAULT_DICTIONARY_FILE),
  NARROW_GUESS_POOL: flag,
  MAX_SESSIONS: z.coerce.number().int().min(1).default(1000),
});

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  dictionaryFile: string;
  narrowGuessPool: boolean;
  maxSessions: number;
}

/**
 * loadConfig validates the environment.
 *
 * @throws Error listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    dictionaryFile: e.DICTIONARY_FILE,
    narrowGuessPool: e.NARROW_GUESS_POOL,
    maxSessions: e.MAX_SESSIONS,
  };
}
