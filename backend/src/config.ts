import { z } from 'zod';

export type DbConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
};

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type AppConfig = {
  database: DbConfig;
  logLevel: LogLevel;
  dataDir: string;
};

const envSchema = z.object({
  POSTGRES_HOST: z.string().trim().min(1).default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  POSTGRES_USER: z.string().trim().min(1).default('studio'),
  POSTGRES_PASSWORD: z.string().default('studio'),
  POSTGRES_DB: z.string().trim().min(1).default('studio'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  IMPORT_DATA_DIR: z.string().trim().min(1).default('./data'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    database: {
      host: parsed.POSTGRES_HOST,
      port: parsed.POSTGRES_PORT,
      user: parsed.POSTGRES_USER,
      password: parsed.POSTGRES_PASSWORD,
      database: parsed.POSTGRES_DB,
    },
    logLevel: parsed.LOG_LEVEL,
    dataDir: parsed.IMPORT_DATA_DIR,
  };
}
