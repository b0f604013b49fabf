import dotenv from 'dotenv';
import { z } from 'zod';
import type { LogLevel } from '../utils/logger';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(4800),
  NODE_ENV: z.string().optional().default('development'),
  DATA_STORE: z.enum(['mysql', 'memory']).default('mysql'),
  MYSQLHOST: z.string().optional(),
  MYSQLUSER: z.string().optional(),
  MYSQLPASSWORD: z.string().optional(),
  MYSQLDATABASE: z.string().optional(),
  MYSQLPORT: z.string().optional(),
  DB_HOST: z.string().optional(),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_NAME: z.string().optional(),
  DB_PORT: z.string().optional(),
  DB_CONNECTION_LIMIT: z.coerce.number().int().min(1).default(10),
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
  JWT_EXPIRES_IN: z.string().optional().default('7d'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_PATH: z.string().optional().default(''),
  SCHEDULER_ENABLED: booleanFlag,
  DRAWING_JOB_CRON: z.string().optional().default('* * * * *'),
  FULFILLMENT_JOB_CRON: z.string().optional().default('*/15 * * * *'),
  // takes effect only when startServer() is given tracker providers
  SYNC_JOB_CRON: z.string().optional().default('*/15 * * * *'),
});

export type DatabaseConfig = {
  host?: string;
  user?: string;
  password?: string;
  database?: string;
  port: number;
  connectionLimit: number;
};

export type AppConfig = {
  port: number;
  nodeEnv: string;
  dataStore: 'mysql' | 'memory';
  database: DatabaseConfig;
  jwtSecret: string;
  jwtExpiresIn: string;
  logLevel: LogLevel;
  logPath?: string;
  scheduler: {
    enabled: boolean;
    drawingCron: string;
    fulfillmentCron: string;
    syncCron: string;
  };
};

// Railway injects MYSQL*; local setups use DB_*.
const pick = (primary?: string, fallback?: string): string | undefined =>
  primary?.trim() || fallback?.trim() || undefined;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(
      `Invalid environment: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join(', ')}`
    );
  }
  const data = parsed.data;
  const port = Number(pick(data.MYSQLPORT, data.DB_PORT) ?? '3306');
  if (!Number.isInteger(port) || port < 1) {
    throw new Error('Invalid environment: MYSQLPORT/DB_PORT must be a port number');
  }
  const logPath = data.LOG_PATH.trim() || undefined;

  return {
    port: data.PORT,
    nodeEnv: data.NODE_ENV,
    dataStore: data.DATA_STORE,
    database: {
      host: pick(data.MYSQLHOST, data.DB_HOST),
      user: pick(data.MYSQLUSER, data.DB_USER),
      password: pick(data.MYSQLPASSWORD, data.DB_PASSWORD),
      database: pick(data.MYSQLDATABASE, data.DB_NAME),
      port,
      connectionLimit: data.DB_CONNECTION_LIMIT,
    },
    jwtSecret: data.JWT_SECRET,
    jwtExpiresIn: data.JWT_EXPIRES_IN,
    logLevel: data.LOG_LEVEL,
    ...(logPath ? { logPath } : {}),
    scheduler: {
      enabled: data.SCHEDULER_ENABLED,
      drawingCron: data.DRAWING_JOB_CRON,
      fulfillmentCron: data.FULFILLMENT_JOB_CRON,
      syncCron: data.SYNC_JOB_CRON,
    },
  };
}
