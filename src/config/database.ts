import mysql from 'mysql2/promise';
import type { DatabaseConfig } from './env';
import type { AppLogger } from '../utils/logger';

export let pool: mysql.Pool | null = null;

export const createPool = (config: DatabaseConfig): mysql.Pool => {
  const { host, user, password, database } = config;
  if (!host || !user || !password || !database) {
    throw new Error(
      'Missing database environment variables. Required: MYSQLHOST/DB_HOST, MYSQLUSER/DB_USER, MYSQLPASSWORD/DB_PASSWORD, MYSQLDATABASE/DB_NAME'
    );
  }

  return mysql.createPool({
    host,
    user,
    password,
    database,
    port: config.port,
    waitForConnections: true,
    connectionLimit: config.connectionLimit,
    queueLimit: 0,
    connectTimeout: 10000,
    timezone: 'Z',
    // DAILY_POINTS_LOG.log_date is a calendar key, not an instant
    dateStrings: ['DATE'],
    multipleStatements: false,
  });
};

export const connectDB = async (config: DatabaseConfig, logger: AppLogger): Promise<mysql.Pool> => {
  // Reuse the pool once created
  if (pool) return pool;

  logger.info('database.connecting', {
    host: config.host,
    database: config.database,
    port: config.port,
  });

  const created = createPool(config);
  try {
    await created.query('SELECT 1 + 1 AS result');
  } catch (error) {
    await created.end();
    throw error;
  }

  pool = created;
  logger.info('database.connected', { connection_limit: config.connectionLimit });
  return pool;
};
