import fs from 'node:fs';
import path from 'node:path';
import { connectDB } from '../config/database';
import { loadConfig } from '../config/env';
import { describeError } from '../utils/errors';
import { AppLogger } from '../utils/logger';

const SCHEMA_PATH = path.join(__dirname, '../../database/schema.sql');

export const splitStatements = (sql: string): string[] =>
  sql
    .split('\n')
    .filter((line) => !line.trim().startsWith('--'))
    .join('\n')
    .split(';')
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);

const run = async () => {
  const config = loadConfig();
  const logger = new AppLogger({ level: config.logLevel });
  const statements = splitStatements(fs.readFileSync(SCHEMA_PATH, 'utf8'));

  const pool = await connectDB(config.database, logger);
  try {
    for (const statement of statements) {
      await pool.query(statement);
    }
    logger.info('database.migrated', { statements: statements.length });
  } catch (error) {
    logger.error('database.migrate_failed', { error: describeError(error) });
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
};

if (require.main === module) {
  run().catch((error: unknown) => {
    console.error('Migration failed:', describeError(error));
    process.exit(1);
  });
}
