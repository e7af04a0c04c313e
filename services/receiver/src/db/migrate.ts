import { pool } from './pool.js';
import { CREATE_SCHEMA } from './sql.js';
import { logger } from '../utils/logger.js';

export async function ensureSchema(): Promise<void> {
  await pool.query(CREATE_SCHEMA);
  logger.info('database schema ready');
}
