import { sql } from 'drizzle-orm';
import type { Database } from './index.js';
import type { Logger } from '../logger.js';

export async function migrate(db: Database, logger: Logger): Promise<void> {
  logger.info('📦 [Migrate] Creating database tables...');

  try {
    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS tasks (
        id SERIAL PRIMARY KEY,
        content TEXT NOT NULL,
        done BOOLEAN NOT NULL DEFAULT FALSE,
        user_id TEXT NOT NULL
      )
    `);

    await db.execute(sql`
      CREATE INDEX IF NOT EXISTS tasks_user_id_idx ON tasks (user_id)
    `);

    logger.info('✅ [Migrate] Database tables created successfully');
  } catch (error) {
    logger.error({ err: error }, '❌ [Migrate] Error creating tables');
    throw error;
  }
}
