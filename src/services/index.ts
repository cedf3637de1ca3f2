import type { AppConfig } from '../config/index.js';
import { createDatabase } from '../db/index.js';
import { migrate } from '../db/migrate.js';
import { InMemoryTaskStore } from '../database/repositories/inMemoryTaskStore.js';
import { TaskRepository } from '../database/repositories/taskRepository.js';
import type { Logger } from '../logger.js';
import type { TaskStore } from '../types/tasks.js';

export interface TaskStoreHandle {
  store: TaskStore;
  close(): Promise<void>;
}

export async function initializeTaskStore(
  config: Pick<AppConfig, 'taskStore' | 'databaseUrl'>,
  logger: Logger
): Promise<TaskStoreHandle> {
  if (config.taskStore === 'memory') {
    logger.warn('⚠️ [Services] Using in-memory task store, tasks are lost on restart');
    return {
      store: new InMemoryTaskStore(),
      close: async () => {},
    };
  }

  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required for the postgres task store');
  }

  logger.info('🚀 [Services] Connecting to postgres task store...');
  const database = createDatabase(config.databaseUrl);

  try {
    await migrate(database.db, logger);
  } catch (error) {
    await database.close();
    throw error;
  }

  logger.info('✅ [Services] Task repository initialized');
  return {
    store: new TaskRepository(database.db),
    close: () => database.close(),
  };
}
