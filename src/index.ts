import { config } from 'dotenv';
config();

import { loadConfig } from './config/index.js';
import { createLogger } from './logger.js';
import { createRenderer } from './chat/messages/index.js';
import { createServer, startServer } from './server/index.js';
import { initializeTaskStore } from './services/index.js';

async function main(): Promise<void> {
  const appConfig = loadConfig();
  const logger = createLogger({ level: appConfig.logLevel });

  logger.info(
    {
      taskStore: appConfig.taskStore,
      replyMode: appConfig.replyMode,
      nodeEnv: appConfig.nodeEnv,
    },
    '🚀 [Startup] Initializing chat task webhook...'
  );

  const { store, close } = await initializeTaskStore(appConfig, logger);
  const app = createServer({
    store,
    renderer: createRenderer(appConfig.replyMode),
    logger: logger.child({ component: 'chat' }),
  });
  const server = await startServer(app, appConfig, logger);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`🛑 [Shutdown] Received ${signal}, closing server...`);
    server.close(error => {
      if (error) {
        logger.error({ err: error }, '❌ [Shutdown] Error closing server');
      }
      close().then(
        () => process.exit(error ? 1 : 0),
        (closeError: unknown) => {
          logger.error({ err: closeError }, '❌ [Shutdown] Error closing task store');
          process.exit(1);
        }
      );
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('❌ [Startup] Failed to start:', error);
  process.exit(1);
});
