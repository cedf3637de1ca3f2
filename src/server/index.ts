import express from 'express';
import type { ErrorRequestHandler, RequestHandler } from 'express';
import type { Server } from 'node:http';
import { chatRequestSchema } from '../chat/requestSchema.js';
import type { ChatRequest } from '../chat/requestSchema.js';
import type { ChatResponse } from '../chat/types.js';
import { handleCardAction, handleChatRequest } from '../chat/handlers/index.js';
import type { ChatHandlerContext } from '../chat/handlers/index.js';

type ChatEndpoint = (request: ChatRequest, context: ChatHandlerContext) => Promise<ChatResponse>;

function chatRoute(label: string, endpoint: ChatEndpoint, context: ChatHandlerContext): RequestHandler {
  const { logger } = context;

  return async (req, res) => {
    const parsed = chatRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`);
      logger.warn({ issues }, `⚠️ [${label}] Invalid request payload`);
      res.status(400).json({ error: 'Invalid request payload', issues });
      return;
    }

    logger.info(
      { hasAction: Boolean(parsed.data.action), textLength: parsed.data.message.text.length },
      `💬 [${label}] Received request`
    );

    try {
      const response = await endpoint(parsed.data, context);
      res.json(response);
    } catch (error) {
      logger.error({ err: error }, `❌ [${label}] Error processing request`);
      res.status(500).json({ error: 'Internal server error' });
    }
  };
}

const jsonErrorHandler: ErrorRequestHandler = (err: unknown, _req, res, next) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Invalid JSON body' });
    return;
  }
  next(err);
};

export function createServer(context: ChatHandlerContext): express.Express {
  const app = express();

  app.use(express.json());

  app.post('/chat', chatRoute('Chat', handleChatRequest, context));
  app.post('/card-action', chatRoute('CardAction', handleCardAction, context));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(jsonErrorHandler);

  return app;
}

export function startServer(
  app: express.Express,
  options: { port: number; host: string },
  logger: ChatHandlerContext['logger']
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, options.host);

    server.once('listening', () => {
      logger.info(`🚀 [Server] Chat task webhook running on http://${options.host}:${options.port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
