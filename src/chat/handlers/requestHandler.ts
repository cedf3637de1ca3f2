import type { Logger } from '../../logger.js';
import { isBlankContent } from '../../types/tasks.js';
import type { TaskStore } from '../../types/tasks.js';
import { describeIntent, notFound, reject } from '../intents.js';
import type { Rejection, TaskIntent, TaskOutcome } from '../intents.js';
import type { ResponseRenderer } from '../messages/index.js';
import type { ChatRequest } from '../requestSchema.js';
import type { ChatResponse } from '../types.js';
import { collectActionParameters, dispatchAction } from './actionDispatcher.js';
import { parseCommand } from './commandParser.js';
import { resolveOwner } from './owner.js';

export interface ChatHandlerContext {
  store: TaskStore;
  renderer: ResponseRenderer;
  logger: Logger;
}

/**
 * Entry point for `/chat`. Requests carrying an action are button clicks
 * and take the card-action path; everything else is a text command.
 * Storage failures propagate to the caller.
 */
export async function handleChatRequest(
  request: ChatRequest,
  context: ChatHandlerContext
): Promise<ChatResponse> {
  if (request.action) {
    return handleCardAction(request, context);
  }

  const owner = resolveOwner(request.message.sender);
  const intent = parseCommand(request.message.text);

  return respond(intent, owner, context);
}

/** Entry point for `/card-action`. */
export async function handleCardAction(
  request: ChatRequest,
  context: ChatHandlerContext
): Promise<ChatResponse> {
  const owner = resolveOwner(request.message.sender);

  if (!request.action) {
    context.logger.warn({ owner }, '⚠️ [CardAction] Request carries no action');
    return context.renderer.render(reject('invalid_action'));
  }

  const params = collectActionParameters(request.action, request.common);
  const intent = dispatchAction(request.action.actionMethodName, params);

  return respond(intent, owner, context);
}

async function respond(
  intent: TaskIntent | Rejection,
  owner: string,
  context: ChatHandlerContext
): Promise<ChatResponse> {
  const startTime = Date.now();
  context.logger.info({ owner, intent: intent.kind }, `🔧 [RequestHandler] Handling: ${describeIntent(intent)}`);

  try {
    const outcome = await executeIntent(intent, owner, context.store);
    if (outcome.kind === 'rejected') {
      context.logger.info({ owner, reason: outcome.reason }, '📝 [RequestHandler] Request rejected');
    }
    return context.renderer.render(outcome);
  } finally {
    context.logger.debug({ responseTimeMs: Date.now() - startTime }, '⏱️ [RequestHandler] Request completed');
  }
}

async function executeIntent(
  intent: TaskIntent | Rejection,
  owner: string,
  store: TaskStore
): Promise<TaskOutcome> {
  switch (intent.kind) {
    case 'add': {
      if (isBlankContent(intent.content)) return reject('empty_content');
      const task = await store.create(intent.content, owner);
      return { kind: 'added', task };
    }

    case 'list':
      return { kind: 'listed', tasks: await store.listByOwner(owner) };

    case 'done': {
      const result = await store.markDone(intent.taskId, owner);
      if (result === 'not_found') return notFound(intent.taskId);
      return { kind: 'listed', tasks: await store.listByOwner(owner), change: { kind: 'done', taskId: intent.taskId } };
    }

    case 'edit': {
      if (isBlankContent(intent.content)) return reject('empty_content');
      const result = await store.updateContent(intent.taskId, owner, intent.content);
      if (result === 'empty_content') return reject('empty_content');
      if (result === 'not_found') return notFound(intent.taskId);
      return { kind: 'listed', tasks: await store.listByOwner(owner), change: { kind: 'edited', taskId: intent.taskId } };
    }

    case 'delete': {
      const result = await store.delete(intent.taskId, owner);
      if (result === 'not_found') return notFound(intent.taskId);
      return { kind: 'listed', tasks: await store.listByOwner(owner), change: { kind: 'deleted', taskId: intent.taskId } };
    }

    case 'show_edit_form': {
      const content = await store.getContent(intent.taskId, owner);
      if (content === null) return notFound(intent.taskId);
      return { kind: 'edit_form', taskId: intent.taskId, content };
    }

    case 'help':
      return { kind: 'help' };

    case 'rejected':
      return intent;
  }
}
