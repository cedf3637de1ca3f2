import type { ReplyMode } from '../../config/index.js';
import type { TaskOutcome } from '../intents.js';
import type { ChatResponse } from '../types.js';
import { renderCardReply } from './taskCards.js';
import { renderTextReply } from './textReplies.js';

export interface ResponseRenderer {
  readonly mode: ReplyMode;
  render(outcome: TaskOutcome): ChatResponse;
}

export const cardRenderer: ResponseRenderer = { mode: 'cards', render: renderCardReply };
export const textRenderer: ResponseRenderer = { mode: 'text', render: renderTextReply };

export function createRenderer(mode: ReplyMode): ResponseRenderer {
  return mode === 'text' ? textRenderer : cardRenderer;
}

export { formatTaskCard, formatTaskAddedCard } from './taskCards.js';
export { HELP_TEXT, NO_TASKS_TEXT } from './replies.js';
