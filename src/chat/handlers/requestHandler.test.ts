import { beforeEach, describe, expect, it, vi } from 'vitest';
import { InMemoryTaskStore } from '../../database/repositories/inMemoryTaskStore.js';
import { createLogger } from '../../logger.js';
import type { TaskStore } from '../../types/tasks.js';
import { cardRenderer, textRenderer, HELP_TEXT, NO_TASKS_TEXT } from '../messages/index.js';
import { chatRequestSchema } from '../requestSchema.js';
import type { ChatHandlerContext } from './requestHandler.js';
import { handleCardAction, handleChatRequest } from './requestHandler.js';

const logger = createLogger({ level: 'silent' });
const ALICE = { name: 'Alice', email: 'alice@example.com' };
const BOB = { name: 'Bob', email: 'bob@example.com' };

function textMessage(text: string, sender = ALICE) {
  return chatRequestSchema.parse({ message: { text, sender } });
}

function buttonClick(actionMethodName: string, parameters: Record<string, string>, sender = ALICE) {
  return chatRequestSchema.parse({
    message: { sender },
    action: {
      actionMethodName,
      parameters: Object.entries(parameters).map(([key, value]) => ({ key, value })),
    },
  });
}

describe('handleChatRequest (text replies)', () => {
  let store: InMemoryTaskStore;
  let context: ChatHandlerContext;

  beforeEach(() => {
    store = new InMemoryTaskStore();
    context = { store, renderer: textRenderer, logger };
  });

  it('walks through add, list, done and edit', async () => {
    expect(await handleChatRequest(textMessage('add Buy milk'), context)).toEqual({
      text: '✅ Task #1 added: Buy milk',
    });

    expect(await handleChatRequest(textMessage('list'), context)).toEqual({
      text: '📋 Your tasks:\n❌ #1 Buy milk',
    });

    expect(await handleChatRequest(textMessage('done 1'), context)).toEqual({
      text: '✅ Task #1 marked as done.\n\n📋 Your tasks:\n✅ #1 Buy milk',
    });

    expect(await handleChatRequest(textMessage('edit 1 Buy oat milk'), context)).toEqual({
      text: '✏️ Task #1 updated.\n\n📋 Your tasks:\n✅ #1 Buy oat milk',
    });

    expect(await handleChatRequest(textMessage('edit 1 '), context)).toEqual({
      text: '❌ Task content cannot be empty',
    });
    expect(await store.getContent(1, ALICE.email)).toBe('Buy oat milk');
  });

  it('gives each add a strictly increasing id', async () => {
    await handleChatRequest(textMessage('add first'), context);
    await handleChatRequest(textMessage('add second'), context);

    const tasks = await store.listByOwner(ALICE.email);
    expect(tasks.map(task => task.id)).toEqual([1, 2]);
    expect(tasks.every(task => !task.done)).toBe(true);
  });

  it('does not deduplicate identical adds', async () => {
    await handleChatRequest(textMessage('add Buy milk'), context);
    await handleChatRequest(textMessage('add Buy milk'), context);

    expect(await store.listByOwner(ALICE.email)).toHaveLength(2);
  });

  it('does not let another owner complete a task', async () => {
    await handleChatRequest(textMessage('add Secret plan'), context);

    expect(await handleChatRequest(textMessage('done 1', BOB), context)).toEqual({
      text: "❌ Task with ID 1 not found or doesn't belong to you",
    });
    expect((await store.listByOwner(ALICE.email))[0].done).toBe(false);
  });

  it('omits a deleted task from the list', async () => {
    await handleChatRequest(textMessage('add keep'), context);
    await handleChatRequest(textMessage('add drop'), context);

    expect(await handleChatRequest(textMessage('delete 2'), context)).toEqual({
      text: '🗑️ Task #2 deleted.\n\n📋 Your tasks:\n❌ #1 keep',
    });
    expect(await handleChatRequest(textMessage('list'), context)).toEqual({
      text: '📋 Your tasks:\n❌ #1 keep',
    });
  });

  it('reports an empty list', async () => {
    expect(await handleChatRequest(textMessage('list'), context)).toEqual({ text: NO_TASKS_TEXT });
  });

  it('answers unknown text with the usage message', async () => {
    expect(await handleChatRequest(textMessage('what can you do?'), context)).toEqual({ text: HELP_TEXT });
  });

  it('scopes tasks to the sender name when there is no email', async () => {
    const anonymous = { name: 'Carol', email: '' };
    await handleChatRequest(textMessage('add Water plants', anonymous), context);

    expect(await store.listByOwner('Carol')).toHaveLength(1);
  });

  it('routes requests carrying an action to the card-action path', async () => {
    await handleChatRequest(textMessage('add Buy milk'), context);

    expect(await handleChatRequest(buttonClick('markDone', { taskId: '1' }), context)).toEqual({
      text: '✅ Task #1 marked as done.\n\n📋 Your tasks:\n✅ #1 Buy milk',
    });
  });
});

describe('handleCardAction', () => {
  let store: InMemoryTaskStore;
  let context: ChatHandlerContext;

  beforeEach(() => {
    store = new InMemoryTaskStore();
    context = { store, renderer: cardRenderer, logger };
  });

  it('rejects a request without an action', async () => {
    expect(await handleCardAction(textMessage('list'), context)).toEqual({ text: '❌ Invalid action' });
  });

  it('rejects unknown actions and invalid ids without touching the store', async () => {
    const spy = vi.spyOn(store, 'markDone');

    expect(await handleCardAction(buttonClick('archive', { taskId: '1' }), context)).toEqual({
      text: '❌ Unknown action',
    });
    expect(await handleCardAction(buttonClick('markDone', { taskId: 'one' }), context)).toEqual({
      text: '❌ Invalid task ID',
    });
    expect(spy).not.toHaveBeenCalled();
  });

  it('shows the edit form prefilled with the current content', async () => {
    await store.create('Buy milk', ALICE.email);

    const response = await handleCardAction(buttonClick('editTask', { taskId: '1' }), context);

    expect(response.cards).toHaveLength(1);
    expect(response.cards?.[0].header).toEqual({ title: '✏️ Edit Task #1' });
    expect(response.cards?.[0].sections[0].widgets[0]).toEqual({
      textInput: {
        name: 'content',
        label: 'Task content:',
        type: 'SINGLE_LINE',
        value: 'Buy milk',
        onChangeAction: { action: { actionMethodName: 'editTask', parameters: { taskId: '1' } } },
      },
    });
  });

  it('does not show another owner the edit form', async () => {
    await store.create('Buy milk', ALICE.email);

    expect(await handleCardAction(buttonClick('editTask', { taskId: '1' }, BOB), context)).toEqual({
      text: "❌ Task with ID 1 not found or doesn't belong to you",
    });
  });

  it('saves submitted content from the edit form and re-lists', async () => {
    await store.create('Buy milk', ALICE.email);

    const request = chatRequestSchema.parse({
      message: { sender: ALICE },
      action: { actionMethodName: 'editTask', parameters: [{ key: 'taskId', value: '1' }] },
      common: { formInputs: { content: { stringInputs: { value: ['Buy oat milk'] } } } },
    });
    const response = await handleCardAction(request, context);

    expect(await store.getContent(1, ALICE.email)).toBe('Buy oat milk');
    expect(response.cards?.map(card => card.header?.title)).toEqual(['❌ Task #1']);
  });

  it('treats list as cancel and renders one card per task', async () => {
    await store.create('one', ALICE.email);
    await store.create('two', ALICE.email);
    await store.markDone(2, ALICE.email);

    const response = await handleCardAction(buttonClick('list', {}), context);

    expect(response.cards?.map(card => card.header?.title)).toEqual(['❌ Task #1', '✅ Task #2']);
  });

  it('deletes through the button and returns the empty-list text', async () => {
    await store.create('only', ALICE.email);

    expect(await handleCardAction(buttonClick('deleteTask', { taskId: '1' }), context)).toEqual({
      text: NO_TASKS_TEXT,
    });
  });
});

describe('storage failures', () => {
  function failingStore(): TaskStore {
    const failure = () => Promise.reject(new Error('connection refused'));
    return {
      create: failure,
      listByOwner: failure,
      markDone: failure,
      delete: failure,
      updateContent: failure,
      getContent: failure,
    };
  }

  it('propagates errors from the store', async () => {
    const context = { store: failingStore(), renderer: cardRenderer, logger };

    await expect(handleChatRequest(textMessage('add Buy milk'), context)).rejects.toThrow('connection refused');
    await expect(handleCardAction(buttonClick('markDone', { taskId: '1' }), context)).rejects.toThrow(
      'connection refused'
    );
  });

  it('still answers validation errors without the store', async () => {
    const context = { store: failingStore(), renderer: textRenderer, logger };

    expect(await handleChatRequest(textMessage('edit 3'), context)).toEqual({
      text: '❌ Task content cannot be empty',
    });
  });
});
