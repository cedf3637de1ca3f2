import type { Task } from '../../types/tasks.js';
import type { TaskOutcome } from '../intents.js';
import type { Button, Card, ChatResponse } from '../types.js';
import { formatRejection, HELP_TEXT, NO_TASKS_TEXT } from './replies.js';
import { actionButton, getStatusEmoji, taskIdParameters } from './utils.js';

export function createTaskButtons(taskId: number, done: boolean): Button[] {
  const buttons: Button[] = [];

  if (!done) {
    buttons.push(actionButton('Mark as Done', 'markDone', taskIdParameters(taskId)));
  }
  buttons.push(actionButton('Edit', 'editTask', taskIdParameters(taskId)));
  buttons.push(actionButton('Delete', 'deleteTask', taskIdParameters(taskId)));

  return buttons;
}

export function formatTaskCard(task: Task): Card {
  return {
    header: { title: `${getStatusEmoji(task.done)} Task #${task.id}` },
    sections: [
      {
        widgets: [
          { textParagraph: { text: task.content } },
          { divider: {} },
          { buttonList: { buttons: createTaskButtons(task.id, task.done) } },
        ],
      },
    ],
  };
}

export function formatTaskAddedCard(task: Task): Card {
  return {
    header: { title: '✅ Task Added', subtitle: `Task ID: ${task.id}` },
    sections: [
      {
        widgets: [
          { textParagraph: { text: task.content } },
          { divider: {} },
          { buttonList: { buttons: createTaskButtons(task.id, task.done) } },
        ],
      },
    ],
  };
}

export function formatEditFormCard(taskId: number, content: string): Card {
  const saveButton = actionButton('Save', 'editTask', taskIdParameters(taskId));

  return {
    header: { title: `✏️ Edit Task #${taskId}` },
    sections: [
      {
        widgets: [
          {
            textInput: {
              name: 'content',
              label: 'Task content:',
              type: 'SINGLE_LINE',
              value: content,
              onChangeAction: saveButton.textButton.onClick,
            },
          },
          { divider: {} },
          {
            buttonList: {
              buttons: [
                saveButton,
                actionButton('Cancel', 'list'),
              ],
            },
          },
        ],
      },
    ],
  };
}

export function renderCardReply(outcome: TaskOutcome): ChatResponse {
  switch (outcome.kind) {
    case 'added':
      return { cards: [formatTaskAddedCard(outcome.task)] };
    case 'listed':
      if (outcome.tasks.length === 0) {
        return { text: NO_TASKS_TEXT };
      }
      return { cards: outcome.tasks.map(formatTaskCard) };
    case 'edit_form':
      return { cards: [formatEditFormCard(outcome.taskId, outcome.content)] };
    case 'help':
      return { text: HELP_TEXT };
    case 'rejected':
      return { text: formatRejection(outcome) };
  }
}
