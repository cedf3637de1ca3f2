import type { Task } from '../../types/tasks.js';
import type { TaskChange, TaskOutcome } from '../intents.js';
import type { ChatResponse } from '../types.js';
import { formatRejection, HELP_TEXT, NO_TASKS_TEXT } from './replies.js';
import { getStatusEmoji } from './utils.js';

function formatTaskLine(task: Task): string {
  return `${getStatusEmoji(task.done)} #${task.id} ${task.content}`;
}

export function formatTaskList(tasks: Task[]): string {
  if (tasks.length === 0) return NO_TASKS_TEXT;
  return ['📋 Your tasks:', ...tasks.map(formatTaskLine)].join('\n');
}

function formatChange(change: TaskChange): string {
  switch (change.kind) {
    case 'done': return `✅ Task #${change.taskId} marked as done.`;
    case 'edited': return `✏️ Task #${change.taskId} updated.`;
    case 'deleted': return `🗑️ Task #${change.taskId} deleted.`;
  }
}

export function renderTextReply(outcome: TaskOutcome): ChatResponse {
  switch (outcome.kind) {
    case 'added':
      return { text: `✅ Task #${outcome.task.id} added: ${outcome.task.content}` };
    case 'listed': {
      const list = formatTaskList(outcome.tasks);
      return { text: outcome.change ? `${formatChange(outcome.change)}\n\n${list}` : list };
    }
    case 'edit_form':
      return {
        text: `✏️ Task #${outcome.taskId}: ${outcome.content}\n` +
          `Send \`edit ${outcome.taskId} <new text>\` to change it.`,
      };
    case 'help':
      return { text: HELP_TEXT };
    case 'rejected':
      return { text: formatRejection(outcome) };
  }
}
