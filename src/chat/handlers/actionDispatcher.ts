import { reject } from '../intents.js';
import type { Rejection, TaskIntent } from '../intents.js';
import type { ChatAction, ChatRequest } from '../requestSchema.js';

export const TASK_ACTIONS = ['markDone', 'deleteTask', 'editTask', 'list'] as const;

export type TaskActionName = (typeof TASK_ACTIONS)[number];

export type ActionParameters = Readonly<Record<string, string>>;

type ActionHandler = (params: ActionParameters) => TaskIntent | Rejection;

const ACTION_HANDLERS: Record<TaskActionName, ActionHandler> = {
  markDone: params => withTaskId(params, taskId => ({ kind: 'done', taskId })),
  deleteTask: params => withTaskId(params, taskId => ({ kind: 'delete', taskId })),
  editTask: params =>
    withTaskId(params, taskId => {
      const content = (params.content ?? '').trim();
      return content ? { kind: 'edit', taskId, content } : { kind: 'show_edit_form', taskId };
    }),
  list: () => ({ kind: 'list' }),
};

export function isTaskActionName(name: string): name is TaskActionName {
  return Object.hasOwn(ACTION_HANDLERS, name);
}

export function dispatchAction(name: string, params: ActionParameters): TaskIntent | Rejection {
  if (!isTaskActionName(name)) {
    return reject('unknown_action');
  }
  return ACTION_HANDLERS[name](params);
}

/**
 * Integer with an optional sign, nothing else. Values outside the safe
 * integer range are treated as unparseable.
 */
export function parseTaskId(value: string | undefined): number | null {
  if (value === undefined || !/^[+-]?\d+$/.test(value)) return null;

  const id = Number(value);
  return Number.isSafeInteger(id) ? id : null;
}

/**
 * Flattens the action's key/value list into a map (later keys win). Form
 * inputs submitted with the click only fill keys the list does not carry.
 */
export function collectActionParameters(
  action: ChatAction,
  common?: ChatRequest['common']
): ActionParameters {
  const params: Record<string, string> = Object.fromEntries(
    action.parameters.map(({ key, value }) => [key, value])
  );

  for (const [name, input] of Object.entries(common?.formInputs ?? {})) {
    const value = input.stringInputs?.value[0];
    if (value !== undefined && !Object.hasOwn(params, name)) {
      params[name] = value;
    }
  }

  return params;
}

function withTaskId(
  params: ActionParameters,
  toIntent: (taskId: number) => TaskIntent
): TaskIntent | Rejection {
  const taskId = parseTaskId(params.taskId);
  return taskId === null ? reject('invalid_task_id') : toIntent(taskId);
}
