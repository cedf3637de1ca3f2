import type { Task } from '../types/tasks.js';

export type TaskIntent =
  | { kind: 'add'; content: string }
  | { kind: 'list' }
  | { kind: 'done'; taskId: number }
  | { kind: 'edit'; taskId: number; content: string }
  | { kind: 'delete'; taskId: number }
  | { kind: 'show_edit_form'; taskId: number }
  | { kind: 'help' };

export type Rejection =
  | { kind: 'rejected'; reason: 'not_found'; taskId: number }
  | { kind: 'rejected'; reason: 'invalid_action' | 'unknown_action' | 'invalid_task_id' | 'empty_content' };

export type RejectionReason = Rejection['reason'];

export interface TaskChange {
  kind: 'done' | 'edited' | 'deleted';
  taskId: number;
}

export type TaskOutcome =
  | { kind: 'added'; task: Task }
  | { kind: 'listed'; tasks: Task[]; change?: TaskChange }
  | { kind: 'edit_form'; taskId: number; content: string }
  | { kind: 'help' }
  | Rejection;

export function reject(reason: Exclude<RejectionReason, 'not_found'>): Rejection {
  return { kind: 'rejected', reason };
}

export function notFound(taskId: number): Rejection {
  return { kind: 'rejected', reason: 'not_found', taskId };
}

export function describeIntent(intent: TaskIntent | Rejection): string {
  switch (intent.kind) {
    case 'add': return 'Add Task';
    case 'list': return 'List Tasks';
    case 'done': return `Mark Task #${intent.taskId} Done`;
    case 'edit': return `Edit Task #${intent.taskId}`;
    case 'delete': return `Delete Task #${intent.taskId}`;
    case 'show_edit_form': return `Show Edit Form #${intent.taskId}`;
    case 'help': return 'Help';
    case 'rejected': return `Rejected (${intent.reason})`;
  }
}
