export interface Task {
  id: number;
  content: string;
  done: boolean;
  owner: string;
}

export type MutationResult = 'ok' | 'not_found';

export type EditResult = MutationResult | 'empty_content';

/**
 * Owner-scoped persistence for tasks.
 *
 * Every operation filters by owner, so a task id belonging to someone else
 * behaves exactly like an id that does not exist. "Not found" is reported
 * through the return value; only storage failures are thrown.
 */
export interface TaskStore {
  create(content: string, owner: string): Promise<Task>;
  /** Tasks of `owner`, ascending by id. */
  listByOwner(owner: string): Promise<Task[]>;
  markDone(id: number, owner: string): Promise<MutationResult>;
  delete(id: number, owner: string): Promise<MutationResult>;
  /** Rejects blank content before touching storage. */
  updateContent(id: number, owner: string, content: string): Promise<EditResult>;
  getContent(id: number, owner: string): Promise<string | null>;
}

export function isBlankContent(content: string): boolean {
  return content.trim().length === 0;
}
