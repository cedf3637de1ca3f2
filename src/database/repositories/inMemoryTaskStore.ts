import { isBlankContent } from '../../types/tasks.js';
import type { EditResult, MutationResult, Task, TaskStore } from '../../types/tasks.js';

/**
 * Process-local TaskStore for development (`TASK_STORE=memory`) and tests.
 * Ids start at 1 and are never reused, matching a SERIAL column.
 */
export class InMemoryTaskStore implements TaskStore {
  private readonly rows = new Map<number, Task>();
  private nextId = 1;

  async create(content: string, owner: string): Promise<Task> {
    const task: Task = { id: this.nextId++, content, done: false, owner };
    this.rows.set(task.id, task);
    return { ...task };
  }

  async listByOwner(owner: string): Promise<Task[]> {
    return [...this.rows.values()]
      .filter(task => task.owner === owner)
      .sort((a, b) => a.id - b.id)
      .map(task => ({ ...task }));
  }

  async markDone(id: number, owner: string): Promise<MutationResult> {
    const task = this.find(id, owner);
    if (!task) return 'not_found';

    task.done = true;
    return 'ok';
  }

  async delete(id: number, owner: string): Promise<MutationResult> {
    if (!this.find(id, owner)) return 'not_found';

    this.rows.delete(id);
    return 'ok';
  }

  async updateContent(id: number, owner: string, content: string): Promise<EditResult> {
    if (isBlankContent(content)) return 'empty_content';

    const task = this.find(id, owner);
    if (!task) return 'not_found';

    task.content = content;
    return 'ok';
  }

  async getContent(id: number, owner: string): Promise<string | null> {
    return this.find(id, owner)?.content ?? null;
  }

  private find(id: number, owner: string): Task | undefined {
    const task = this.rows.get(id);
    return task && task.owner === owner ? task : undefined;
  }
}
