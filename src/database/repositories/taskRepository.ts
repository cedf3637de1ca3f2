import { and, asc, eq } from 'drizzle-orm';
import type { Database } from '../../db/index.js';
import { tasks } from '../../db/schema.js';
import { isBlankContent } from '../../types/tasks.js';
import type { EditResult, MutationResult, Task, TaskStore } from '../../types/tasks.js';

// Upper bound of a postgres SERIAL; larger ids can never match a row.
const MAX_SERIAL_ID = 2_147_483_647;

function isStorableId(id: number): boolean {
  return Number.isInteger(id) && id > 0 && id <= MAX_SERIAL_ID;
}

export class TaskRepository implements TaskStore {
  constructor(private readonly db: Database) {}

  async create(content: string, owner: string): Promise<Task> {
    const [row] = await this.db
      .insert(tasks)
      .values({ content, userId: owner })
      .returning();

    return this.mapToTask(row);
  }

  async listByOwner(owner: string): Promise<Task[]> {
    const results = await this.db
      .select()
      .from(tasks)
      .where(eq(tasks.userId, owner))
      .orderBy(asc(tasks.id));

    return results.map(this.mapToTask);
  }

  async markDone(id: number, owner: string): Promise<MutationResult> {
    if (!isStorableId(id)) return 'not_found';

    const updated = await this.db
      .update(tasks)
      .set({ done: true })
      .where(and(eq(tasks.id, id), eq(tasks.userId, owner)))
      .returning({ id: tasks.id });

    return updated.length > 0 ? 'ok' : 'not_found';
  }

  async delete(id: number, owner: string): Promise<MutationResult> {
    if (!isStorableId(id)) return 'not_found';

    const deleted = await this.db
      .delete(tasks)
      .where(and(eq(tasks.id, id), eq(tasks.userId, owner)))
      .returning({ id: tasks.id });

    return deleted.length > 0 ? 'ok' : 'not_found';
  }

  async updateContent(id: number, owner: string, content: string): Promise<EditResult> {
    if (isBlankContent(content)) return 'empty_content';
    if (!isStorableId(id)) return 'not_found';

    const updated = await this.db
      .update(tasks)
      .set({ content })
      .where(and(eq(tasks.id, id), eq(tasks.userId, owner)))
      .returning({ id: tasks.id });

    return updated.length > 0 ? 'ok' : 'not_found';
  }

  async getContent(id: number, owner: string): Promise<string | null> {
    if (!isStorableId(id)) return null;

    const result = await this.db
      .select({ content: tasks.content })
      .from(tasks)
      .where(and(eq(tasks.id, id), eq(tasks.userId, owner)))
      .limit(1);

    return result[0]?.content ?? null;
  }

  private mapToTask(row: typeof tasks.$inferSelect): Task {
    return {
      id: row.id,
      content: row.content,
      done: row.done,
      owner: row.userId,
    };
  }
}
