import { pgTable, serial, text, boolean, index } from 'drizzle-orm/pg-core';

export const tasks = pgTable(
  'tasks',
  {
    id: serial('id').primaryKey(),
    content: text('content').notNull(),
    done: boolean('done').notNull().default(false),
    userId: text('user_id').notNull(),
  },
  (table) => [index('tasks_user_id_idx').on(table.userId)]
);
