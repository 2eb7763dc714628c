import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { Priority } from '../types/priority.js';

/** Live tasks only. Deleting a task removes its row; reads fill the gap with the empty slot */
export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey(),
  description: text('description').notNull(),
  assignedTo: text('assigned_to').notNull(),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  dueDate: integer('due_date').notNull(),
  priority: text('priority').$type<Priority>().notNull(),
  createdAt: integer('created_at').notNull(),
}, (table) => [
  index('idx_tasks_assigned_to').on(table.assignedTo),
  index('idx_tasks_priority').on(table.priority),
  index('idx_tasks_completed').on(table.completed),
]);
