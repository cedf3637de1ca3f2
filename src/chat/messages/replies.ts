import type { Rejection } from '../intents.js';

export const HELP_TEXT = `Available commands:
• add <task> - Add a new task
• list - List all tasks
• done <id> - Mark task as done
• edit <id> <text> - Change a task's text
• delete <id> - Delete a task
• help - Show this message`;

export const NO_TASKS_TEXT = "📝 No tasks found. Use 'add <task>' to create your first task!";

export function formatRejection(rejection: Rejection): string {
  switch (rejection.reason) {
    case 'not_found':
      return `❌ Task with ID ${rejection.taskId} not found or doesn't belong to you`;
    case 'empty_content':
      return '❌ Task content cannot be empty';
    case 'invalid_task_id':
      return '❌ Invalid task ID';
    case 'unknown_action':
      return '❌ Unknown action';
    case 'invalid_action':
      return '❌ Invalid action';
  }
}
