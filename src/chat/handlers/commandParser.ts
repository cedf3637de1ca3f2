/**
 * Command Parser
 *
 * Classifies a chat message into a task intent.
 *
 * Supported patterns (keywords are lowercase and matched exactly):
 *   add <task>           - Add a new task
 *   list                 - List your tasks
 *   done <id>            - Mark a task as done
 *   edit <id> <text>     - Replace a task's text
 *   delete <id>          - Delete a task
 *
 * Anything else, `help` included, is answered with the usage message.
 */

import type { TaskIntent } from '../intents.js';

const COMMAND_PATTERNS: { pattern: RegExp; toIntent: (match: RegExpMatchArray) => TaskIntent }[] = [
  {
    pattern: /^add\s+(.+)$/s,
    toIntent: match => ({ kind: 'add', content: match[1].trim() }),
  },
  {
    pattern: /^list$/,
    toIntent: () => ({ kind: 'list' }),
  },
  {
    pattern: /^done\s+(\d+)$/,
    toIntent: match => ({ kind: 'done', taskId: Number(match[1]) }),
  },
  {
    // `edit <id>` with nothing after it still parses, so the empty text is rejected
    pattern: /^edit\s+(\d+)(?:\s+(.*))?$/s,
    toIntent: match => ({ kind: 'edit', taskId: Number(match[1]), content: (match[2] ?? '').trim() }),
  },
  {
    pattern: /^delete\s+(\d+)$/,
    toIntent: match => ({ kind: 'delete', taskId: Number(match[1]) }),
  },
];

export function parseCommand(text: string): TaskIntent {
  const normalizedText = text.trim();

  for (const { pattern, toIntent } of COMMAND_PATTERNS) {
    const match = normalizedText.match(pattern);
    if (match) {
      return toIntent(match);
    }
  }

  return { kind: 'help' };
}
