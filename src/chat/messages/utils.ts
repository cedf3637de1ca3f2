import type { Button } from '../types.js';
import type { TaskActionName } from '../handlers/actionDispatcher.js';

export function getStatusEmoji(done: boolean): string {
  return done ? '✅' : '❌';
}

export function actionButton(
  text: string,
  actionMethodName: TaskActionName,
  parameters: Record<string, string> = {}
): Button {
  return {
    textButton: {
      text,
      onClick: {
        action: { actionMethodName, parameters },
      },
    },
  };
}

export function taskIdParameters(taskId: number): Record<string, string> {
  return { taskId: String(taskId) };
}
