import { z } from 'zod';
import type { LogLevel } from '../logger.js';

export type TaskStoreKind = 'postgres' | 'memory';
export type ReplyMode = 'cards' | 'text';

export interface AppConfig {
  port: number;
  host: string;
  databaseUrl?: string;
  taskStore: TaskStoreKind;
  replyMode: ReplyMode;
  logLevel: LogLevel;
  nodeEnv: 'development' | 'production' | 'test';
}

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(5001),
    HOST: z.string().min(1).default('0.0.0.0'),
    DATABASE_URL: z.string().url().optional(),
    TASK_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    REPLY_MODE: z.enum(['cards', 'text']).default('cards'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .superRefine((env, ctx) => {
    if (env.TASK_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when TASK_STORE=postgres',
      });
    }
  });

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(issue => `  • ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    host: values.HOST,
    databaseUrl: values.DATABASE_URL,
    taskStore: values.TASK_STORE,
    replyMode: values.REPLY_MODE,
    logLevel: values.LOG_LEVEL,
    nodeEnv: values.NODE_ENV,
  };
}
