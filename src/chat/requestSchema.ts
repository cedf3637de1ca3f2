import { z } from 'zod';

/**
 * Inbound webhook payload shared by `/chat` and `/card-action`.
 * Fields the chat client sends that are not listed here are stripped.
 */
export const chatRequestSchema = z.object({
  message: z
    .object({
      text: z.string().default(''),
      sender: z
        .object({
          name: z.string().default(''),
          email: z.string().default(''),
        })
        .default({}),
    })
    .default({}),
  action: z
    .object({
      actionMethodName: z.string(),
      parameters: z
        .array(z.object({ key: z.string(), value: z.string() }))
        .nullish()
        .transform(parameters => parameters ?? []),
    })
    .nullish(),
  common: z
    .object({
      formInputs: z
        .record(
          z.object({
            stringInputs: z.object({ value: z.array(z.string()) }).optional(),
          })
        )
        .optional(),
    })
    .nullish(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;
export type ChatAction = NonNullable<ChatRequest['action']>;
