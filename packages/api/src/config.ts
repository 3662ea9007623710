import { z } from 'zod'

/**
 * Provider environment of the receiver server.
 * Listening settings (PORT, HOST, RECEIVER_PREFIX) are read by @fastify/env in server.ts.
 */
export const envSchema = z.object({
  LOG_LEVEL: z.string().default('info'),
  /** Alias of the PSWin account, used in callback URLs */
  PSWIN_ALIAS: z.string().min(1).default('main'),
  PSWIN_USER: z.string().min(1, 'PSWIN_USER is required'),
  PSWIN_PASSWORD: z.string().min(1, 'PSWIN_PASSWORD is required'),
  /** An empty value means no default sender */
  PSWIN_SENDER_ID: z
    .string()
    .optional()
    .transform((value) => value || undefined),
  PSWIN_API_URL: z.string().url().optional(),
})

export type Env = z.infer<typeof envSchema>

/**
 * Parse and validate the environment
 * @throws {z.ZodError} If a required variable is missing or invalid
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(env)
}
