import { DEFAULT_RPC_URL } from '@subreg/types'
import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

export const clientEnvSchema = z.object({
  SUBREG_RPC_URL: z.string().url().default(DEFAULT_RPC_URL),
  SUBREG_CONNECT_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(30_000),
  SUBREG_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(60_000),
  PINO_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
    .default('info'),
})

export type ClientEnv = z.infer<typeof clientEnvSchema>

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 */
export function loadEnvVariables<T extends z.ZodType>(
  schema: T,
  envPath?: string,
): z.infer<T> {
  dotenvConfig({ path: envPath })

  return schema.parse(process.env)
}

export function loadClientEnv(envPath?: string): ClientEnv {
  return loadEnvVariables(clientEnvSchema, envPath)
}
