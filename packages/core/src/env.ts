import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error'])
    .default('info'),
})

export type BaseEnv = z.infer<typeof baseEnvSchema>

export interface EnvLoadOptions {
  /** Path to a .env file; defaults to `.env` in the working directory */
  envPath?: string
  /** Variables to validate; defaults to `process.env` after the .env file is applied */
  source?: Record<string, string | undefined>
}

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @returns Validated environment variables
 * @throws ZodError when the environment does not match the schema
 */
export function loadEnvVariables<T extends z.ZodType>(
  schema: T,
  options: EnvLoadOptions = {},
): z.infer<T> {
  if (options.source) {
    return schema.parse(options.source)
  }

  // Load environment variables from .env file
  dotenvConfig({ path: options.envPath })

  return schema.parse(process.env)
}

/**
 * Load base environment variables
 */
export function loadBaseEnv(options: EnvLoadOptions = {}): BaseEnv {
  return loadEnvVariables(baseEnvSchema, options)
}

/**
 * Create a complete environment schema by extending the base schema
 * @param additionalSchema - Additional schema to extend the base schema with
 * @returns Combined schema
 */
export function createEnvSchema<T extends z.ZodRawShape>(additionalSchema: T) {
  return baseEnvSchema.extend(additionalSchema)
}
