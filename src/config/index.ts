/**
 * config — Service configuration from environment variables.
 *
 * The CLI entry point loads `.env` through dotenv before calling
 * loadConfig(); the library itself never touches the file system.
 */

import { z } from 'zod'
import { LOG_LEVELS } from '../logging/index.js'
import type { LogLevel } from '../logging/index.js'

export interface ServerConfig {
  host: string
  port: number
  logLevel: LogLevel
}

const EnvSchema = z.object({
  SERVER_HOST: z.string().trim().min(1, 'must not be empty').default('127.0.0.1'),
  SERVER_PORT: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .int('must be an integer')
    .min(1, 'must be 1-65535')
    .max(65535, 'must be 1-65535')
    .default(8080),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

/**
 * Read SERVER_HOST, SERVER_PORT and LOG_LEVEL.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    )
  }

  const { SERVER_HOST, SERVER_PORT, LOG_LEVEL } = parsed.data
  return { host: SERVER_HOST, port: SERVER_PORT, logLevel: LOG_LEVEL }
}
