/**
 * Worker configuration from environment variables
 */

import { z } from 'zod'

const DEFAULT_MAX_TEXT_BYTES = 10 * 1024 * 1024

const envSchema = z.object({
  XLS_MAX_TEXT_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_TEXT_BYTES),
  XLS_ENCODING: z.string().trim().min(1).default('utf-8'),
})

export interface WorkerConfig {
  /** Byte budget for the text rendering of one workbook */
  maxTextBytes: number
  /** Encoding handed to the spreadsheet reader */
  encoding: string
}

/**
 * Parse and validate configuration
 *
 * @throws Error if a variable is set to an invalid value
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): WorkerConfig {
  const result = envSchema.safeParse({
    XLS_MAX_TEXT_BYTES: env.XLS_MAX_TEXT_BYTES || undefined,
    XLS_ENCODING: env.XLS_ENCODING || undefined,
  })

  if (!result.success) {
    const details = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid configuration: ${details}`)
  }

  return {
    maxTextBytes: result.data.XLS_MAX_TEXT_BYTES,
    encoding: result.data.XLS_ENCODING,
  }
}

export const config = loadConfig()
