/**
 * JSON configuration file schema
 * @module config/config-file
 */

import { z } from 'zod'
import type { ReconcileConfigInput } from './reconcile-config.js'
import { ConfigurationError } from '../utils/errors.js'

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])

export const configFileSchema = z
  .object({
    defaultKeywords: z
      .object({
        en: z.string().min(1).optional(),
        fr: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    phone: z
      .object({
        countryCode: z.string().regex(/^\d{1,3}$/).optional(),
        prefix: z.string().optional(),
      })
      .strict()
      .optional(),
    trace: z.array(z.string().min(1)).optional(),
    billingSeparator: z.string().min(1).optional(),
    faxSeparator: z.string().min(1).optional(),
    delimiter: z.string().length(1).optional(),
    logLevel: logLevelSchema.optional(),
  })
  .strict()

export type ConfigFile = z.infer<typeof configFileSchema>

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)'
      return `- ${path}: ${issue.message}`
    })
    .join('\n')
}

/**
 * Parses and validates the text of a JSON configuration file.
 *
 * @throws {ConfigurationError} If the text is not JSON or does not match the schema
 *
 * @example
 * ```typescript
 * parseConfigFile('{"trace":["ChIJtest-place"],"logLevel":"debug"}')
 * // { trace: ['ChIJtest-place'], logLevel: 'debug' }
 * ```
 */
export function parseConfigFile(text: string, source = 'config'): ConfigFile {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new ConfigurationError(
      `Invalid JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`,
    )
  }

  const parsed = configFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${source}:\n${formatZodIssues(parsed.error)}`)
  }
  return parsed.data
}

/**
 * Extracts the reconciliation part of a configuration file
 */
export function toReconcileConfigInput(file: ConfigFile): ReconcileConfigInput {
  return {
    defaultKeywords: file.defaultKeywords,
    phone: file.phone,
    trace: file.trace,
    billingSeparator: file.billingSeparator,
    faxSeparator: file.faxSeparator,
  }
}
