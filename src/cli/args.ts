/**
 * Command-line argument parsing
 * @module cli/args
 */

import { parseArgs } from 'node:util'
import type { LogLevel } from '../utils/logger.js'
import { LOG_LEVELS } from '../utils/logger.js'
import { ConfigurationError } from '../utils/errors.js'

export const USAGE = `Usage: reconcile --input <file.csv> [options]

Options:
  --input <file>       Establishment CSV to clean (required)
  --out-dir <dir>      Directory for rejects, quarantine, audit and report (default: output)
  --clean <file>       Path of the clean CSV (default: <out-dir>/establishments_clean.csv)
  --config <file>      JSON configuration file
  --trace <id>         Collect a detail trace for this identifier (repeatable)
  --log-level <level>  debug | info | warn | error (default: info)
  --help               Show this message`

export interface CliOptions {
  input: string
  outDir: string
  clean?: string
  config?: string
  trace: string[]
  logLevel?: LogLevel
  help: boolean
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        input: { type: 'string', short: 'i' },
        'out-dir': { type: 'string', short: 'o' },
        clean: { type: 'string' },
        config: { type: 'string', short: 'c' },
        trace: { type: 'string', multiple: true },
        'log-level': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error))
  }
}

/**
 * Parses command-line arguments.
 *
 * @throws {ConfigurationError} On unknown options, a missing `--input` or a bad log level
 *
 * @example
 * ```typescript
 * parseCliArgs(['--input', 'places.csv', '--trace', 'X1', '--trace', 'X2'])
 * // { input: 'places.csv', outDir: 'output', trace: ['X1', 'X2'], help: false, ... }
 * ```
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const values = parseRawArgs(argv)

  const help = values.help ?? false
  const input = values.input ?? ''
  if (!help && input.trim() === '') {
    throw new ConfigurationError('Missing required option --input', 'input')
  }

  let logLevel: LogLevel | undefined
  const rawLevel = values['log-level']
  if (rawLevel !== undefined) {
    if (!isLogLevel(rawLevel)) {
      throw new ConfigurationError(
        `log-level must be one of: ${LOG_LEVELS.join(', ')}`,
        'log-level',
        { value: rawLevel },
      )
    }
    logLevel = rawLevel
  }

  return {
    input,
    outDir: values['out-dir'] ?? 'output',
    clean: values.clean,
    config: values.config,
    trace: values.trace ?? [],
    logLevel,
    help,
  }
}
