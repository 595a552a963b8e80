#!/usr/bin/env node
/**
 * CLI entry point for the establishment reconciliation batch job
 *
 * Usage:
 *   reconcile --input ./places.csv --out-dir ./archive --trace <place-id>
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import { parseCliArgs, USAGE } from './args.js'
import { parseConfigFile, toReconcileConfigInput } from '../config/index.js'
import type { ConfigFile } from '../config/index.js'
import { runPipeline, OUTPUT_FILES } from '../pipeline/index.js'
import { createConsoleLogger } from '../utils/logger.js'
import { isReconciliationError } from '../utils/errors.js'

async function loadConfigFile(path: string | undefined): Promise<ConfigFile> {
  if (!path) return {}
  const text = await readFile(resolve(process.cwd(), path), 'utf-8')
  return parseConfigFile(text, path)
}

async function writeOutput(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, content, 'utf-8')
}

async function main(): Promise<void> {
  let logger = createConsoleLogger('info')

  try {
    const args = parseCliArgs(process.argv.slice(2))
    if (args.help) {
      console.log(USAGE)
      return
    }

    const file = await loadConfigFile(args.config)
    logger = createConsoleLogger(args.logLevel ?? file.logLevel ?? 'info')

    const reconcileConfig = toReconcileConfigInput(file)
    reconcileConfig.trace = [...(reconcileConfig.trace ?? []), ...args.trace]

    const inputPath = resolve(process.cwd(), args.input)
    logger.info('Loading data', { path: inputPath })
    const text = await readFile(inputPath, 'utf-8')

    const outDir = resolve(process.cwd(), args.outDir)
    const cleanPath = args.clean
      ? resolve(process.cwd(), args.clean)
      : join(outDir, OUTPUT_FILES.clean)

    const run = runPipeline(text, {
      config: reconcileConfig,
      logger,
      delimiter: file.delimiter,
    })
    const { outputs, result } = run

    await writeOutput(cleanPath, outputs.clean)
    logger.info('Saved clean records', { count: result.clean.length, path: cleanPath })

    const extras: Array<[string, string | undefined, number]> = [
      [OUTPUT_FILES.rejects, outputs.rejects, result.rejects.length],
      [OUTPUT_FILES.quarantine, outputs.quarantine, result.quarantine.length],
      [OUTPUT_FILES.audit, outputs.audit, result.audit.length],
    ]
    for (const [name, content, count] of extras) {
      if (content === undefined) continue
      const path = join(outDir, name)
      await writeOutput(path, content)
      logger.info('Saved output', { path, rows: count })
    }

    const reportPath = join(outDir, OUTPUT_FILES.report)
    await writeOutput(reportPath, outputs.report)
    logger.info('Saved QA report', { path: reportPath })

    logger.info('Data cleaning complete', {
      clean: result.stats.cleanRecordCount,
      uniqueIds: new Set(result.clean.map((record) => record.id)).size,
    })
  } catch (error) {
    if (isReconciliationError(error) && error.code === 'CONFIGURATION_ERROR') {
      console.error(USAGE)
    }
    logger.error('Reconciliation failed', { error })
    process.exitCode = 1
  }
}

void main()
