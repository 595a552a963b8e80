import { describe, it, expect } from 'vitest'
import { parseCliArgs } from '../../../src/cli/args.js'
import { ConfigurationError } from '../../../src/utils/errors.js'

describe('parseCliArgs', () => {
  it('parses long options and repeated traces', () => {
    expect(parseCliArgs(['--input', 'places.csv', '--trace', 'X1', '--trace', 'X2'])).toEqual({
      input: 'places.csv',
      outDir: 'output',
      trace: ['X1', 'X2'],
      help: false,
    })
  })

  it('parses short options', () => {
    const options = parseCliArgs(['-i', 'a.csv', '-o', 'out', '-c', 'settings.json'])

    expect(options.input).toBe('a.csv')
    expect(options.outDir).toBe('out')
    expect(options.config).toBe('settings.json')
  })

  it('accepts a log level', () => {
    expect(parseCliArgs(['--input', 'a.csv', '--log-level', 'debug']).logLevel).toBe('debug')
  })

  it('allows --help without input', () => {
    expect(parseCliArgs(['--help']).help).toBe(true)
  })

  it('requires --input', () => {
    expect(() => parseCliArgs([])).toThrow('Missing required option --input')
  })

  it('rejects unknown log levels', () => {
    expect(() => parseCliArgs(['--input', 'a.csv', '--log-level', 'loud'])).toThrow(
      'log-level must be one of: debug, info, warn, error'
    )
  })

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--input', 'a.csv', '--verbose'])).toThrow(ConfigurationError)
  })
})
