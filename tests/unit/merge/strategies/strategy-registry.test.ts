import { describe, it, expect, afterEach } from 'vitest'
import {
  registerStrategy,
  getStrategy,
  hasStrategy,
  getRegisteredStrategies,
  unregisterStrategy,
  clearStrategies,
  isBuiltInStrategy,
  registerBuiltInStrategies,
  union,
} from '../../../../src/merge/strategies/index.js'
import { InvalidStrategyError } from '../../../../src/merge/merge-error.js'

describe('Strategy Registry', () => {
  afterEach(() => {
    clearStrategies()
    registerBuiltInStrategies()
  })

  it('registers built-in strategies on import', () => {
    expect(getRegisteredStrategies()).toEqual(['mostFrequent', 'union'])
    expect(getStrategy('union')).toBe(union)
  })

  it('registers and removes custom strategies', () => {
    registerStrategy('preferLast', (values) => values.at(-1))

    expect(hasStrategy('preferLast')).toBe(true)
    expect(getStrategy('preferLast')(['a', 'b'])).toBe('b')
    expect(unregisterStrategy('preferLast')).toBe(true)
    expect(unregisterStrategy('preferLast')).toBe(false)
  })

  it('rejects empty names', () => {
    expect(() => registerStrategy('  ', () => undefined)).toThrow(InvalidStrategyError)
  })

  it('throws for unknown strategies', () => {
    expect(() => getStrategy('nope')).toThrow(
      "Invalid merge strategy 'nope': unknown strategy. Available strategies: mostFrequent, union"
    )
  })

  it('throws after the registry is cleared', () => {
    clearStrategies()

    expect(hasStrategy('union')).toBe(false)
    expect(() => getStrategy('union')).toThrow(InvalidStrategyError)
  })

  it('identifies built-in names', () => {
    expect(isBuiltInStrategy('mostFrequent')).toBe(true)
    expect(isBuiltInStrategy('union')).toBe(true)
    expect(isBuiltInStrategy('preferFirst')).toBe(false)
    expect(isBuiltInStrategy('preferLast')).toBe(false)
  })
})
