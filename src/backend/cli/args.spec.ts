import { parseOptions } from '@backend/cli/args'
import { InvalidInputError } from '@backend/errors'
import { describe, expect, it } from 'vitest'

const SPEC = { satLong: 'value', rxLat: 'value', freq: 'value', json: 'flag' } as const

function issuesOf(argv: string[]): string[] {
  try {
    parseOptions(argv, SPEC)
  } catch (error) {
    if (error instanceof InvalidInputError) return error.issues
    throw error
  }
  return []
}

describe('parseOptions', () => {
  it('should return camelCase keys for kebab-case options', () => {
    expect(parseOptions(['--sat-long', '-95', '--rx-lat=33'], SPEC)).toEqual({
      values: { satLong: '-95', rxLat: '33' },
      flags: {},
    })
  })

  it('should set bare flags', () => {
    expect(parseOptions(['--json', '--freq', '12e9'], SPEC)).toEqual({
      values: { freq: '12e9' },
      flags: { json: true },
    })
  })

  it('should keep everything after the first equals sign', () => {
    expect(parseOptions(['--freq=1=2'], SPEC).values.freq).toBe('1=2')
  })

  it('should let a later value override an earlier one', () => {
    expect(parseOptions(['--freq', '1', '--freq', '2'], SPEC).values.freq).toBe('2')
  })

  it('should report unknown options and stray arguments together', () => {
    expect(issuesOf(['--frequency', '1'])).toEqual(['unknown option --frequency', "unexpected argument '1'"])
  })

  it('should reject a value on a flag', () => {
    expect(issuesOf(['--json=yes'])).toEqual(['--json does not take a value'])
  })

  it('should reject a trailing option without its value', () => {
    expect(issuesOf(['--sat-long', '-95', '--freq'])).toEqual(['--freq expects a value'])
  })

  it('should throw an InvalidInputError', () => {
    expect(() => parseOptions(['stray'], SPEC)).toThrow(InvalidInputError)
    expect(() => parseOptions(['stray'], SPEC)).toThrow('Invalid command-line arguments')
  })
})
