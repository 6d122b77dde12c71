import { describe, it, expect } from 'vitest'
import { parseCliArgs } from '../../../src/cli/args.js'
import { UsageError } from '../../../src/errors.js'

describe('parseCliArgs', () => {
  it('positional file only → analyze with input override', () => {
    expect(parseCliArgs(['app.log'])).toEqual({ kind: 'analyze', overrides: { input: 'app.log' } })
  })

  it('maps every long option onto config keys', () => {
    expect(
      parseCliArgs([
        'app.log',
        '--format',
        'csv',
        '--top',
        '3',
        '--search',
        'disk',
        '--errors-only',
        '--details',
        '--verbose',
        '--config',
        'loglyzer.yaml',
      ]),
    ).toEqual({
      kind: 'analyze',
      configPath: 'loglyzer.yaml',
      overrides: {
        input: 'app.log',
        format: 'csv',
        top: '3',
        search: 'disk',
        errorsOnly: true,
        details: true,
        verbose: true,
      },
    })
  })

  it('accepts short flags', () => {
    expect(parseCliArgs(['-f', 'json', '-e', '-v', '-d', '-c', 'c.yaml', 'app.log'])).toEqual({
      kind: 'analyze',
      configPath: 'c.yaml',
      overrides: { input: 'app.log', format: 'json', errorsOnly: true, details: true, verbose: true },
    })
  })

  it('--top=-1 is passed through for the config schema to reject', () => {
    const command = parseCliArgs(['app.log', '--top=-1'])
    expect(command).toEqual({ kind: 'analyze', overrides: { input: 'app.log', top: '-1' } })
  })

  it('no positional → analyze without input (the config file may supply it)', () => {
    expect(parseCliArgs(['-c', 'c.yaml'])).toEqual({ kind: 'analyze', configPath: 'c.yaml', overrides: {} })
  })

  it('--help and --version win over everything else', () => {
    expect(parseCliArgs(['app.log', '--help'])).toEqual({ kind: 'help' })
    expect(parseCliArgs(['-V'])).toEqual({ kind: 'version' })
  })

  it('unknown flag → UsageError', () => {
    expect(() => parseCliArgs(['app.log', '--colour'])).toThrow(UsageError)
  })

  it('option missing its value → UsageError', () => {
    expect(() => parseCliArgs(['app.log', '--format'])).toThrow(UsageError)
  })

  it('two positionals → UsageError', () => {
    expect(() => parseCliArgs(['a.log', 'b.log'])).toThrow('expected one input file, got 2: a.log b.log')
  })
})
