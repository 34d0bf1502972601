import { describe, expect, it } from 'vitest'
import { formatUsage, parseCliArgs, parseNumberArg, requireValue, type CliCommand } from './cli'
import { ConfigError } from './errors'

const buildCommand = (overrides: Partial<CliCommand> = {}): CliCommand => ({
  name: 'sales-aggregation',
  description: 'Aggregate sales',
  options: [
    { name: 'input', valueName: 'path', required: true, description: 'Input CSV' },
    { name: 'debug', description: 'Verbose logging' },
  ],
  ...overrides,
})

describe('parseCliArgs', () => {
  it('collects values and switches', () => {
    const parsed = parseCliArgs(['--input', 'data.csv', '--debug'], buildCommand())
    expect(requireValue(parsed, 'input')).toBe('data.csv')
    expect(parsed.switches.has('debug')).toBe(true)
    expect(parsed.help).toBe(false)
  })

  it('stops at --help without checking required flags', () => {
    expect(parseCliArgs(['-h'], buildCommand()).help).toBe(true)
  })

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--nope'], buildCommand())).toThrow('Unknown argument: --nope')
  })

  it('rejects a flag without a value', () => {
    expect(() => parseCliArgs(['--input'], buildCommand())).toThrow('Missing value for --input')
    expect(() => parseCliArgs(['--input', '--debug'], buildCommand())).toThrow(ConfigError)
  })

  it('rejects a missing required flag', () => {
    expect(() => parseCliArgs([], buildCommand())).toThrow(
      'Missing required argument: --input <path>'
    )
  })
})

describe('parseNumberArg', () => {
  it('parses finite numbers', () => {
    expect(parseNumberArg('250.5', 'high-value-threshold')).toBe(250.5)
  })

  it('rejects blanks and text', () => {
    expect(() => parseNumberArg('', 'x')).toThrow(ConfigError)
    expect(() => parseNumberArg('lots', 'x')).toThrow('Invalid numeric value for --x: lots')
  })
})

describe('formatUsage', () => {
  it('lists every option and the help flag', () => {
    const usage = formatUsage(buildCommand())
    expect(usage.split('\n')[0]).toBe('Usage: sales-aggregation [options]')
    expect(usage).toContain('--input <path>')
    expect(usage).toContain('(required)')
    expect(usage).toContain('-h, --help')
  })
})
