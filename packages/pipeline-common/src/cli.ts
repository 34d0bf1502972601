/* eslint-disable no-console */
import { ConfigError, isAnalyticsError } from './errors'

/**
 * Describes one command-line option.
 */
export interface CliOption {
  /** Flag without dashes, e.g. "input" for --input. */
  name: string
  /** Placeholder shown in usage; options without one are boolean switches. */
  valueName?: string
  required?: boolean
  description: string
}

export interface CliCommand {
  name: string
  description: string
  options: CliOption[]
}

export interface ParsedArgs {
  help: boolean
  values: Map<string, string>
  switches: Set<string>
}

/**
 * Options every report command accepts.
 */
export const COMMON_OPTIONS: CliOption[] = [
  {
    name: 'config',
    valueName: 'file',
    description: 'YAML config file (default: ./report-drills.config.yaml)',
  },
  { name: 'debug', description: 'Log intermediate batches and stage timings' },
]

export const formatUsage = (command: CliCommand): string => {
  const lines = command.options.map((option) => {
    const flag = option.valueName ? `--${option.name} <${option.valueName}>` : `--${option.name}`
    const required = option.required ? ' (required)' : ''
    return `  ${flag.padEnd(30)} ${option.description}${required}`
  })
  return [
    `Usage: ${command.name} [options]`,
    '',
    command.description,
    '',
    'Options:',
    ...lines,
    `  ${'-h, --help'.padEnd(30)} Show this help message`,
    '',
  ].join('\n')
}

/**
 * Parses CLI arguments against a command definition.
 * @param argv CLI arguments (excluding node and script path).
 * @throws ConfigError On unknown flags, missing values, or missing required flags.
 */
export const parseCliArgs = (argv: string[], command: CliCommand): ParsedArgs => {
  const parsed: ParsedArgs = { help: false, values: new Map(), switches: new Set() }
  const byName = new Map(command.options.map((option) => [option.name, option]))

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]

    if (arg === '--help' || arg === '-h') {
      parsed.help = true
      return parsed
    }

    const option = arg.startsWith('--') ? byName.get(arg.slice(2)) : undefined
    if (!option) {
      throw new ConfigError(`Unknown argument: ${arg}`, { argument: arg })
    }

    if (!option.valueName) {
      parsed.switches.add(option.name)
      continue
    }

    const value = argv[i + 1]
    if (value == null || value.startsWith('--')) {
      throw new ConfigError(`Missing value for ${arg}`, { argument: arg })
    }
    parsed.values.set(option.name, value)
    i += 1
  }

  for (const option of command.options) {
    if (option.required && !parsed.values.has(option.name)) {
      throw new ConfigError(`Missing required argument: --${option.name} <${option.valueName}>`, {
        argument: option.name,
      })
    }
  }

  return parsed
}

/**
 * Returns the value of a flag marked `required`; parseCliArgs has already checked presence.
 */
export const requireValue = (args: ParsedArgs, name: string): string => {
  const value = args.values.get(name)
  if (value === undefined) {
    throw new ConfigError(`Missing required argument: --${name}`, { argument: name })
  }
  return value
}

export const parseNumberArg = (value: string, flag: string): number => {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigError(`Invalid numeric value for --${flag}: ${value}`, { argument: flag })
  }
  return parsed
}

/**
 * Runs a command entry point; failures are reported on stderr with a non-zero exit code.
 */
export const runCli = (name: string, main: () => Promise<void>): void => {
  main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error)
    const code = isAnalyticsError(error) ? `${error.code}: ` : ''
    console.error(`[${name}] ${code}${message}`)
    if (error instanceof ConfigError) {
      console.error('Use --help to see valid options.')
    }
    process.exitCode = 1
  })
}
