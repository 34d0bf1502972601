import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { DEFAULT_CONFIG_FILE, DEFAULT_REPORT_CONFIG, loadReportConfig, parseConfigDocument } from './config'
import { ConfigError } from './errors'

describe('parseConfigDocument', () => {
  it('maps snake_case keys', () => {
    const content = [
      'database_url: postgresql://test:test-secret@db:5432/reports',
      'high_value_threshold: 750',
      'output_dir: charts',
      'debug: true',
    ].join('\n')
    expect(parseConfigDocument(content, 'test.yaml')).toEqual({
      databaseUrl: 'postgresql://test:test-secret@db:5432/reports',
      highValueThreshold: 750,
      outputDir: 'charts',
      debug: true,
    })
  })

  it('treats an empty document as no settings', () => {
    expect(parseConfigDocument('', 'empty.yaml')).toEqual({})
  })

  it('rejects wrong types and non-mapping documents', () => {
    expect(() => parseConfigDocument('high_value_threshold: lots', 'bad.yaml')).toThrow(
      'bad.yaml: high_value_threshold must be a number'
    )
    expect(() => parseConfigDocument('- a\n- b', 'list.yaml')).toThrow(ConfigError)
    expect(() => parseConfigDocument("output_dir: '  '", 'blank.yaml')).toThrow(
      'blank.yaml: output_dir must be a non-empty string'
    )
    expect(() => parseConfigDocument('debug: sometimes', 'flag.yaml')).toThrow(
      'flag.yaml: debug must be true or false'
    )
  })

  it('treats null values as unset and ignores unknown keys', () => {
    expect(parseConfigDocument('output_dir: null\nretries: 3', 'test.yaml')).toEqual({})
  })
})

describe('loadReportConfig', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'report-config-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('falls back to defaults without a file or environment', () => {
    expect(loadReportConfig({ cwd: dir, env: {} })).toEqual(DEFAULT_REPORT_CONFIG)
  })

  it('layers the config file under the environment', async () => {
    await writeFile(
      join(dir, DEFAULT_CONFIG_FILE),
      'high_value_threshold: 750\noutput_dir: charts\n'
    )
    const config = loadReportConfig({
      cwd: dir,
      env: { HIGH_VALUE_THRESHOLD: '900', REPORT_DRILLS_DEBUG: 'yes' },
    })
    expect(config).toEqual({
      ...DEFAULT_REPORT_CONFIG,
      highValueThreshold: 900,
      outputDir: 'charts',
      debug: true,
    })
  })

  it('requires an explicitly named file to exist', () => {
    expect(() =>
      loadReportConfig({ cwd: dir, env: {}, configPath: join(dir, 'missing.yaml') })
    ).toThrow(ConfigError)
  })

  it('rejects malformed environment values', () => {
    expect(() => loadReportConfig({ cwd: dir, env: { HIGH_VALUE_THRESHOLD: 'abc' } })).toThrow(
      'Invalid numeric value for HIGH_VALUE_THRESHOLD: abc'
    )
  })
})
