import { describe, expect, it } from 'vitest'
import { createLogger } from './logger'
import { MetricsCollector } from './metrics'

const buildClock = (ticks: number[]) => {
  let index = 0
  return () => {
    const value = ticks[Math.min(index, ticks.length - 1)]
    index += 1
    return value
  }
}

describe('MetricsCollector', () => {
  it('records stage durations and array lengths', async () => {
    const collector = new MetricsCollector('sales', buildClock([0, 5, 10, 30]))
    const rows = collector.recordStage('read', () => [1, 2, 3])
    const total = await collector.recordStageAsync('aggregate', async () => rows.length, (n) => n)

    expect(total).toBe(3)
    expect(collector.getMetrics()).toEqual({
      pipelineName: 'sales',
      totalDurationMs: 25,
      stages: [
        { stage: 'read', records: 3, durationMs: 5 },
        { stage: 'aggregate', records: 3, durationMs: 20 },
      ],
    })
  })

  it('counts non-array results as zero records', () => {
    const collector = new MetricsCollector('x', buildClock([0, 1]))
    collector.recordStage('write', () => 'done')
    expect(collector.getMetrics().stages[0].records).toBe(0)
  })

  it('clears stages on reset', () => {
    const collector = new MetricsCollector('x', buildClock([0, 1]))
    collector.recordStage('read', () => [])
    collector.reset()
    expect(collector.getMetrics().stages).toEqual([])
  })

  it('prints the summary through the logger at debug level', () => {
    const lines: string[] = []
    const collector = new MetricsCollector('etl', buildClock([0, 4]))
    collector.recordStage('read', () => [1, 2])
    collector.printSummary(createLogger('etl', { debug: true, sink: (line) => lines.push(line) }))

    expect(lines).toHaveLength(3)
    expect(lines[1]).toContain('read: 2 records in 4.00ms (100.0%)')
    expect(lines[2]).toContain('total: 4.00ms')
  })
})
