import type { Logger } from './logger'

/**
 * Timing and record count of one pipeline stage (read, aggregate, write, ...).
 */
export interface StageMetrics {
  stage: string
  records: number
  durationMs: number
}

export interface PipelineMetrics {
  pipelineName: string
  totalDurationMs: number
  stages: StageMetrics[]
}

const countRecords = (result: unknown): number => (Array.isArray(result) ? result.length : 0)

export class MetricsCollector {
  private readonly pipelineName: string
  private readonly now: () => number
  private stages: StageMetrics[] = []

  constructor(pipelineName: string, now: () => number = () => performance.now()) {
    this.pipelineName = pipelineName
    this.now = now
  }

  /**
   * Measure a synchronous stage. Array results count as that many records.
   */
  recordStage<T>(stage: string, fn: () => T, records?: (result: T) => number): T {
    const start = this.now()
    const result = fn()
    this.push(stage, start, records ? records(result) : countRecords(result))
    return result
  }

  /**
   * Measure an async stage
   */
  async recordStageAsync<T>(
    stage: string,
    fn: () => Promise<T>,
    records?: (result: T) => number
  ): Promise<T> {
    const start = this.now()
    const result = await fn()
    this.push(stage, start, records ? records(result) : countRecords(result))
    return result
  }

  getMetrics(): PipelineMetrics {
    return {
      pipelineName: this.pipelineName,
      totalDurationMs: this.stages.reduce((sum, stage) => sum + stage.durationMs, 0),
      stages: this.stages.map((stage) => ({ ...stage })),
    }
  }

  reset(): void {
    this.stages = []
  }

  /**
   * Log the stage breakdown at debug level
   */
  printSummary(logger: Logger): void {
    const metrics = this.getMetrics()
    logger.debug(`=== ${metrics.pipelineName} stages ===`)
    for (const stage of metrics.stages) {
      const share =
        metrics.totalDurationMs === 0 ? 0 : (stage.durationMs / metrics.totalDurationMs) * 100
      logger.debug(
        `${stage.stage}: ${stage.records} records in ${stage.durationMs.toFixed(2)}ms (${share.toFixed(1)}%)`
      )
    }
    logger.debug(`total: ${metrics.totalDurationMs.toFixed(2)}ms`)
  }

  private push(stage: string, start: number, records: number): void {
    this.stages.push({ stage, records, durationMs: this.now() - start })
  }
}
