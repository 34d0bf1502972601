import type { ReactElement } from 'react'
import { renderToStaticMarkup } from 'react-dom/server'
import { Bar, BarChart, CartesianGrid, Line, LineChart, XAxis, YAxis } from 'recharts'

export const CHART_WIDTH = 720
export const CHART_HEIGHT = 420

const TITLE_HEIGHT = 40
const PLOT_HEIGHT = CHART_HEIGHT - TITLE_HEIGHT
const PLOT_MARGIN = { top: 10, right: 20, bottom: 40, left: 30 }
const SERIES_COLOR = '#4c78a8'
const SVG_NAMESPACE = 'http://www.w3.org/2000/svg'

export interface ChartPoint {
  label: string
  value: number
}

export interface ChartOptions {
  title: string
  xLabel: string
  yLabel: string
  points: readonly ChartPoint[]
}

export interface BarChartOptions extends ChartOptions {
  /** Horizontal bars list categories top to bottom. */
  orientation?: 'vertical' | 'horizontal'
}

// recharts wraps its surface in a div; only the svg element goes into the artifact.
const extractSurface = (markup: string): string => {
  const start = markup.indexOf('<svg')
  const end = markup.lastIndexOf('</svg>')
  if (start === -1 || end === -1) {
    throw new Error('chart markup contains no svg element')
  }
  return markup.slice(start, end + '</svg>'.length)
}

const renderDocument = (title: string, chart: ReactElement | undefined): string => {
  const surface = chart === undefined ? undefined : extractSurface(renderToStaticMarkup(chart))
  const svgDocument = (
    <svg
      xmlns={SVG_NAMESPACE}
      width={CHART_WIDTH}
      height={CHART_HEIGHT}
      viewBox={`0 0 ${CHART_WIDTH} ${CHART_HEIGHT}`}
      fontFamily="sans-serif"
      fontSize={12}
    >
      <rect width={CHART_WIDTH} height={CHART_HEIGHT} fill="#ffffff" />
      <text x={CHART_WIDTH / 2} y={28} textAnchor="middle" fontSize={16}>
        {title}
      </text>
      {surface === undefined ? (
        <text x={CHART_WIDTH / 2} y={CHART_HEIGHT / 2} textAnchor="middle">
          No data
        </text>
      ) : (
        <g
          transform={`translate(0 ${TITLE_HEIGHT})`}
          dangerouslySetInnerHTML={{ __html: surface }}
        />
      )}
    </svg>
  )
  return `${renderToStaticMarkup(svgDocument)}\n`
}

const xAxisLabel = (value: string) => ({ value, position: 'insideBottom', offset: -20 }) as const

const yAxisLabel = (value: string) => ({ value, angle: -90, position: 'insideLeft' }) as const

/**
 * Line chart with one marker per point, labels along the x axis.
 */
export const renderLineChartSvg = (options: ChartOptions): string => {
  if (options.points.length === 0) {
    return renderDocument(options.title, undefined)
  }
  return renderDocument(
    options.title,
    <LineChart
      width={CHART_WIDTH}
      height={PLOT_HEIGHT}
      data={[...options.points]}
      margin={PLOT_MARGIN}
    >
      <CartesianGrid strokeDasharray="3 3" />
      <XAxis dataKey="label" label={xAxisLabel(options.xLabel)} />
      <YAxis label={yAxisLabel(options.yLabel)} />
      <Line
        type="linear"
        dataKey="value"
        stroke={SERIES_COLOR}
        strokeWidth={2}
        dot={{ r: 4, fill: SERIES_COLOR }}
        isAnimationActive={false}
      />
    </LineChart>
  )
}

export const renderBarChartSvg = (options: BarChartOptions): string => {
  if (options.points.length === 0) {
    return renderDocument(options.title, undefined)
  }
  const data = [...options.points]
  const bars = <Bar dataKey="value" fill={SERIES_COLOR} isAnimationActive={false} />

  if (options.orientation === 'horizontal') {
    return renderDocument(
      options.title,
      <BarChart
        width={CHART_WIDTH}
        height={PLOT_HEIGHT}
        data={data}
        layout="vertical"
        margin={PLOT_MARGIN}
      >
        <CartesianGrid strokeDasharray="3 3" />
        <XAxis type="number" label={xAxisLabel(options.xLabel)} />
        <YAxis type="category" dataKey="label" width={120} label={yAxisLabel(options.yLabel)} />
        {bars}
      </BarChart>
    )
  }

  return renderDocument(
    options.title,
    <BarChart width={CHART_WIDTH} height={PLOT_HEIGHT} data={data} margin={PLOT_MARGIN}>
      <CartesianGrid strokeDasharray="3 3" />
      <XAxis dataKey="label" label={xAxisLabel(options.xLabel)} />
      <YAxis label={yAxisLabel(options.yLabel)} />
      {bars}
    </BarChart>
  )
}
