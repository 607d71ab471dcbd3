import * as echarts from 'echarts'
import type { EChartsOption } from 'echarts'
import { v4 as uuid } from 'uuid'
import type { DataFrame } from './dataframe'
import type { ChartData, ChartType, PlotResult, SimplePlotType } from './types'
import { classifyPlotQuery, findColumnInQuery, findColumnsInQuery } from './classifier'
import { histogram, boxStats } from './stats'
import { formatNumber } from './render'
import { errorMessage } from './errors'

const CHART_WIDTH = 1000
const CHART_HEIGHT = 600

export const PLOT_HELP = [
  'Plot type not recognized. Try:',
  "- 'histogram of column [name]'",
  "- 'scatter between [col1] and [col2]'",
  "- 'bar chart of column [name]'",
  "- 'line chart of column [name]'",
].join('\n')

const BASE_OPTION: EChartsOption = {
  animation: false,
  backgroundColor: '#FFFFFF',
  color: ['#0EA5E9', '#8B5CF6', '#F43F5E', '#10B981', '#F59E0B'],
  textStyle: {
    fontFamily: 'Inter, -apple-system, system-ui, sans-serif',
    color: '#1E293B',
  },
  grid: { left: '8%', right: '5%', bottom: '15%', top: '12%', containLabel: true },
}

// ========== SVG 렌더링 ==========

/** echarts SSR로 SVG를 그려 base64 data URL로 반환 */
export function renderChartImage(option: EChartsOption): string {
  const chart = echarts.init(null, null, {
    renderer: 'svg',
    ssr: true,
    width: CHART_WIDTH,
    height: CHART_HEIGHT,
  })
  try {
    chart.setOption({ ...BASE_OPTION, ...option })
    const svg = chart.renderToSVGString()
    return `data:image/svg+xml;base64,${Buffer.from(svg, 'utf8').toString('base64')}`
  } finally {
    chart.dispose()
  }
}

function buildChart(
  type: ChartType,
  title: string,
  data: Record<string, unknown>[],
  xKey: string,
  yKey: string,
  option: EChartsOption,
  insight?: string,
): ChartData {
  return {
    id: uuid(),
    type,
    title,
    data,
    xKey,
    yKey,
    imageUrl: renderChartImage({ title: { text: title, left: 'center' }, ...option }),
    insight,
  }
}

function round2(n: number): number {
  return Math.round(n * 100) / 100
}

// ========== 차트 빌더 ==========

export function numericHistogram(
  frame: DataFrame,
  column: string,
  bins: number,
  title: string,
  type: ChartType = 'histogram',
): ChartData {
  const data = histogram(frame.numericValues(column), bins).map(b => ({
    bin: `${formatNumber(round2(b.start))} - ${formatNumber(round2(b.end))}`,
    start: b.start,
    end: b.end,
    count: b.count,
  }))

  return buildChart(type, title, data, 'bin', 'count', {
    xAxis: { type: 'category', name: column, data: data.map(d => d.bin), axisLabel: { rotate: 45 } },
    yAxis: { type: 'value', name: 'Frequency' },
    series: [{ type: 'bar', barCategoryGap: '0%', data: data.map(d => d.count) }],
  })
}

export function valueCountsChart(frame: DataFrame, column: string, limit: number, title: string): ChartData {
  const data = frame.valueCounts(column, limit)

  return buildChart('bar', title, data, 'value', 'count', {
    xAxis: { type: 'category', name: column, data: data.map(d => d.value), axisLabel: { rotate: 45 } },
    yAxis: { type: 'value', name: 'Count' },
    series: [{ type: 'bar', data: data.map(d => d.count) }],
  })
}

export function scatterChart(frame: DataFrame, xColumn: string, yColumn: string): ChartData {
  const xs = frame.column(xColumn)
  const ys = frame.column(yColumn)
  const data: Record<string, number>[] = []
  xs.forEach((x, i) => {
    const y = ys[i]
    if (typeof x === 'number' && typeof y === 'number') {
      data.push({ [xColumn]: x, [yColumn]: y })
    }
  })

  return buildChart('scatter', `Scatter: ${xColumn} vs ${yColumn}`, data, xColumn, yColumn, {
    xAxis: { type: 'value', name: xColumn, scale: true },
    yAxis: { type: 'value', name: yColumn, scale: true },
    series: [{
      type: 'scatter',
      itemStyle: { opacity: 0.6 },
      data: data.map(d => [d[xColumn], d[yColumn]]),
    }],
  })
}

export function lineChart(frame: DataFrame, column: string): ChartData {
  const values = frame.column(column)
  const data: Array<{ index: string; value: number }> = []
  values.forEach((v, i) => {
    if (typeof v === 'number') data.push({ index: String(frame.index[i]), value: v })
  })

  return buildChart('line', `Line Chart - ${column}`, data, 'index', 'value', {
    xAxis: { type: 'category', name: 'Index', data: data.map(d => d.index) },
    yAxis: { type: 'value', name: column, scale: true },
    series: [{ type: 'line', showSymbol: false, data: data.map(d => d.value) }],
  })
}

export function boxplotChart(frame: DataFrame, column: string): ChartData {
  const stats = boxStats(frame.numericValues(column))
  const data = [{
    name: column,
    lowerWhisker: stats.lowerWhisker,
    q1: stats.q1,
    median: stats.median,
    q3: stats.q3,
    upperWhisker: stats.upperWhisker,
    outliers: stats.outliers,
  }]

  return buildChart('boxplot', `Boxplot - ${column}`, data, 'name', 'median', {
    xAxis: { type: 'category', data: [column] },
    yAxis: { type: 'value', name: column, scale: true },
    series: [
      { type: 'boxplot', data: [[stats.lowerWhisker, stats.q1, stats.median, stats.q3, stats.upperWhisker]] },
      { type: 'scatter', data: stats.outliers.map(o => [0, o]) },
    ],
  }, `${stats.outliers.length} outlier(s) beyond 1.5 × IQR`)
}

// ========== 질의 기반 플롯 ==========

export function generatePlot(frame: DataFrame, query: string): PlotResult {
  try {
    switch (classifyPlotQuery(query)) {
      case 'histogram': return plotHistogram(frame, query)
      case 'scatter': return plotScatter(frame, query)
      case 'bar': return plotBar(frame, query)
      case 'line': return plotLine(frame, query)
      default: return { message: PLOT_HELP }
    }
  } catch (error) {
    return { message: `Error generating plot: ${errorMessage(error)}` }
  }
}

function plotHistogram(frame: DataFrame, query: string): PlotResult {
  const column = findColumnInQuery(query, frame.columns)
  if (!column) {
    return { message: `Column not found. Available columns: ${frame.columns.slice(0, 10).join(', ')}` }
  }

  const chart = frame.isNumeric(column)
    ? numericHistogram(frame, column, 30, `Histogram of ${column}`)
    : valueCountsChart(frame, column, 15, `Distribution of ${column}`)
  return { message: `Histogram generated for column '${column}'`, chart }
}

function plotScatter(frame: DataFrame, query: string): PlotResult {
  const mentioned = findColumnsInQuery(query, frame.columns)
  if (mentioned.length < 2) {
    return { message: 'For a scatter plot, mention two numeric columns.' }
  }

  const [col1, col2] = mentioned
  if (!frame.isNumeric(col1) || !frame.isNumeric(col2)) {
    return { message: `Both columns (${col1}, ${col2}) must be numeric.` }
  }

  return { message: `Scatter plot created for ${col1} vs ${col2}`, chart: scatterChart(frame, col1, col2) }
}

function plotBar(frame: DataFrame, query: string): PlotResult {
  const column = findColumnInQuery(query, frame.columns)
  if (!column) {
    return { message: 'Column not found for bar chart.' }
  }

  const title = `Bar Chart - ${column}`
  const chart = frame.isNumeric(column)
    ? numericHistogram(frame, column, 20, title, 'bar')
    : valueCountsChart(frame, column, 15, title)
  return { message: `Bar chart created for ${column}`, chart }
}

function plotLine(frame: DataFrame, query: string): PlotResult {
  const column = findColumnInQuery(query, frame.columns)
  if (!column || !frame.isNumeric(column)) {
    return { message: 'Numeric column not found for line chart.' }
  }
  return { message: `Line chart created for ${column}`, chart: lineChart(frame, column) }
}

// ========== 컬럼 지정 플롯 ==========

export function createSimpleVisualization(
  frame: DataFrame,
  column: string,
  plotType: SimplePlotType = 'histogram',
): PlotResult {
  if (!frame.hasColumn(column)) {
    return { message: `Column '${column}' not found. Available: ${frame.columns.slice(0, 10).join(', ')}...` }
  }

  try {
    let chart: ChartData
    if (plotType === 'boxplot') {
      if (!frame.isNumeric(column)) {
        return { message: `Boxplot requires a numeric column. '${column}' is categorical.` }
      }
      chart = boxplotChart(frame, column)
    } else {
      chart = frame.isNumeric(column)
        ? numericHistogram(frame, column, 30, `Histogram - ${column}`)
        : valueCountsChart(frame, column, 20, `Distribution - ${column}`)
    }
    return { message: `${plotType} chart created for column '${column}'`, chart }
  } catch (error) {
    return { message: `Error creating visualization: ${errorMessage(error)}` }
  }
}
