import type { DataFrame } from './dataframe'
import type { ChartData, PlotResult } from './types'
import { classifyQuery, extractNumber } from './classifier'
import { generatePlot } from './charts'
import { renderFrame, renderSeries } from './render'
import { errorMessage } from './errors'

export const FALLBACK_HELP = [
  'Query not recognized by the basic analysis mode.',
  '',
  'Available basic queries:',
  "- 'first 10 rows'",
  "- 'dataset columns'",
  "- 'dataset info'",
  "- 'null values'",
  "- 'descriptive statistics'",
  "- 'data types'",
  "- 'histogram of column [name]'",
].join('\n')

export interface FallbackOptions {
  maxRows?: number
}

export interface FallbackAnswer {
  reply: string
  charts: ChartData[]
}

function text(reply: string): FallbackAnswer {
  return { reply, charts: [] }
}

function fromPlot(result: PlotResult): FallbackAnswer {
  return { reply: result.message, charts: result.chart ? [result.chart] : [] }
}

/** LLM 에이전트 없이 키워드 분류로 기본 질의에 답한다 */
export function handleSimpleQuery(frame: DataFrame, query: string, options: FallbackOptions = {}): FallbackAnswer {
  const maxRows = options.maxRows ?? 50
  const operation = classifyQuery(query)
  console.log(`[FALLBACK] "${query.slice(0, 80)}" → ${operation}`)

  try {
    switch (operation) {
      case 'head': {
        const n = extractNumber(query, 5, maxRows)
        return text(`First ${n} rows of the dataset:\n\n${renderFrame(frame.head(n))}`)
      }

      case 'tail': {
        const n = extractNumber(query, 5, maxRows)
        return text(`Last ${n} rows of the dataset:\n\n${renderFrame(frame.tail(n))}`)
      }

      case 'columns': {
        const nulls = frame.nullCounts()
        const lines = frame.columns.map(c => `- ${c}: ${frame.dtype(c)} (${nulls.get(c) ?? 0} null values)`)
        return text(`Dataset columns (${frame.columns.length} total):\n${lines.join('\n')}`)
      }

      case 'shape': {
        const [rows, cols] = frame.shape
        return text(`Dataset dimensions: ${rows} rows × ${cols} columns`)
      }

      case 'info': {
        let info = frame.info()
        if (frame.numericColumns().length > 0) {
          info += `\n\nStatistics for numeric columns:\n${renderFrame(frame.describe('number'))}`
        }
        return text(info)
      }

      case 'nulls': {
        const withNulls = [...frame.nullCounts()].filter(([, count]) => count > 0)
        if (withNulls.length === 0) {
          return text('There are no null values in the dataset!')
        }
        return text(`Null values per column:\n${renderSeries(withNulls.map(([c, n]) => [c, String(n)]))}`)
      }

      case 'dtypes':
        return text(`Data types:\n${renderSeries(frame.columns.map(c => [c, frame.dtype(c)]))}`)

      case 'describe':
        return text(`Descriptive statistics:\n${renderFrame(frame.describe('all'))}`)

      case 'histogram':
      case 'scatter':
      case 'bar':
      case 'line':
        return fromPlot(generatePlot(frame, query))

      default:
        return text(FALLBACK_HELP)
    }
  } catch (error) {
    console.error('[FALLBACK]', error)
    return text(`Error while processing basic query: ${errorMessage(error)}`)
  }
}
