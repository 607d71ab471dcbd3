import { z } from 'zod'
import type { Tool } from '@anthropic-ai/sdk/resources/messages'
import type { DataFrame } from './dataframe'
import { cellKey } from './dataframe'
import type { Cell, ChartData } from './types'
import { generatePlot } from './charts'
import { renderFrame, formatNumber } from './render'
import { AnalysisError, InvalidToolInputError, errorMessage } from './errors'
import { mean, median, std, min, max, sum, pearson } from './stats'
import { describeIssues } from './schemas'

// ========== 입력 스키마 ==========

const rowsInput = z.object({
  n: z.number().int().min(0).default(5),
})

const describeInput = z.object({
  column: z.string().optional(),
  include: z.enum(['number', 'all']).default('all'),
})

const valueCountsInput = z.object({
  column: z.string(),
  limit: z.number().int().min(1).max(100).default(20),
})

const AGGREGATIONS = ['sum', 'mean', 'median', 'min', 'max', 'count', 'std', 'nunique'] as const
type Aggregation = typeof AGGREGATIONS[number]

const aggregateInput = z.object({
  column: z.string(),
  operation: z.enum(AGGREGATIONS),
  groupBy: z.string().optional(),
})

const OPERATORS = ['==', '!=', '>', '>=', '<', '<=', 'contains'] as const
type Operator = typeof OPERATORS[number]

const filterInput = z.object({
  column: z.string(),
  operator: z.enum(OPERATORS),
  value: z.union([z.string(), z.number(), z.boolean()]),
  limit: z.number().int().min(1).default(20),
})

const correlationInput = z.object({
  column1: z.string(),
  column2: z.string(),
})

const plotInput = z.object({
  query: z.string().min(1),
})

// ========== 도구 정의 (모델에 노출되는 JSON Schema) ==========

const ROWS_SCHEMA: Tool['input_schema'] = {
  type: 'object',
  properties: { n: { type: 'integer', minimum: 0, description: 'Number of rows (default 5)' } },
}

const BASE_TOOLS: Tool[] = [
  {
    name: 'dataframe_head',
    description: 'Return the first n rows of the dataset as a text table.',
    input_schema: ROWS_SCHEMA,
  },
  {
    name: 'dataframe_tail',
    description: 'Return the last n rows of the dataset as a text table.',
    input_schema: ROWS_SCHEMA,
  },
  {
    name: 'dataframe_describe',
    description: 'Descriptive statistics for the whole dataset or a single column.',
    input_schema: {
      type: 'object',
      properties: {
        column: { type: 'string', description: 'Optional column to describe' },
        include: { type: 'string', enum: ['number', 'all'], description: 'Which columns to include (default all)' },
      },
    },
  },
  {
    name: 'value_counts',
    description: 'Frequency of each distinct value in a column, most frequent first.',
    input_schema: {
      type: 'object',
      properties: {
        column: { type: 'string' },
        limit: { type: 'integer', minimum: 1, maximum: 100 },
      },
      required: ['column'],
    },
  },
  {
    name: 'aggregate',
    description: 'Aggregate a column (sum, mean, median, min, max, count, std, nunique), optionally grouped by another column.',
    input_schema: {
      type: 'object',
      properties: {
        column: { type: 'string' },
        operation: { type: 'string', enum: [...AGGREGATIONS] },
        groupBy: { type: 'string', description: 'Optional column to group by' },
      },
      required: ['column', 'operation'],
    },
  },
  {
    name: 'filter_rows',
    description: 'Rows where a column matches a condition. Returns the match count and the first rows.',
    input_schema: {
      type: 'object',
      properties: {
        column: { type: 'string' },
        operator: { type: 'string', enum: [...OPERATORS] },
        value: { type: ['string', 'number', 'boolean'] },
        limit: { type: 'integer', minimum: 1 },
      },
      required: ['column', 'operator', 'value'],
    },
  },
  {
    name: 'correlation',
    description: 'Pearson correlation between two numeric columns.',
    input_schema: {
      type: 'object',
      properties: {
        column1: { type: 'string' },
        column2: { type: 'string' },
      },
      required: ['column1', 'column2'],
    },
  },
]

const PLOT_TOOL: Tool = {
  name: 'generate_plot',
  description: 'Generate a chart of the data. Supports histograms, scatter plots, bar charts and line charts, e.g. "scatter between age and income".',
  input_schema: {
    type: 'object',
    properties: { query: { type: 'string', description: 'Plot request in plain words, naming the columns' } },
    required: ['query'],
  },
}

// ========== 실행 ==========

export interface ToolOutcome {
  content: string
  isError: boolean
  chart?: ChartData
}

export interface DataframeToolset {
  definitions: Tool[]
  execute(name: string, input: unknown): ToolOutcome
}

export interface ToolsetOptions {
  includePlots: boolean
  maxRows: number
}

function parseInput<T extends z.ZodTypeAny>(tool: string, schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input ?? {})
  if (!parsed.success) {
    throw new InvalidToolInputError(tool, describeIssues(parsed.error))
  }
  return parsed.data
}

function ok(content: string, chart?: ChartData): ToolOutcome {
  return { content, isError: false, chart }
}

export function createDataframeTools(frame: DataFrame, options: ToolsetOptions): DataframeToolset {
  const definitions = options.includePlots ? [...BASE_TOOLS, PLOT_TOOL] : [...BASE_TOOLS]

  const run = (name: string, input: unknown): ToolOutcome => {
    switch (name) {
      case 'dataframe_head': {
        const { n } = parseInput(name, rowsInput, input)
        return ok(renderFrame(frame.head(Math.min(n, options.maxRows))))
      }
      case 'dataframe_tail': {
        const { n } = parseInput(name, rowsInput, input)
        return ok(renderFrame(frame.tail(Math.min(n, options.maxRows))))
      }
      case 'dataframe_describe': {
        const { column, include } = parseInput(name, describeInput, input)
        const target = column ? frame.select([column]) : frame
        return ok(renderFrame(target.describe(include)))
      }
      case 'value_counts': {
        const { column, limit } = parseInput(name, valueCountsInput, input)
        return ok(JSON.stringify(frame.valueCounts(column, limit)))
      }
      case 'aggregate': {
        const { column, operation, groupBy } = parseInput(name, aggregateInput, input)
        return ok(JSON.stringify(aggregate(frame, column, operation, groupBy)))
      }
      case 'filter_rows': {
        const { column, operator, value, limit } = parseInput(name, filterInput, input)
        const matched = filterRows(frame, column, operator, value)
        return ok(`Matched ${matched.rowCount} of ${frame.rowCount} rows.\n\n${renderFrame(matched.head(Math.min(limit, options.maxRows)))}`)
      }
      case 'correlation': {
        const { column1, column2 } = parseInput(name, correlationInput, input)
        return ok(JSON.stringify({ column1, column2, pearson: correlation(frame, column1, column2) }))
      }
      case 'generate_plot': {
        if (!options.includePlots) break
        const { query } = parseInput(name, plotInput, input)
        const result = generatePlot(frame, query)
        return ok(result.message, result.chart)
      }
    }
    return { content: `Unknown tool: ${name}`, isError: true }
  }

  return {
    definitions,
    execute(name, input) {
      try {
        return run(name, input)
      } catch (error) {
        if (!(error instanceof AnalysisError)) {
          console.warn(`[TOOLS] ${name} failed:`, error)
        }
        return { content: errorMessage(error), isError: true }
      }
    },
  }
}

// ========== 연산 ==========

function requireNumeric(frame: DataFrame, tool: string, column: string, operation: string): void {
  if (!frame.isNumeric(column)) {
    throw new InvalidToolInputError(tool, `'${operation}' needs a numeric column, '${column}' is ${frame.dtype(column)}`)
  }
}

function reduceCells(cells: readonly Cell[], operation: Aggregation): number {
  const present = cells.filter(c => c !== null)
  if (operation === 'count') return present.length
  if (operation === 'nunique') return new Set(present.map(cellKey)).size

  const nums = present.filter((c): c is number => typeof c === 'number')
  switch (operation) {
    case 'sum': return sum(nums)
    case 'mean': return mean(nums)
    case 'median': return median(nums)
    case 'min': return min(nums)
    case 'max': return max(nums)
    case 'std': return std(nums)
  }
}

function jsonNumber(n: number): number | string {
  return Number.isFinite(n) ? n : formatNumber(n)
}

export function aggregate(
  frame: DataFrame,
  column: string,
  operation: Aggregation,
  groupBy?: string,
): Record<string, unknown> {
  if (operation !== 'count' && operation !== 'nunique') {
    requireNumeric(frame, 'aggregate', column, operation)
  }
  const values = frame.column(column)

  if (!groupBy) {
    return { column, operation, value: jsonNumber(reduceCells(values, operation)) }
  }

  const keys = frame.column(groupBy)
  const groups = new Map<string, Cell[]>()
  keys.forEach((key, i) => {
    if (key === null) return
    const k = cellKey(key)
    const bucket = groups.get(k) ?? []
    bucket.push(values[i])
    groups.set(k, bucket)
  })

  return {
    column,
    operation,
    groupBy,
    groups: [...groups.entries()].map(([group, cells]) => ({ group, value: jsonNumber(reduceCells(cells, operation)) })),
  }
}

function compare(cell: Cell, operator: Operator, value: string | number | boolean): boolean {
  if (cell === null) return false

  if (operator === 'contains') {
    return cellKey(cell).toLowerCase().includes(String(value).toLowerCase())
  }

  const numericValue = typeof value === 'number'
    ? value
    : (typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN)
  let order: number
  if (typeof cell === 'number' && !Number.isNaN(numericValue)) {
    order = Math.sign(cell - numericValue)
  } else {
    const left = cellKey(cell)
    const right = typeof value === 'boolean' ? cellKey(value) : String(value)
    order = left === right ? 0 : (left < right ? -1 : 1)
  }

  switch (operator) {
    case '==': return order === 0
    case '!=': return order !== 0
    case '>': return order > 0
    case '>=': return order >= 0
    case '<': return order < 0
    case '<=': return order <= 0
  }
}

export function filterRows(
  frame: DataFrame,
  column: string,
  operator: Operator,
  value: string | number | boolean,
): DataFrame {
  frame.column(column)
  return frame.filter(row => compare(row[column] ?? null, operator, value))
}

export function correlation(frame: DataFrame, column1: string, column2: string): number | string {
  requireNumeric(frame, 'correlation', column1, 'pearson')
  requireNumeric(frame, 'correlation', column2, 'pearson')
  const a = frame.column(column1)
  const b = frame.column(column2)
  const xs: number[] = []
  const ys: number[] = []
  a.forEach((x, i) => {
    const y = b[i]
    if (typeof x === 'number' && typeof y === 'number') {
      xs.push(x)
      ys.push(y)
    }
  })
  const r = pearson(xs, ys)
  return Number.isFinite(r) ? Math.round(r * 10000) / 10000 : formatNumber(r)
}
