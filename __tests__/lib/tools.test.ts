import { describe, it, expect } from 'vitest'
import fs from 'fs'
import path from 'path'
import { DataFrame } from '@/lib/dataframe'
import { createDataframeTools, aggregate, filterRows, correlation } from '@/lib/tools'

const FIXTURES = path.join(__dirname, '..', 'fixtures')
const people = () => DataFrame.fromCsv(fs.readFileSync(path.join(FIXTURES, 'people.csv'), 'utf-8'))
const tools = (includePlots = true, maxRows = 50) => createDataframeTools(people(), { includePlots, maxRows })

describe('createDataframeTools', () => {
  it('should expose the plot tool only in full mode', () => {
    expect(tools(true).definitions.map(t => t.name)).toEqual([
      'dataframe_head', 'dataframe_tail', 'dataframe_describe', 'value_counts',
      'aggregate', 'filter_rows', 'correlation', 'generate_plot',
    ])
    expect(tools(false).definitions.map(t => t.name)).not.toContain('generate_plot')
  })

  it('should render head rows', () => {
    expect(tools().execute('dataframe_head', { n: 2 })).toEqual({
      content: [
        '    name  age    city  score',
        '0    Ana   30  Lisbon   88.5',
        '1  Bruno   25   Porto   92.0',
      ].join('\n'),
      isError: false,
      chart: undefined,
    })
  })

  it('should cap rows at maxRows', () => {
    const outcome = tools(true, 3).execute('dataframe_tail', { n: 100 })
    expect(outcome.content.split('\n')).toHaveLength(4)
  })

  it('should default n when input is empty', () => {
    expect(tools().execute('dataframe_head', {}).content.split('\n')).toHaveLength(6)
  })

  it('should describe a single column', () => {
    const outcome = tools().execute('dataframe_describe', { column: 'age', include: 'number' })
    expect(outcome.content.split('\n')[1]).toBe('count   5.00000')
  })

  it('should return value counts as JSON', () => {
    const outcome = tools().execute('value_counts', { column: 'city', limit: 2 })
    expect(JSON.parse(outcome.content)).toEqual([
      { value: 'Lisbon', count: 2 },
      { value: 'Porto', count: 2 },
    ])
  })

  it('should report invalid input as an error result', () => {
    const outcome = tools().execute('dataframe_head', { n: 'ten' })
    expect(outcome.isError).toBe(true)
    expect(outcome.content).toBe('Invalid input for dataframe_head: n: Expected number, received string')
  })

  it('should report unknown columns as an error result', () => {
    const outcome = tools().execute('value_counts', { column: 'salary' })
    expect(outcome).toEqual({
      content: "Column 'salary' not found. Available columns: name, age, city, score",
      isError: true,
    })
  })

  it('should reject unknown tools', () => {
    expect(tools().execute('drop_table', {})).toEqual({ content: 'Unknown tool: drop_table', isError: true })
    expect(tools(false).execute('generate_plot', { query: 'histogram of age' }).isError).toBe(true)
  })

  it('should attach the chart from generate_plot', () => {
    const outcome = tools().execute('generate_plot', { query: 'histogram of age' })
    expect(outcome.content).toBe("Histogram generated for column 'age'")
    expect(outcome.chart?.type).toBe('histogram')
  })

  it('should summarize filtered rows', () => {
    const outcome = tools().execute('filter_rows', { column: 'age', operator: '>', value: 29 })
    expect(outcome.content.split('\n')[0]).toBe('Matched 3 of 5 rows.')
  })
})

describe('aggregate', () => {
  it('should aggregate a whole column', () => {
    expect(aggregate(people(), 'age', 'mean')).toEqual({ column: 'age', operation: 'mean', value: 31.6 })
    expect(aggregate(people(), 'score', 'count')).toEqual({ column: 'score', operation: 'count', value: 4 })
    expect(aggregate(people(), 'city', 'nunique')).toEqual({ column: 'city', operation: 'nunique', value: 3 })
  })

  it('should aggregate per group in order of appearance', () => {
    expect(aggregate(people(), 'score', 'sum', 'city')).toEqual({
      column: 'score',
      operation: 'sum',
      groupBy: 'city',
      groups: [
        { group: 'Lisbon', value: 167.75 },
        { group: 'Porto', value: 187 },
        { group: 'Faro', value: 0 },
      ],
    })
  })

  it('should name NaN results', () => {
    const result = aggregate(people(), 'score', 'mean', 'city')
    expect(result.groups).toContainEqual({ group: 'Faro', value: 'NaN' })
  })

  it('should require numeric columns for arithmetic', () => {
    expect(() => aggregate(people(), 'city', 'mean'))
      .toThrow("Invalid input for aggregate: 'mean' needs a numeric column, 'city' is object")
  })
})

describe('filterRows', () => {
  it('should compare numbers numerically', () => {
    expect(filterRows(people(), 'age', '>=', '30').column('name')).toEqual(['Ana', 'Carla', 'Eva'])
    expect(filterRows(people(), 'score', '<', 90).column('name')).toEqual(['Ana', 'Carla'])
  })

  it('should compare strings and substrings', () => {
    expect(filterRows(people(), 'city', '==', 'Porto').column('name')).toEqual(['Bruno', 'Eva'])
    expect(filterRows(people(), 'city', '!=', 'Porto').column('name')).toEqual(['Ana', 'Carla', 'Diego'])
    expect(filterRows(people(), 'city', 'contains', 'LIS').column('name')).toEqual(['Ana', 'Carla'])
  })

  it('should never match missing values', () => {
    expect(filterRows(people(), 'score', '!=', 1).rowCount).toBe(4)
  })
})

describe('correlation', () => {
  it('should round the pearson coefficient', () => {
    const frame = DataFrame.fromCsv('x,y\n1,2\n2,4\n3,6\n')
    expect(correlation(frame, 'x', 'y')).toBe(1)
  })

  it('should require numeric columns', () => {
    expect(() => correlation(people(), 'name', 'age')).toThrow(/needs a numeric column/)
  })
})
