import { describe, it, expect } from 'vitest'
import {
  classifyQuery,
  classifyPlotQuery,
  extractNumber,
  findColumnInQuery,
  findColumnsInQuery,
} from '@/lib/classifier'

const COLUMNS = ['name', 'age', 'city', 'score']

describe('classifyQuery', () => {
  it.each([
    ['show the first 10 rows', 'head'],
    ['HEAD please', 'head'],
    ['primeiras 3 linhas', 'head'],
    ['last rows', 'tail'],
    ['what columns exist?', 'columns'],
    ['dataset shape', 'shape'],
    ['give me some info', 'info'],
    ['missing values', 'nulls'],
    ['data types', 'dtypes'],
    ['describe the data', 'describe'],
    ['histogram of age', 'histogram'],
    ['scatter between age and score', 'scatter'],
    ['bar chart of city', 'bar'],
    ['line chart of score', 'line'],
    ['tell me a joke', 'unknown'],
  ])('%s → %s', (query, expected) => {
    expect(classifyQuery(query)).toBe(expected)
  })

  it('should check text operations before plots', () => {
    // "lines" contains "line" but "first" wins
    expect(classifyQuery('first 10 lines')).toBe('head')
    expect(classifyQuery('histogram of all columns')).toBe('columns')
  })
})

describe('classifyPlotQuery', () => {
  it('should return null for non-plot text', () => {
    expect(classifyPlotQuery('pie chart of city')).toBeNull()
    expect(classifyPlotQuery('gráfico de dispersão')).toBe('scatter')
  })
})

describe('extractNumber', () => {
  it('should take the first integer', () => {
    expect(extractNumber('show 10 rows then 20')).toBe(10)
  })

  it('should clamp to the maximum', () => {
    expect(extractNumber('show 200 rows')).toBe(50)
    expect(extractNumber('top 8', 5, 3)).toBe(3)
  })

  it('should fall back to the default', () => {
    expect(extractNumber('show rows')).toBe(5)
    expect(extractNumber('show rows', 7)).toBe(7)
  })

  it('should read digits inside decimals', () => {
    expect(extractNumber('show 2.5 rows')).toBe(2)
  })
})

describe('findColumnInQuery', () => {
  it('should match column names case-insensitively', () => {
    expect(findColumnInQuery('histogram of the AGE column', COLUMNS)).toBe('age')
  })

  it('should prefer the first column in frame order', () => {
    expect(findColumnInQuery('score by city', COLUMNS)).toBe('city')
  })

  it('should return null when nothing matches', () => {
    expect(findColumnInQuery('histogram of column salary', COLUMNS)).toBeNull()
  })

  it('should return the column with its original casing', () => {
    expect(findColumnInQuery('histograma da idade', ['Idade', 'Nome'])).toBe('Idade')
  })
})

describe('findColumnsInQuery', () => {
  it('should list every mentioned column in frame order', () => {
    expect(findColumnsInQuery('scatter between score and age', COLUMNS)).toEqual(['age', 'score'])
    expect(findColumnsInQuery('scatter', COLUMNS)).toEqual([])
  })
})
