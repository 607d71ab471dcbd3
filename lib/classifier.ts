import type { FallbackOperation, PlotKind } from './types'

// ========== 키워드 테이블 (순서대로 검사, 먼저 매칭된 연산 사용) ==========

const TEXT_OPERATIONS: Array<{ operation: Exclude<FallbackOperation, PlotKind | 'unknown'>; keywords: string[] }> = [
  { operation: 'head', keywords: ['primeiras', 'first', 'head', 'início'] },
  { operation: 'tail', keywords: ['últimas', 'last', 'tail', 'final'] },
  { operation: 'columns', keywords: ['colunas', 'columns'] },
  { operation: 'shape', keywords: ['shape', 'tamanho', 'dimensões'] },
  { operation: 'info', keywords: ['info', 'informações', 'resumo'] },
  { operation: 'nulls', keywords: ['nulos', 'null', 'missing', 'vazios'] },
  { operation: 'dtypes', keywords: ['tipos', 'types', 'dtypes'] },
  { operation: 'describe', keywords: ['describe', 'estatísticas'] },
]

const PLOT_OPERATIONS: Array<{ operation: PlotKind; keywords: string[] }> = [
  { operation: 'histogram', keywords: ['histograma', 'histogram'] },
  { operation: 'scatter', keywords: ['dispersão', 'scatter'] },
  { operation: 'bar', keywords: ['barras', 'bar'] },
  { operation: 'line', keywords: ['linha', 'line'] },
]

// "coluna X" 형태에서 컬럼명 앞에 오는 단어
const COLUMN_MARKERS = new Set(['coluna', 'da', 'de', 'column'])

function matchFirst<T>(query: string, table: Array<{ operation: T; keywords: string[] }>): T | null {
  const lower = query.toLowerCase()
  for (const entry of table) {
    if (entry.keywords.some(word => lower.includes(word))) return entry.operation
  }
  return null
}

export function classifyQuery(query: string): FallbackOperation {
  return matchFirst(query, TEXT_OPERATIONS) ?? matchFirst(query, PLOT_OPERATIONS) ?? 'unknown'
}

export function classifyPlotQuery(query: string): PlotKind | null {
  return matchFirst(query, PLOT_OPERATIONS)
}

/** 텍스트의 첫 번째 정수. 없으면 defaultValue, 최대 max로 제한 */
export function extractNumber(text: string, defaultValue: number = 5, max: number = 50): number {
  const match = text.match(/\d+/)
  if (!match) return defaultValue
  return Math.min(parseInt(match[0], 10), max)
}

export function findColumnInQuery(query: string, columns: readonly string[]): string | null {
  const lower = query.toLowerCase()

  for (const col of columns) {
    if (lower.includes(col.toLowerCase())) return col
  }

  const words = lower.split(/\s+/).filter(w => w.length > 0)
  for (let i = 0; i < words.length - 1; i++) {
    if (!COLUMN_MARKERS.has(words[i])) continue
    const candidate = words[i + 1]
    const found = columns.find(col => col.toLowerCase() === candidate)
    if (found) return found
  }

  return null
}

export function findColumnsInQuery(query: string, columns: readonly string[]): string[] {
  const lower = query.toLowerCase()
  return columns.filter(col => lower.includes(col.toLowerCase()))
}
