import type { DataFrame } from './dataframe'
import type { Cell, DType } from './types'

const MAX_DECIMALS = 6

function decimalsOf(n: number): number {
  const fixed = n.toFixed(MAX_DECIMALS).replace(/0+$/, '')
  const dot = fixed.indexOf('.')
  return dot === -1 ? 0 : fixed.length - dot - 1
}

function formatSpecial(n: number): string | null {
  if (Number.isNaN(n)) return 'NaN'
  if (n === Infinity) return 'inf'
  if (n === -Infinity) return '-inf'
  return null
}

/** 단일 숫자 표시: 정수는 그대로, 실수는 소수점 6자리 이하 */
export function formatNumber(n: number): string {
  const special = formatSpecial(n)
  if (special) return special
  if (Number.isInteger(n)) return String(n)
  return n.toFixed(decimalsOf(n))
}

function formatScalar(value: Cell): string {
  if (value === null) return 'NaN'
  if (typeof value === 'boolean') return value ? 'True' : 'False'
  if (typeof value === 'number') return formatNumber(value)
  return value
}

/** 같은 컬럼의 실수는 같은 소수 자릿수로 맞춘다 (최소 1자리) */
export function formatColumn(values: readonly Cell[], dtype: DType): string[] {
  if (dtype !== 'float64') return values.map(formatScalar)

  const finite = values.filter((v): v is number => typeof v === 'number' && Number.isFinite(v))
  const decimals = Math.min(MAX_DECIMALS, Math.max(1, ...finite.map(decimalsOf)))

  return values.map(v => {
    if (v === null) return 'NaN'
    if (typeof v !== 'number') return formatScalar(v)
    return formatSpecial(v) ?? v.toFixed(decimals)
  })
}

export function renderFrame(frame: DataFrame): string {
  if (frame.rowCount === 0 || frame.columns.length === 0) {
    return [
      'Empty DataFrame',
      `Columns: [${frame.columns.join(', ')}]`,
      `Index: [${frame.index.join(', ')}]`,
    ].join('\n')
  }

  const labels = frame.index.map(String)
  const indexWidth = Math.max(...labels.map(l => l.length))

  const cols = frame.columns.map(name => {
    const cells = formatColumn(frame.column(name), frame.dtype(name))
    const width = Math.max(name.length, ...cells.map(c => c.length))
    return { name, cells, width }
  })

  const header = ' '.repeat(indexWidth) + cols.map(c => '  ' + c.name.padStart(c.width)).join('')
  const rows = labels.map((label, i) =>
    label.padEnd(indexWidth) + cols.map(c => '  ' + c.cells[i].padStart(c.width)).join('')
  )

  return [header, ...rows].join('\n')
}

export function renderSeries(entries: Array<[string, string]>): string {
  if (entries.length === 0) return ''
  const labelWidth = Math.max(...entries.map(([label]) => label.length))
  const valueWidth = Math.max(...entries.map(([, value]) => value.length))
  return entries
    .map(([label, value]) => `${label.padEnd(labelWidth)}    ${value.padStart(valueWidth)}`)
    .join('\n')
}
