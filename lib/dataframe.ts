import Papa from 'papaparse'
import type { Cell, DType, IndexLabel } from './types'
import { ColumnNotFoundError, CsvLoadError } from './errors'
import { mean, std, quantile, min, max } from './stats'

// 결측값으로 취급하는 토큰
const NA_VALUES = new Set([
  '', '#N/A', '#N/A N/A', '#NA', '-1.#IND', '-1.#QNAN', '-NaN', '-nan',
  '1.#IND', '1.#QNAN', '<NA>', 'N/A', 'NA', 'NULL', 'NaN', 'None',
  'n/a', 'nan', 'null',
])

const INT_PATTERN = /^[+-]?\d+$/
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const BOOL_PATTERN = /^(true|false)$/i

export type DescribeInclude = 'number' | 'all'

const NUMERIC_STAT_ROWS = ['mean', 'std', 'min', '25%', '50%', '75%', 'max'] as const
const OBJECT_STAT_ROWS = ['unique', 'top', 'freq'] as const

export class DataFrame {
  private constructor(
    readonly columns: string[],
    private readonly data: Map<string, Cell[]>,
    private readonly types: Map<string, DType>,
    readonly index: IndexLabel[],
  ) {}

  // ========== 생성 ==========

  static fromCsv(text: string): DataFrame {
    const content = text.charCodeAt(0) === 0xFEFF ? text.slice(1) : text
    const parsed = Papa.parse<string[]>(content, {
      header: false,
      delimiter: ',',
      skipEmptyLines: true,
    })

    const quoteError = parsed.errors.find(e => e.type === 'Quotes')
    if (quoteError) {
      throw new CsvLoadError(`Malformed quotes near row ${(quoteError.row ?? 0) + 1}: ${quoteError.message}`)
    }

    if (parsed.data.length === 0) {
      throw new CsvLoadError('No columns to parse from file')
    }

    const headers = mangleHeaders(parsed.data[0])
    const body = parsed.data.slice(1)
    const raw = new Map<string, Array<string | null>>(headers.map(h => [h, []]))

    body.forEach((fields, i) => {
      if (fields.length > headers.length) {
        throw new CsvLoadError(`Expected ${headers.length} fields in line ${i + 2}, saw ${fields.length}`)
      }
      headers.forEach((h, c) => {
        const value = c < fields.length ? fields[c] : null
        raw.get(h)?.push(value === null || NA_VALUES.has(value) ? null : value)
      })
    })

    const data = new Map<string, Cell[]>()
    const dtypes = new Map<string, DType>()
    for (const h of headers) {
      const values = raw.get(h) ?? []
      const dtype = inferDType(values)
      dtypes.set(h, dtype)
      data.set(h, values.map(v => convertCell(v, dtype)))
    }

    return new DataFrame(headers, data, dtypes, body.map((_, i) => i))
  }

  static fromColumns(
    columns: Array<{ name: string; dtype: DType; values: Cell[] }>,
    index?: IndexLabel[],
  ): DataFrame {
    const length = columns.length > 0 ? columns[0].values.length : (index?.length ?? 0)
    const data = new Map<string, Cell[]>()
    const dtypes = new Map<string, DType>()
    for (const col of columns) {
      if (col.values.length !== length) {
        throw new Error(`Column '${col.name}' has ${col.values.length} values, expected ${length}`)
      }
      data.set(col.name, [...col.values])
      dtypes.set(col.name, col.dtype)
    }
    const labels = index ?? Array.from({ length }, (_, i) => i)
    return new DataFrame(columns.map(c => c.name), data, dtypes, labels)
  }

  // ========== 기본 속성 ==========

  get rowCount(): number {
    return this.index.length
  }

  get shape(): [number, number] {
    return [this.rowCount, this.columns.length]
  }

  /** 컬럼명 → dtype (JSON 응답용 사본) */
  get dtypes(): Record<string, DType> {
    return Object.fromEntries(this.columns.map(c => [c, this.dtype(c)]))
  }

  hasColumn(name: string): boolean {
    return this.data.has(name)
  }

  column(name: string): readonly Cell[] {
    const values = this.data.get(name)
    if (!values) throw new ColumnNotFoundError(name, this.columns)
    return values
  }

  dtype(name: string): DType {
    const dtype = this.types.get(name)
    if (!dtype) throw new ColumnNotFoundError(name, this.columns)
    return dtype
  }

  isNumeric(name: string): boolean {
    const dtype = this.dtype(name)
    return dtype === 'int64' || dtype === 'float64'
  }

  numericColumns(): string[] {
    return this.columns.filter(c => this.isNumeric(c))
  }

  objectColumns(): string[] {
    return this.columns.filter(c => this.dtype(c) === 'object')
  }

  row(position: number): Record<string, Cell> {
    // fromEntries는 '__proto__' 같은 헤더도 자기 속성으로 둔다
    return Object.fromEntries(this.columns.map(c => [c, this.column(c)[position] ?? null]))
  }

  records(): Array<Record<string, Cell>> {
    return this.index.map((_, i) => this.row(i))
  }

  // ========== 행 선택 ==========

  head(n: number = 5): DataFrame {
    const count = Math.max(0, Math.min(n, this.rowCount))
    return this.take(range(0, count))
  }

  tail(n: number = 5): DataFrame {
    const count = Math.max(0, Math.min(n, this.rowCount))
    return this.take(range(this.rowCount - count, this.rowCount))
  }

  select(names: string[]): DataFrame {
    const data = new Map<string, Cell[]>()
    const dtypes = new Map<string, DType>()
    for (const name of names) {
      data.set(name, [...this.column(name)])
      dtypes.set(name, this.dtype(name))
    }
    return new DataFrame([...names], data, dtypes, [...this.index])
  }

  filter(predicate: (row: Record<string, Cell>, position: number) => boolean): DataFrame {
    const positions: number[] = []
    for (let i = 0; i < this.rowCount; i++) {
      if (predicate(this.row(i), i)) positions.push(i)
    }
    return this.take(positions)
  }

  private take(positions: number[]): DataFrame {
    const data = new Map<string, Cell[]>()
    for (const c of this.columns) {
      const values = this.column(c)
      data.set(c, positions.map(p => values[p]))
    }
    return new DataFrame([...this.columns], data, new Map(this.types), positions.map(p => this.index[p]))
  }

  // ========== 집계 ==========

  /** 컬럼 순서를 유지하는 결측 개수 */
  nullCounts(): Map<string, number> {
    const counts = new Map<string, number>()
    for (const c of this.columns) {
      counts.set(c, this.column(c).filter(v => v === null).length)
    }
    return counts
  }

  numericValues(name: string): number[] {
    return this.column(name).filter((v): v is number => typeof v === 'number' && !Number.isNaN(v))
  }

  /** 빈도 내림차순, 동률은 먼저 나온 값 우선 */
  valueCounts(name: string, limit?: number): Array<{ value: string; count: number }> {
    const freq = new Map<string, number>()
    for (const v of this.column(name)) {
      if (v === null) continue
      const key = cellKey(v)
      freq.set(key, (freq.get(key) ?? 0) + 1)
    }
    const sorted = [...freq.entries()]
      .map(([value, count], order) => ({ value, count, order }))
      .sort((a, b) => b.count - a.count || a.order - b.order)
      .map(({ value, count }) => ({ value, count }))
    return limit === undefined ? sorted : sorted.slice(0, limit)
  }

  dtypeCounts(): Array<{ dtype: DType; count: number }> {
    const counts = new Map<DType, number>()
    for (const c of this.columns) {
      const dtype = this.dtype(c)
      counts.set(dtype, (counts.get(dtype) ?? 0) + 1)
    }
    return [...counts.entries()]
      .map(([dtype, count], order) => ({ dtype, count, order }))
      .sort((a, b) => b.count - a.count || a.order - b.order)
      .map(({ dtype, count }) => ({ dtype, count }))
  }

  /** 추정 메모리 사용량 (bytes) */
  memoryUsage(): number {
    let bytes = 128
    for (const c of this.columns) {
      const dtype = this.dtype(c)
      for (const v of this.column(c)) {
        if (dtype === 'bool') bytes += 1
        else if (dtype === 'object') bytes += 8 + (typeof v === 'string' ? Buffer.byteLength(v, 'utf8') : 0)
        else bytes += 8
      }
    }
    return bytes
  }

  // ========== 요약 ==========

  describe(include: DescribeInclude = 'number'): DataFrame {
    const numeric = this.numericColumns()
    const targets = include === 'all' || numeric.length === 0 ? [...this.columns] : numeric
    const hasCategorical = targets.some(c => !this.isNumeric(c))
    const hasNumeric = targets.some(c => this.isNumeric(c))

    const labels: string[] = ['count']
    if (hasCategorical) labels.push(...OBJECT_STAT_ROWS)
    if (hasNumeric) labels.push(...NUMERIC_STAT_ROWS)

    const columns = targets.map((name): { name: string; dtype: DType; values: Cell[] } => {
      const stats = this.isNumeric(name)
        ? this.numericSummary(name)
        : this.categoricalSummary(name)
      return {
        name,
        dtype: (hasCategorical ? 'object' : 'float64') satisfies DType,
        values: labels.map(label => stats[label] ?? null),
      }
    })

    return DataFrame.fromColumns(columns, labels)
  }

  private numericSummary(name: string): Record<string, Cell> {
    const nums = this.numericValues(name)
    return {
      count: nums.length,
      mean: mean(nums),
      std: std(nums),
      min: min(nums),
      '25%': quantile(nums, 0.25),
      '50%': quantile(nums, 0.5),
      '75%': quantile(nums, 0.75),
      max: max(nums),
    }
  }

  private categoricalSummary(name: string): Record<string, Cell> {
    const present = this.column(name).filter(v => v !== null)
    const counts = this.valueCounts(name)
    const top = counts.length > 0 ? counts[0] : null
    return {
      count: present.length,
      unique: counts.length,
      top: top ? top.value : null,
      freq: top ? top.count : null,
    }
  }

  info(): string {
    const lines: string[] = []
    if (this.rowCount === 0) {
      lines.push('Index: 0 entries')
    } else {
      lines.push(`Index: ${this.rowCount} entries, ${this.index[0]} to ${this.index[this.rowCount - 1]}`)
    }
    lines.push(`Data columns (total ${this.columns.length} columns):`)

    const nulls = this.nullCounts()
    const table = [
      ['#', 'Column', 'Non-Null Count', 'Dtype'],
      ...this.columns.map((c, i) => [String(i), c, `${this.rowCount - (nulls.get(c) ?? 0)} non-null`, this.dtype(c)]),
    ]
    const widths = table[0].map((_, i) => Math.max(...table.map(row => row[i].length)))
    const formatRow = (row: string[]) => ' ' + row.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd()

    lines.push(formatRow(table[0]))
    lines.push(formatRow(widths.map(w => '-'.repeat(w))))
    for (const row of table.slice(1)) lines.push(formatRow(row))

    const dtypeSummary = [...this.dtypeCounts()]
      .sort((a, b) => a.dtype.localeCompare(b.dtype))
      .map(({ dtype, count }) => `${dtype}(${count})`)
      .join(', ')
    lines.push(`dtypes: ${dtypeSummary}`)
    lines.push(`memory usage: ${formatBytes(this.memoryUsage())}`)
    return lines.join('\n')
  }
}

// ========== 파싱 유틸 ==========

function range(start: number, end: number): number[] {
  return Array.from({ length: Math.max(0, end - start) }, (_, i) => start + i)
}

/** 중복 헤더는 a, a.1, a.2 / 빈 헤더는 Unnamed: i */
export function mangleHeaders(raw: string[]): string[] {
  const seen = new Set<string>()
  return raw.map((h, i) => {
    const base = h.trim() === '' ? `Unnamed: ${i}` : h
    let name = base
    let suffix = 1
    while (seen.has(name)) {
      name = `${base}.${suffix}`
      suffix++
    }
    seen.add(name)
    return name
  })
}

export function inferDType(values: Array<string | null>): DType {
  const present = values.filter((v): v is string => v !== null)
  if (present.length === 0) return 'float64'

  const hasMissing = present.length < values.length
  const trimmed = present.map(v => v.trim())

  if (trimmed.every(v => INT_PATTERN.test(v))) return hasMissing ? 'float64' : 'int64'
  if (trimmed.every(v => FLOAT_PATTERN.test(v))) return 'float64'
  if (!hasMissing && trimmed.every(v => BOOL_PATTERN.test(v))) return 'bool'
  return 'object'
}

function convertCell(value: string | null, dtype: DType): Cell {
  if (value === null) return null
  switch (dtype) {
    case 'int64':
    case 'float64':
      return Number(value.trim())
    case 'bool':
      return value.trim().toLowerCase() === 'true'
    default:
      return value
  }
}

/** 값 비교/집계용 문자열 키 */
export function cellKey(value: Cell): string {
  if (value === null) return 'NaN'
  if (typeof value === 'boolean') return value ? 'True' : 'False'
  return String(value)
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} bytes`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}
