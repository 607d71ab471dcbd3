import type { DataFrame } from './dataframe'

export const DATA_AGENT = `You are a data analysis agent working on a single tabular dataset loaded from a CSV file.

Rules:
1. Use the provided tools to inspect the data. Never invent values, rows or columns.
2. Column names are case-sensitive. Use them exactly as listed in the dataset info.
3. Prefer aggregate and value_counts over reading many raw rows.
4. When a chart helps, call generate_plot with a short request such as "histogram of column age".
5. Answer in the user's language, clearly and concisely, citing the numbers you computed.`

export const BASIC_MODE_NOTE = 'Plotting is unavailable in this session. Describe distributions in words instead.'

export function buildAgentSystem(includePlots: boolean): string {
  return includePlots ? DATA_AGENT : `${DATA_AGENT}\n\n${BASIC_MODE_NOTE}`
}

/** 사용자 질문 앞에 데이터셋 요약을 붙인다 */
export function buildQueryContext(frame: DataFrame, query: string): string {
  const columns = frame.columns.slice(0, 10).join(', ') + (frame.columns.length > 10 ? '...' : '')
  const dtypes = frame.dtypeCounts().map(({ dtype, count }) => `${dtype}: ${count}`).join(', ')

  return `Dataset info:
- Total rows: ${frame.rowCount}
- Total columns: ${frame.columns.length}
- Available columns: ${columns}
- Data types: ${dtypes}

User query: ${query}

Please answer clearly and concisely.`
}
