// 데이터프레임 셀 / 컬럼 타입
export type Cell = number | string | boolean | null

export type DType = 'int64' | 'float64' | 'bool' | 'object'

export type IndexLabel = number | string

// 차트 데이터
export type ChartType = 'histogram' | 'bar' | 'scatter' | 'line' | 'boxplot'

export interface ChartData {
  id: string
  type: ChartType
  title: string
  data: Record<string, unknown>[]
  xKey?: string
  yKey?: string
  imageUrl?: string
  insight?: string
}

export interface PlotResult {
  message: string
  chart?: ChartData
}

export type SimplePlotType = 'histogram' | 'boxplot'

// 폴백 분류기
export type PlotKind = 'histogram' | 'scatter' | 'bar' | 'line'

export type FallbackOperation =
  | 'head'
  | 'tail'
  | 'columns'
  | 'shape'
  | 'info'
  | 'nulls'
  | 'dtypes'
  | 'describe'
  | PlotKind
  | 'unknown'

// 질의 결과
export type AnswerSource = 'agent' | 'fallback' | 'system' | 'error'

export interface QueryResult {
  reply: string
  source: AnswerSource
  charts: ChartData[]
}

// 채팅
export interface ConversationTurn {
  role: 'user' | 'assistant'
  content: string
}

export interface ChatMessage extends ConversationTurn {
  id: string
  sessionId: string
  source?: AnswerSource
  charts?: ChartData[]
  createdAt: string
}

// 세션
export interface Session {
  id: string
  fileName: string
  filePath: string
  messageCount: number
  createdAt: string
  updatedAt: string
}

// 데이터셋 정보
export interface LoadedDataframeInfo {
  status: 'loaded'
  rows: number
  columns: number
  columnNames: string[]
  dtypes: Record<string, DType>
  memoryUsageMb: number
  nullCounts: Record<string, number>
  numericColumns: string[]
  categoricalColumns: string[]
}

export type DataframeInfo = LoadedDataframeInfo | { error: string }

// 업로드 응답
export interface UploadResult {
  sessionId: string
  fileName: string
  message: string
  info: DataframeInfo
}

// 질문 응답
export interface AskResult extends QueryResult {
  history: ChatMessage[]
}
