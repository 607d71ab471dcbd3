import { readFile } from 'fs/promises'
import { DataFrame } from './dataframe'
import { handleSimpleQuery } from './fallback'
import { createSimpleVisualization } from './charts'
import { buildQueryContext } from './prompts'
import { createClaudeAgent, type AgentFactory, type QueryAgent } from './llm-agent'
import { getConfig } from './config'
import { errorMessage } from './errors'
import type { ConversationTurn, DataframeInfo, PlotResult, QueryResult, SimplePlotType } from './types'

export const NOT_INITIALIZED_MESSAGE = 'Agent not initialized. Please load a CSV first.'
export const NO_ANSWER_MESSAGE = 'No answer available.'

export interface DataAnalysisAgentOptions {
  agentFactory?: AgentFactory
  historyLimit?: number
  fallbackMaxRows?: number
}

/** CSV 하나에 대한 질의응답: LLM 에이전트 우선, 실패 시 키워드 폴백 */
export class DataAnalysisAgent {
  private frame: DataFrame | null = null
  private agent: QueryAgent | null = null
  private history: ConversationTurn[] = []
  private readonly agentFactory: AgentFactory

  constructor(private readonly options: DataAnalysisAgentOptions = {}) {
    this.agentFactory = options.agentFactory ?? createClaudeAgent
  }

  get dataframe(): DataFrame | null {
    return this.frame
  }

  get isReady(): boolean {
    return this.agent !== null
  }

  get plotsEnabled(): boolean {
    return this.agent?.includePlots ?? false
  }

  // ========== 로드 ==========

  async loadCsv(filePath: string): Promise<boolean> {
    try {
      await this.loadFile(filePath)
      return true
    } catch (error) {
      console.error('[AGENT] Failed to load CSV:', errorMessage(error))
      return false
    }
  }

  /** loadCsv와 같지만 실패 원인을 그대로 던진다 */
  async loadFile(filePath: string): Promise<void> {
    const text = await readFile(filePath, 'utf-8')
    this.loadText(text)
  }

  /** 파싱 후 에이전트 초기화. 실패 시 예외 */
  loadText(text: string): void {
    const frame = DataFrame.fromCsv(text)
    console.log(`[AGENT] CSV loaded: ${frame.rowCount} rows, ${frame.columns.length} columns`)
    this.frame = frame
    this.agent = null
    this.history = []
    this.initializeAgent(frame)
  }

  private initializeAgent(frame: DataFrame): void {
    try {
      this.agent = this.agentFactory(frame, { includePlots: true })
      console.log('[AGENT] Dataframe agent initialized')
    } catch (error) {
      console.warn('[AGENT] Agent init with plot tool failed:', errorMessage(error))
      try {
        this.agent = this.agentFactory(frame, { includePlots: false })
        console.warn('[AGENT] Agent initialized in basic mode (no plots)')
      } catch (basicError) {
        console.error('[AGENT] Agent initialization failed:', errorMessage(basicError))
        throw basicError
      }
    }
  }

  // ========== 질의 ==========

  async runQuery(query: string): Promise<QueryResult> {
    if (!this.frame || !this.agent) {
      return { reply: NOT_INITIALIZED_MESSAGE, source: 'system', charts: [] }
    }

    try {
      const limit = this.options.historyLimit ?? getConfig().agentHistoryLimit
      const result = await this.agent.invoke({
        input: buildQueryContext(this.frame, query),
        history: this.history.slice(-limit),
      })
      const reply = result.output || NO_ANSWER_MESSAGE
      this.history.push({ role: 'user', content: query }, { role: 'assistant', content: reply })
      return { reply, source: 'agent', charts: result.charts }
    } catch (error) {
      console.warn(`[AGENT] Error processing query: ${errorMessage(error)}. Using fallback.`)
      const maxRows = this.options.fallbackMaxRows ?? getConfig().fallbackMaxRows
      const answer = handleSimpleQuery(this.frame, query, { maxRows })
      return { reply: answer.reply, source: 'fallback', charts: answer.charts }
    }
  }

  getHistory(): ConversationTurn[] {
    return [...this.history]
  }

  // ========== 정보 / 시각화 ==========

  getDataframeInfo(): DataframeInfo {
    const frame = this.frame
    if (!frame) return { error: 'No CSV loaded' }

    try {
      return {
        status: 'loaded',
        rows: frame.rowCount,
        columns: frame.columns.length,
        columnNames: [...frame.columns],
        dtypes: frame.dtypes,
        memoryUsageMb: Math.round((frame.memoryUsage() / (1024 * 1024)) * 100) / 100,
        nullCounts: Object.fromEntries(frame.nullCounts()),
        numericColumns: frame.numericColumns(),
        categoricalColumns: frame.objectColumns(),
      }
    } catch (error) {
      return { error: `Error getting dataset info: ${errorMessage(error)}` }
    }
  }

  createSimpleVisualization(column: string, plotType: SimplePlotType = 'histogram'): PlotResult {
    if (!this.frame) return { message: 'No dataset loaded.' }
    return createSimpleVisualization(this.frame, column, plotType)
  }
}
