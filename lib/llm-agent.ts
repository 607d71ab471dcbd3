import type { ContentBlockParam, MessageParam, ToolResultBlockParam } from '@anthropic-ai/sdk/resources/messages'
import { callClaudeWithTools, withCacheControl, type AssistantTurn } from './claude'
import { buildAgentSystem } from './prompts'
import { createDataframeTools, type DataframeToolset } from './tools'
import { getConfig } from './config'
import { AgentIterationLimitError, AgentTimeoutError } from './errors'
import type { DataFrame } from './dataframe'
import type { ChartData, ConversationTurn } from './types'

// ========== 에이전트 인터페이스 ==========

export interface AgentStep {
  tool: string
  input: unknown
  output: string
  isError: boolean
}

export interface AgentInput {
  input: string
  history: ConversationTurn[]
}

export interface AgentOutput {
  output: string
  charts: ChartData[]
  steps: AgentStep[]
}

export interface QueryAgent {
  readonly includePlots: boolean
  invoke(request: AgentInput): Promise<AgentOutput>
}

export type AgentFactory = (frame: DataFrame, options: { includePlots: boolean }) => QueryAgent

export interface ClaudeAgentOptions {
  model: string
  maxIterations: number
  maxExecutionMs: number
  maxTokens: number
  includePlots: boolean
  maxRows: number
}

const MAX_TOOL_OUTPUT = 8000

// ========== Claude 도구 루프 ==========

export class ClaudeDataframeAgent implements QueryAgent {
  private readonly tools: DataframeToolset

  constructor(frame: DataFrame, private readonly options: ClaudeAgentOptions) {
    this.tools = createDataframeTools(frame, { includePlots: options.includePlots, maxRows: options.maxRows })
  }

  get includePlots(): boolean {
    return this.options.includePlots
  }

  async invoke({ input, history }: AgentInput): Promise<AgentOutput> {
    const { maxIterations, maxExecutionMs } = this.options
    const messages: MessageParam[] = [...toMessages(history), { role: 'user', content: input }]
    const system = [withCacheControl(buildAgentSystem(this.options.includePlots))]
    const charts: ChartData[] = []
    const steps: AgentStep[] = []

    const startTime = Date.now()
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), maxExecutionMs)

    try {
      for (let iteration = 1; iteration <= maxIterations; iteration++) {
        if (Date.now() - startTime >= maxExecutionMs) {
          throw new AgentTimeoutError(maxExecutionMs)
        }

        let turn: AssistantTurn
        try {
          turn = await callClaudeWithTools({
            model: this.options.model,
            systemBlocks: system,
            messages,
            tools: this.tools.definitions,
            maxTokens: this.options.maxTokens,
            temperature: 0,
            signal: controller.signal,
          })
        } catch (error) {
          if (controller.signal.aborted) throw new AgentTimeoutError(maxExecutionMs)
          throw error
        }

        const toolUses = turn.blocks.filter(b => b.type === 'tool_use')
        if (turn.stopReason !== 'tool_use' || toolUses.length === 0) {
          const output = turn.blocks
            .map(b => (b.type === 'text' ? b.text : ''))
            .join('')
            .trim()
          console.log(`[LLM_AGENT] Answered after ${iteration} iteration(s), ${steps.length} tool call(s), ${Date.now() - startTime}ms`)
          return { output, charts, steps }
        }

        messages.push({ role: 'assistant', content: turn.blocks.map(toContentBlock) })

        const results: ToolResultBlockParam[] = []
        for (const block of turn.blocks) {
          if (block.type !== 'tool_use') continue
          const outcome = this.tools.execute(block.name, block.input)
          console.log(`[LLM_AGENT] Tool ${block.name}${outcome.isError ? ' (error)' : ''}`)
          if (outcome.chart) charts.push(outcome.chart)
          const content = outcome.content.slice(0, MAX_TOOL_OUTPUT)
          steps.push({ tool: block.name, input: block.input, output: content, isError: outcome.isError })
          results.push({ type: 'tool_result', tool_use_id: block.id, content, is_error: outcome.isError })
        }
        messages.push({ role: 'user', content: results })
      }

      throw new AgentIterationLimitError(maxIterations)
    } finally {
      clearTimeout(timer)
    }
  }
}

function toContentBlock(block: AssistantTurn['blocks'][number]): ContentBlockParam {
  if (block.type === 'text') return { type: 'text', text: block.text }
  return { type: 'tool_use', id: block.id, name: block.name, input: block.input }
}

/** 이전 대화를 user로 시작하는 교대 메시지열로 정리 */
export function toMessages(history: ConversationTurn[]): MessageParam[] {
  const messages: MessageParam[] = []
  for (const turn of history) {
    if (!turn.content.trim()) continue
    if (messages.length === 0 && turn.role === 'assistant') continue
    const last = messages[messages.length - 1]
    if (last && last.role === turn.role && typeof last.content === 'string') {
      last.content = `${last.content}\n\n${turn.content}`
    } else {
      messages.push({ role: turn.role, content: turn.content })
    }
  }
  // 마지막 사용자 턴 뒤에 새 질문이 붙으므로 assistant로 끝나야 한다
  if (messages.length > 0 && messages[messages.length - 1].role === 'user') {
    messages.pop()
  }
  return messages
}

export const createClaudeAgent: AgentFactory = (frame, { includePlots }) => {
  const config = getConfig()
  return new ClaudeDataframeAgent(frame, {
    model: config.agentModel,
    maxIterations: config.agentMaxIterations,
    maxExecutionMs: config.agentMaxExecutionMs,
    maxTokens: config.agentMaxTokens,
    includePlots,
    maxRows: config.fallbackMaxRows,
  })
}
