import { describe, it, expect, vi, beforeEach } from 'vitest'
import fs from 'fs'
import path from 'path'

// Claude API는 호출하지 않는다
vi.mock('@/lib/claude', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@/lib/claude')>()
  return {
    ...actual,
    callClaudeWithTools: vi.fn(),
  }
})

import { callClaudeWithTools } from '@/lib/claude'
import { ClaudeDataframeAgent, toMessages, type ClaudeAgentOptions } from '@/lib/llm-agent'
import { DataFrame } from '@/lib/dataframe'
import { AgentIterationLimitError, AgentTimeoutError } from '@/lib/errors'

const FIXTURES = path.join(__dirname, '..', 'fixtures')
const people = () => DataFrame.fromCsv(fs.readFileSync(path.join(FIXTURES, 'people.csv'), 'utf-8'))
const mockedCall = vi.mocked(callClaudeWithTools)

const OPTIONS: ClaudeAgentOptions = {
  model: 'test-model',
  maxIterations: 3,
  maxExecutionMs: 5000,
  maxTokens: 1024,
  includePlots: true,
  maxRows: 50,
}

beforeEach(() => {
  mockedCall.mockReset()
})

describe('ClaudeDataframeAgent', () => {
  it('should return a direct answer', async () => {
    mockedCall.mockResolvedValueOnce({
      stopReason: 'end_turn',
      blocks: [{ type: 'text', text: 'There are 5 rows.' }],
    })

    const agent = new ClaudeDataframeAgent(people(), OPTIONS)
    const result = await agent.invoke({ input: 'How many rows?', history: [] })

    expect(result).toEqual({ output: 'There are 5 rows.', charts: [], steps: [] })
    const request = mockedCall.mock.calls[0][0]
    expect(request.model).toBe('test-model')
    expect(request.maxTokens).toBe(1024)
    expect(request.messages).toEqual([{ role: 'user', content: 'How many rows?' }])
    expect(request.tools.map(t => t.name)).toContain('generate_plot')
  })

  it('should run tools and send their results back', async () => {
    mockedCall
      .mockResolvedValueOnce({
        stopReason: 'tool_use',
        blocks: [
          { type: 'text', text: 'Let me check.' },
          { type: 'tool_use', id: 'tu_1', name: 'aggregate', input: { column: 'age', operation: 'max' } },
        ],
      })
      .mockResolvedValueOnce({
        stopReason: 'end_turn',
        blocks: [{ type: 'text', text: 'The oldest person is 40.' }],
      })

    const agent = new ClaudeDataframeAgent(people(), OPTIONS)
    const result = await agent.invoke({ input: 'Oldest age?', history: [] })

    expect(result.output).toBe('The oldest person is 40.')
    expect(result.steps).toEqual([{
      tool: 'aggregate',
      input: { column: 'age', operation: 'max' },
      output: '{"column":"age","operation":"max","value":40}',
      isError: false,
    }])

    const messages = mockedCall.mock.calls[1][0].messages
    expect(messages).toHaveLength(3)
    expect(messages[1]).toEqual({
      role: 'assistant',
      content: [
        { type: 'text', text: 'Let me check.' },
        { type: 'tool_use', id: 'tu_1', name: 'aggregate', input: { column: 'age', operation: 'max' } },
      ],
    })
    expect(messages[2]).toEqual({
      role: 'user',
      content: [{
        type: 'tool_result',
        tool_use_id: 'tu_1',
        content: '{"column":"age","operation":"max","value":40}',
        is_error: false,
      }],
    })
  })

  it('should pass tool errors back to the model', async () => {
    mockedCall
      .mockResolvedValueOnce({
        stopReason: 'tool_use',
        blocks: [{ type: 'tool_use', id: 'tu_1', name: 'value_counts', input: { column: 'salary' } }],
      })
      .mockResolvedValueOnce({ stopReason: 'end_turn', blocks: [{ type: 'text', text: 'No salary column.' }] })

    const agent = new ClaudeDataframeAgent(people(), OPTIONS)
    const result = await agent.invoke({ input: 'Salary?', history: [] })

    expect(result.output).toBe('No salary column.')
    expect(result.steps[0].isError).toBe(true)
  })

  it('should collect charts from the plot tool', async () => {
    mockedCall
      .mockResolvedValueOnce({
        stopReason: 'tool_use',
        blocks: [{ type: 'tool_use', id: 'tu_1', name: 'generate_plot', input: { query: 'histogram of age' } }],
      })
      .mockResolvedValueOnce({ stopReason: 'end_turn', blocks: [{ type: 'text', text: 'Here it is.' }] })

    const agent = new ClaudeDataframeAgent(people(), OPTIONS)
    const result = await agent.invoke({ input: 'Plot ages', history: [] })

    expect(result.charts).toHaveLength(1)
    expect(result.charts[0].title).toBe('Histogram of age')
  })

  it('should leave out the plot tool in basic mode', async () => {
    mockedCall.mockResolvedValueOnce({ stopReason: 'end_turn', blocks: [{ type: 'text', text: 'ok' }] })

    const agent = new ClaudeDataframeAgent(people(), { ...OPTIONS, includePlots: false })
    await agent.invoke({ input: 'hi', history: [] })

    expect(agent.includePlots).toBe(false)
    expect(mockedCall.mock.calls[0][0].tools.map(t => t.name)).not.toContain('generate_plot')
  })

  it('should stop after the iteration limit', async () => {
    mockedCall.mockResolvedValue({
      stopReason: 'tool_use',
      blocks: [{ type: 'tool_use', id: 'tu_1', name: 'dataframe_head', input: {} }],
    })

    const agent = new ClaudeDataframeAgent(people(), { ...OPTIONS, maxIterations: 2 })
    await expect(agent.invoke({ input: 'loop', history: [] })).rejects.toThrow(AgentIterationLimitError)
    expect(mockedCall).toHaveBeenCalledTimes(2)
  })

  it('should abort a slow call after the time limit', async () => {
    mockedCall.mockImplementation(({ signal }) => new Promise((_, reject) => {
      signal?.addEventListener('abort', () => reject(new Error('Request was aborted.')))
    }))

    const agent = new ClaudeDataframeAgent(people(), { ...OPTIONS, maxExecutionMs: 20 })
    await expect(agent.invoke({ input: 'slow', history: [] })).rejects.toThrow(AgentTimeoutError)
  })

  it('should propagate API errors', async () => {
    mockedCall.mockRejectedValueOnce(new Error('overloaded'))

    const agent = new ClaudeDataframeAgent(people(), OPTIONS)
    await expect(agent.invoke({ input: 'hi', history: [] })).rejects.toThrow('overloaded')
  })
})

describe('toMessages', () => {
  it('should start with a user turn and merge repeated roles', () => {
    expect(toMessages([
      { role: 'assistant', content: 'welcome' },
      { role: 'user', content: 'a' },
      { role: 'user', content: 'b' },
      { role: 'assistant', content: 'c' },
      { role: 'user', content: 'd' },
    ])).toEqual([
      { role: 'user', content: 'a\n\nb' },
      { role: 'assistant', content: 'c' },
    ])
  })

  it('should skip blank turns', () => {
    expect(toMessages([{ role: 'user', content: '  ' }])).toEqual([])
  })
})
