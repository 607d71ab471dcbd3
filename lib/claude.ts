import Anthropic from '@anthropic-ai/sdk'
import type { MessageParam, TextBlockParam, Tool } from '@anthropic-ai/sdk/resources/messages'
import { getConfig } from './config'
import { ConfigError } from './errors'

export function withCacheControl(text: string): TextBlockParam {
  return {
    type: 'text',
    text,
    cache_control: { type: 'ephemeral' },
  }
}

// ========== 범용 Claude API 래퍼 ==========

let client: Anthropic | null = null

function getClient(): Anthropic {
  if (!client) {
    const apiKey = getConfig().anthropicApiKey
    if (!apiKey) {
      throw new ConfigError('ANTHROPIC_API_KEY is not set')
    }
    client = new Anthropic({ apiKey })
  }
  return client
}

export function resetClient(): void {
  client = null
}

// ========== 도구 호출 ==========

export type AssistantBlock =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; id: string; name: string; input: unknown }

export interface AssistantTurn {
  stopReason: string | null
  blocks: AssistantBlock[]
}

export async function callClaudeWithTools(options: {
  model: string
  systemBlocks: TextBlockParam[]
  messages: MessageParam[]
  tools: Tool[]
  maxTokens?: number
  temperature?: number
  signal?: AbortSignal
}): Promise<AssistantTurn> {
  const anthropic = getClient()
  const response = await anthropic.messages.create(
    {
      model: options.model,
      max_tokens: options.maxTokens ?? 4096,
      system: options.systemBlocks,
      messages: options.messages,
      tools: options.tools,
      temperature: options.temperature ?? 0,
    },
    { signal: options.signal },
  )

  const blocks: AssistantBlock[] = []
  for (const block of response.content) {
    if (block.type === 'text') {
      blocks.push({ type: 'text', text: block.text })
    } else if (block.type === 'tool_use') {
      blocks.push({ type: 'tool_use', id: block.id, name: block.name, input: block.input })
    }
  }

  return { stopReason: response.stop_reason, blocks }
}
