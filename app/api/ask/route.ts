import { NextRequest, NextResponse } from 'next/server'
import { getSessionStore } from '@/lib/sessions'
import { askRequestSchema, describeIssues } from '@/lib/schemas'
import { errorMessage } from '@/lib/errors'
import type { AskResult, QueryResult } from '@/lib/types'

export async function POST(request: NextRequest) {
  try {
    let body: unknown
    try {
      body = await request.json()
    } catch (error) {
      console.warn('[ASK] Invalid JSON body:', errorMessage(error))
      return NextResponse.json({ error: 'Request body must be JSON.' }, { status: 400 })
    }

    const parsed = askRequestSchema.safeParse(body)
    if (!parsed.success) {
      return NextResponse.json({ error: describeIssues(parsed.error) }, { status: 400 })
    }
    const { sessionId, question } = parsed.data

    const store = getSessionStore()
    const agent = store.getAgent(sessionId)
    if (!agent) {
      return NextResponse.json({ error: 'Please upload a CSV file first.' }, { status: 404 })
    }

    store.addMessage(sessionId, 'user', question)

    let result: QueryResult
    try {
      result = await agent.runQuery(question)
    } catch (error) {
      console.error('[ASK]', error)
      result = {
        reply: `An error occurred while processing your question: ${errorMessage(error)}`,
        source: 'error',
        charts: [],
      }
    }
    console.log(`[ASK] ${sessionId} answered by ${result.source}`)

    store.addMessage(sessionId, 'assistant', result.reply, { source: result.source, charts: result.charts })

    const response: AskResult = { ...result, history: store.getMessages(sessionId) }
    return NextResponse.json({ data: response })
  } catch (error) {
    console.error('[ASK]', error)
    return NextResponse.json({ error: 'Failed to process the question.' }, { status: 500 })
  }
}
