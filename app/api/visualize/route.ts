import { NextRequest, NextResponse } from 'next/server'
import { getSessionStore } from '@/lib/sessions'
import { visualizeRequestSchema, describeIssues } from '@/lib/schemas'
import { errorMessage } from '@/lib/errors'

export async function POST(request: NextRequest) {
  try {
    let body: unknown
    try {
      body = await request.json()
    } catch (error) {
      console.warn('[VISUALIZE] Invalid JSON body:', errorMessage(error))
      return NextResponse.json({ error: 'Request body must be JSON.' }, { status: 400 })
    }

    const parsed = visualizeRequestSchema.safeParse(body)
    if (!parsed.success) {
      return NextResponse.json({ error: describeIssues(parsed.error) }, { status: 400 })
    }
    const { sessionId, column, plotType } = parsed.data

    const agent = getSessionStore().getAgent(sessionId)
    if (!agent) {
      return NextResponse.json({ error: 'Please upload a CSV file first.' }, { status: 404 })
    }

    return NextResponse.json({ data: agent.createSimpleVisualization(column, plotType) })
  } catch (error) {
    console.error('[VISUALIZE]', error)
    return NextResponse.json({ error: 'Failed to create the visualization.' }, { status: 500 })
  }
}
