import { NextResponse } from 'next/server'
import { getSessionStore } from '@/lib/sessions'

export async function GET() {
  try {
    const sessions = getSessionStore().listSessions()
    return NextResponse.json({ data: sessions })
  } catch (error) {
    console.error('[SESSIONS]', error)
    return NextResponse.json({ error: 'Could not load sessions.' }, { status: 500 })
  }
}
