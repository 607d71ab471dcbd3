import { v4 as uuid } from 'uuid'
import { removeUpload } from './uploads'
import { errorMessage } from './errors'
import type { DataAnalysisAgent } from './agent'
import type { AnswerSource, ChartData, ChatMessage, Session } from './types'

interface SessionEntry {
  session: Session
  agent: DataAnalysisAgent
  messages: ChatMessage[]
  // 같은 밀리초 안의 갱신 순서
  sequence: number
}

/** 프로세스 메모리 세션 저장소 (업로드 파일은 세션 삭제 시 함께 제거) */
export class SessionStore {
  private entries = new Map<string, SessionEntry>()
  private sequence = 0

  createSession(fileName: string, filePath: string, agent: DataAnalysisAgent, id: string = uuid()): Session {
    const now = new Date().toISOString()
    const session: Session = {
      id,
      fileName,
      filePath,
      messageCount: 0,
      createdAt: now,
      updatedAt: now,
    }
    this.entries.set(id, { session, agent, messages: [], sequence: ++this.sequence })
    console.log(`[SESSIONS] Created ${id} for ${fileName}`)
    return { ...session }
  }

  getSession(id: string): Session | null {
    const entry = this.entries.get(id)
    return entry ? { ...entry.session } : null
  }

  getAgent(id: string): DataAnalysisAgent | null {
    return this.entries.get(id)?.agent ?? null
  }

  listSessions(): Session[] {
    return [...this.entries.values()]
      .sort((a, b) => b.session.updatedAt.localeCompare(a.session.updatedAt) || b.sequence - a.sequence)
      .map(entry => ({ ...entry.session }))
  }

  addMessage(
    sessionId: string,
    role: 'user' | 'assistant',
    content: string,
    extra?: { source?: AnswerSource; charts?: ChartData[] },
  ): ChatMessage {
    const entry = this.entries.get(sessionId)
    if (!entry) {
      throw new Error(`Session not found: ${sessionId}`)
    }

    const now = new Date().toISOString()
    const message: ChatMessage = {
      id: uuid(),
      sessionId,
      role,
      content,
      source: extra?.source,
      charts: extra?.charts && extra.charts.length > 0 ? extra.charts : undefined,
      createdAt: now,
    }
    entry.messages.push(message)
    entry.session.messageCount = entry.messages.length
    entry.session.updatedAt = now
    entry.sequence = ++this.sequence
    return message
  }

  getMessages(sessionId: string): ChatMessage[] {
    return [...(this.entries.get(sessionId)?.messages ?? [])]
  }

  async removeSession(id: string): Promise<boolean> {
    const entry = this.entries.get(id)
    if (!entry) return false
    this.entries.delete(id)
    try {
      await removeUpload(entry.session.filePath)
    } catch (error) {
      console.warn(`[SESSIONS] Could not delete upload for ${id}: ${errorMessage(error)}`)
    }
    console.log(`[SESSIONS] Removed ${id}`)
    return true
  }
}

let store: SessionStore | null = null

export function getSessionStore(): SessionStore {
  if (!store) {
    store = new SessionStore()
  }
  return store
}

export function resetSessionStore(): void {
  store = null
}
