import { NextRequest, NextResponse } from 'next/server'
import { v4 as uuid } from 'uuid'
import { DataAnalysisAgent } from '@/lib/agent'
import { getSessionStore } from '@/lib/sessions'
import { isCsvFilename, saveUpload, removeUpload } from '@/lib/uploads'
import { UploadError, errorMessage } from '@/lib/errors'
import type { UploadResult } from '@/lib/types'

export async function POST(request: NextRequest) {
  try {
    let formData: FormData
    try {
      formData = await request.formData()
    } catch (error) {
      console.warn('[UPLOAD] Unreadable form data:', errorMessage(error))
      return NextResponse.json({ error: 'No file was uploaded.' }, { status: 400 })
    }

    const file = formData.get('csv_file')
    if (!file || typeof file === 'string') {
      return NextResponse.json({ error: 'No file was uploaded.' }, { status: 400 })
    }
    if (file.name === '') {
      return NextResponse.json({ error: 'No file selected.' }, { status: 400 })
    }
    if (!isCsvFilename(file.name)) {
      return NextResponse.json({ error: 'File type not allowed. Please upload a CSV file.' }, { status: 400 })
    }

    const sessionId = uuid()
    const { fileName, filePath } = await saveUpload(file, sessionId)

    const agent = new DataAnalysisAgent()
    try {
      await agent.loadFile(filePath)
    } catch (error) {
      console.error('[UPLOAD] CSV processing failed:', errorMessage(error))
      await removeUpload(filePath)
      return NextResponse.json({ error: `Error processing the CSV: ${errorMessage(error)}` }, { status: 400 })
    }

    getSessionStore().createSession(fileName, filePath, agent, sessionId)

    const result: UploadResult = {
      sessionId,
      fileName,
      message: `File ${fileName} loaded successfully! You can now ask questions.`,
      info: agent.getDataframeInfo(),
    }
    return NextResponse.json({ data: result })
  } catch (error) {
    if (error instanceof UploadError) {
      return NextResponse.json({ error: error.message }, { status: error.status })
    }
    console.error('[UPLOAD]', error)
    return NextResponse.json({ error: 'File upload failed.' }, { status: 500 })
  }
}
