import { writeFile, mkdir, rm } from 'fs/promises'
import path from 'path'
import { getConfig } from './config'
import { UploadError } from './errors'

const UNSAFE_CHARS = /[^A-Za-z0-9_.-]/g

/** 경로 구분자/공백/비ASCII 문자를 제거한 안전한 파일명 */
export function secureFilename(filename: string): string {
  const ascii = filename.normalize('NFKD').replace(/[^\x00-\x7F]/g, '')
  const flattened = ascii.replace(/[/\\]/g, ' ')
  return flattened
    .split(/\s+/)
    .filter(Boolean)
    .join('_')
    .replace(UNSAFE_CHARS, '')
    .replace(/^[._]+|[._]+$/g, '')
}

export function isCsvFilename(filename: string): boolean {
  return filename.endsWith('.csv')
}

export function resolveUploadDir(): string {
  return path.resolve(process.cwd(), getConfig().uploadDir)
}

export interface SavedUpload {
  fileName: string
  filePath: string
}

export async function saveUpload(file: File, sessionId: string): Promise<SavedUpload> {
  const { maxUploadBytes } = getConfig()
  if (file.size > maxUploadBytes) {
    throw new UploadError(`File too large. Maximum size is ${Math.floor(maxUploadBytes / (1024 * 1024))} MB.`, 413)
  }

  const fileName = secureFilename(file.name) || 'upload.csv'
  const uploadsDir = resolveUploadDir()
  await mkdir(uploadsDir, { recursive: true })

  const filePath = path.join(uploadsDir, `${sessionId}_${fileName}`)
  await writeFile(filePath, Buffer.from(await file.arrayBuffer()))
  console.log(`[UPLOAD] Saved ${fileName} (${file.size} bytes)`)
  return { fileName, filePath }
}

export async function removeUpload(filePath: string): Promise<void> {
  await rm(filePath, { force: true })
}
