import { z } from 'zod'

export const askRequestSchema = z.object({
  sessionId: z.string().trim().min(1, 'sessionId is required'),
  question: z.string().trim().min(1, 'Please enter a question.'),
})

export type AskRequest = z.infer<typeof askRequestSchema>

export const visualizeRequestSchema = z.object({
  sessionId: z.string().trim().min(1, 'sessionId is required'),
  column: z.string().min(1, 'column is required'),
  plotType: z.enum(['histogram', 'boxplot']).default('histogram'),
})

export type VisualizeRequest = z.infer<typeof visualizeRequestSchema>

/** zod 이슈를 "path: message; ..." 한 줄로 */
export function describeIssues(error: z.ZodError, fallbackPath: string = 'input'): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || fallbackPath}: ${issue.message}`)
    .join('; ')
}
