export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message)
    this.name = 'AnalysisError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export class ConfigError extends AnalysisError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR')
    this.name = 'ConfigError'
  }
}

export class CsvLoadError extends AnalysisError {
  constructor(message: string) {
    super(message, 'CSV_LOAD_ERROR')
    this.name = 'CsvLoadError'
  }
}

export class UploadError extends AnalysisError {
  constructor(message: string, public readonly status: number = 400) {
    super(message, 'UPLOAD_ERROR')
    this.name = 'UploadError'
  }
}

export class AgentTimeoutError extends AnalysisError {
  constructor(limitMs: number) {
    super(`Agent stopped after exceeding ${limitMs}ms`, 'AGENT_TIMEOUT')
    this.name = 'AgentTimeoutError'
  }
}

export class AgentIterationLimitError extends AnalysisError {
  constructor(limit: number) {
    super(`Agent stopped after ${limit} iterations without a final answer`, 'AGENT_ITERATION_LIMIT')
    this.name = 'AgentIterationLimitError'
  }
}

export class InvalidToolInputError extends AnalysisError {
  constructor(tool: string, detail: string) {
    super(`Invalid input for ${tool}: ${detail}`, 'INVALID_TOOL_INPUT')
    this.name = 'InvalidToolInputError'
  }
}

export class ColumnNotFoundError extends AnalysisError {
  constructor(column: string, available: string[]) {
    super(`Column '${column}' not found. Available columns: ${available.slice(0, 10).join(', ')}`, 'COLUMN_NOT_FOUND')
    this.name = 'ColumnNotFoundError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
