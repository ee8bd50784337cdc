export const getErrorMessage = (error: unknown): string =>
  error instanceof Error
    ? error.message
    : typeof error === 'string'
      ? error
      : JSON.stringify(error)

export const ExitCode = {
  Failure: 1,
  NoArtifacts: 2,
  Interrupted: 130,
  Terminated: 143
} as const

/** Base of every error that ends a run with a specific exit status. */
class PipelineError extends Error {
  readonly exitCode: number

  constructor(message: string, exitCode: number = ExitCode.Failure) {
    super(message)
    this.name = new.target.name
    this.exitCode = exitCode
  }
}

class MissingToolError extends PipelineError {
  constructor(readonly tool: string, detail?: string) {
    super(`Required tool not found: ${tool}${detail ? ` (${detail})` : ''}`)
  }
}

class MissingInputError extends PipelineError {
  constructor(message: string) {
    super(message)
  }
}

class ChildProcessFailure extends PipelineError {
  constructor(
    readonly command: string,
    code: number
  ) {
    super(`Command failed with code ${code}: ${command}`, code === 0 ? ExitCode.Failure : code)
  }
}

class NoArtifactsProducedError extends PipelineError {
  constructor(message: string) {
    super(message, ExitCode.NoArtifacts)
  }
}

class InterruptedError extends PipelineError {
  constructor(
    readonly command: string,
    readonly signal: NodeJS.Signals
  ) {
    super(`Command interrupted by ${signal}: ${command}`, ExitCode.Interrupted)
  }
}

export interface ConfigValidationIssue {
  path: (string | number)[]
  message: string
}

class ConfigError extends PipelineError {
  constructor(
    message: string,
    readonly issues: ConfigValidationIssue[] = []
  ) {
    super(message)
  }

  format(): string {
    const lines = [this.message]
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      lines.push(`  - ${path}: ${issue.message}`)
    }
    return lines.join('\n')
  }
}

export {
  PipelineError,
  MissingToolError,
  MissingInputError,
  ChildProcessFailure,
  NoArtifactsProducedError,
  InterruptedError,
  ConfigError
}
