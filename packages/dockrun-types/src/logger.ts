// Minimal logger shape shared by the runner and the pure utilities.
// A winston Logger satisfies it.
export type Logger = {
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
  debug: (message: string) => void
  child?: (meta: { label: string }) => Logger
}
