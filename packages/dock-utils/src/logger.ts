import type { Logger } from '@dockrun/types'

export const noopLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {}
}
