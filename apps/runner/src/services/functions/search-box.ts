import fs from 'fs-extra'
import type { BoxResult } from '@dockrun/types'
import {
  boxFromReceptorText,
  defaultBoxResult,
  manualBoxFor
} from '@dockrun/dock-utils'
import type { StageContext } from '../../types/index.js'
import { getErrorMessage } from '../../helpers/errors.js'

export type BoxCache = Map<string, BoxResult>

/**
 * Search box for a receptor: the manual override when one is configured,
 * otherwise computed from the receptor's coordinates. Memoized in `cache`.
 */
const searchBoxFor = async (
  ctx: Pick<StageContext, 'config' | 'logger'>,
  receptor: string,
  receptorFile: string,
  cache: BoxCache
): Promise<BoxResult> => {
  const cached = cache.get(receptor)
  if (cached) return cached

  const { config, logger } = ctx
  let result = manualBoxFor(receptor, config.manualBoxes)
  if (result === null) {
    try {
      const text = await fs.readFile(receptorFile, 'utf8')
      result = boxFromReceptorText(text, config.box, logger)
    } catch (error) {
      logger.warn(
        `[WARN] Cannot read ${receptorFile} (${getErrorMessage(error)}), using default search box`
      )
      result = defaultBoxResult('unreadable')
    }
  }
  cache.set(receptor, result)
  return result
}

export { searchBoxFor }
