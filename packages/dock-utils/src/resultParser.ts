import type { Logger, ScoreResult } from '@dockrun/types'
import { noopLogger } from './logger.js'

export const VINA_RESULT_PREFIX = 'REMARK VINA RESULT:'
// "REMARK VINA RESULT:  -7.1  0.000  0.000" -> whitespace token 3
const VINA_SCORE_TOKEN = 3
const MODE_TABLE_RULE = /^-+\+-+/

const toLines = (text: string | Iterable<string>): Iterable<string> =>
  typeof text === 'string' ? text.split(/\r?\n/) : text

const tokenAt = (line: string, index: number): number | null => {
  const token = line.trim().split(/\s+/)[index]
  if (token === undefined) return null
  const value = Number(token)
  return Number.isFinite(value) ? value : null
}

/**
 * Scans docking output for the first `REMARK VINA RESULT:` line and reads
 * the binding affinity from it. Later result lines are ignored.
 */
export function parseBindingAffinity(
  text: string | Iterable<string>,
  logger: Logger = noopLogger
): ScoreResult {
  let lineNumber = 0
  for (const line of toLines(text)) {
    lineNumber++
    if (!line.trim().startsWith(VINA_RESULT_PREFIX)) continue
    const score = tokenAt(line, VINA_SCORE_TOKEN)
    if (score === null) {
      logger.warn(`[WARN] Malformed result line ${lineNumber}: ${line.trim()}`)
      return { kind: 'malformed', line: lineNumber, text: line }
    }
    return { kind: 'found', score, line: lineNumber }
  }
  return { kind: 'no-result-line' }
}

/**
 * Reads the affinity of mode 1 from the table vina prints on stdout:
 *
 *   mode |   affinity | dist from best mode
 *   -----+------------+----------+----------
 *      1       -7.1          0          0
 */
export function parseModeTable(text: string | Iterable<string>): ScoreResult {
  let lineNumber = 0
  let inTable = false
  for (const line of toLines(text)) {
    lineNumber++
    if (!inTable) {
      inTable = MODE_TABLE_RULE.test(line.trim())
      continue
    }
    if (line.trim() === '') continue
    const mode = tokenAt(line, 0)
    const score = tokenAt(line, 1)
    if (mode !== 1 || score === null) {
      return { kind: 'malformed', line: lineNumber, text: line }
    }
    return { kind: 'found', score, line: lineNumber }
  }
  return { kind: 'no-result-line' }
}

/**
 * Affinity from a docking log: the result remark when present, otherwise
 * the first row of the mode table. A malformed remark gives no affinity.
 */
export function extractAffinity(
  text: string,
  logger: Logger = noopLogger
): number | null {
  const remark = parseBindingAffinity(text, logger)
  if (remark.kind === 'found') return remark.score
  if (remark.kind === 'malformed') return null
  const table = parseModeTable(text)
  if (table.kind === 'found') return table.score
  if (remark.kind === 'no-result-line' && table.kind === 'no-result-line') {
    logger.warn('[WARN] No binding affinity found in docking output')
  }
  return null
}

export function scoreOf(result: ScoreResult): number | null {
  return result.kind === 'found' ? result.score : null
}

export function formatAffinity(affinity: number | null): string {
  return affinity === null ? 'N/A' : String(affinity)
}
