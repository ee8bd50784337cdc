import { describe, it, expect, afterEach } from 'vitest'
import fs from 'fs-extra'
import path from 'path'
import { createRunLogger, runLogFileName } from './loggers.js'
import { makeTempDir } from '../../test/helpers.js'

const LINE = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} - (\w+): \[([\w-]+)\] (.*)$/

describe('loggers.ts', () => {
  let logDir: string

  afterEach(async () => {
    await fs.remove(logDir)
  })

  it('names the run log after the start time in the configured timezone', () => {
    const startedAt = new Date(Date.UTC(2024, 2, 5, 7, 8, 9))
    expect(runLogFileName(startedAt, 'UTC')).toBe('pipeline_2024-03-05_070809.log')
    expect(runLogFileName(startedAt, 'Asia/Tokyo')).toBe(
      'pipeline_2024-03-05_160809.log'
    )
  })

  it('writes formatted lines to the run log, labelled by child loggers', async () => {
    logDir = await makeTempDir('dockrun-logs')
    const runLog = createRunLogger(
      { logDir, logLevel: 'info', logTimezone: 'UTC', console: false, errorLog: false },
      new Date(Date.UTC(2024, 0, 1, 0, 0, 0))
    )
    expect(runLog.logFile).toBe(path.join(logDir, 'pipeline_2024-01-01_000000.log'))

    runLog.logger.info('pipeline starting')
    runLog.logger.child({ label: 'docking' }).warn('no affinity')
    runLog.logger.debug('hidden at info level')
    await runLog.close()

    const lines = (await fs.readFile(runLog.logFile, 'utf8')).trimEnd().split('\n')
    expect(lines).toHaveLength(2)
    expect(lines[0].match(LINE)?.slice(1)).toEqual([
      'info',
      'dockrun',
      'pipeline starting'
    ])
    expect(lines[1].match(LINE)?.slice(1)).toEqual(['warn', 'docking', 'no affinity'])
  })

  it('falls back to info for an unknown level and closes only once', async () => {
    logDir = await makeTempDir('dockrun-logs')
    const runLog = createRunLogger({
      logDir,
      logLevel: 'loud',
      logTimezone: 'UTC',
      console: false,
      errorLog: false
    })
    expect(runLog.logger.level).toBe('info')
    await runLog.close()
    await expect(runLog.close()).resolves.toBeUndefined()
  })
})
