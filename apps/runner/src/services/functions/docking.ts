import fs from 'fs-extra'
import path from 'path'
import type { BoundingBox, DockingResult } from '@dockrun/types'
import {
  extractAffinity,
  formatAffinity,
  formatBox,
  stemOf
} from '@dockrun/dock-utils'
import type { StageContext } from '../../types/index.js'
import { runToolOrThrow } from '../../helpers/runToolStep.js'
import { MissingInputError } from '../../helpers/errors.js'
import { closeStream, listInputFiles, withValidStems } from './stage-utils.js'
import { searchBoxFor, type BoxCache } from './search-box.js'

interface DockingPair {
  receptor: string
  receptorFile: string
  ligand: string
  ligandFile: string
}

const vinaArgs = (
  ctx: StageContext,
  pair: DockingPair,
  box: BoundingBox,
  posePath: string
): string[] => {
  const [cx, cy, cz] = box.center
  const [sx, sy, sz] = box.size
  const { exhaustiveness, verbosity } = ctx.config.docking
  return [
    '--receptor', pair.receptorFile,
    '--ligand', pair.ligandFile,
    '--center_x', String(cx),
    '--center_y', String(cy),
    '--center_z', String(cz),
    '--size_x', String(sx),
    '--size_y', String(sy),
    '--size_z', String(sz),
    '--exhaustiveness', String(exhaustiveness),
    '--verbosity', String(verbosity),
    '--out', posePath
  ]
}

const readAffinity = async (
  ctx: StageContext,
  logFile: string
): Promise<number | null> =>
  extractAffinity(await fs.readFile(logFile, 'utf8'), ctx.logger)

const dockPair = async (
  ctx: StageContext,
  pair: DockingPair,
  boxes: BoxCache
): Promise<DockingResult> => {
  const { config, store, logger } = ctx
  const { receptor, ligand } = pair
  const poseKey = { kind: 'pose' as const, receptor, ligand }
  const logKey = { kind: 'docking-log' as const, receptor, ligand }

  const needPose = await store.shouldBuild(poseKey, config.forceRebuild)
  const needLog = await store.shouldBuild(logKey, config.forceRebuild)
  if (!needPose && !needLog) {
    return { receptor, ligand, affinity: await readAffinity(ctx, store.locationFor(logKey)) }
  }

  const { box } = await searchBoxFor(ctx, receptor, pair.receptorFile, boxes)
  logger.info(`Running docking: ${receptor} + ${ligand}`)
  logger.info(`Search box (${box.provenance}): ${formatBox(box)}`)

  const published = await store.build([poseKey, logKey], async ([posePath, logPath]) => {
    const logStream = fs.createWriteStream(logPath)
    try {
      await runToolOrThrow(config.environments.vina, vinaArgs(ctx, pair, box, posePath), {
        logger,
        signal: ctx.signal,
        onLine: (line) => logStream.write(`${line}\n`)
      })
    } finally {
      await closeStream(logStream)
    }
  })

  const logFile = store.locationFor(logKey)
  if (!published.includes(store.locationFor(poseKey))) {
    logger.warn(`[WARN] Docking produced no pose for ${receptor} + ${ligand}`)
  } else {
    logger.info(`[OK] Docking complete. Output: ${store.locationFor(poseKey)}`)
  }
  const affinity = published.includes(logFile) ? await readAffinity(ctx, logFile) : null
  return { receptor, ligand, affinity }
}

const formatSummary = (results: DockingResult[]): string[] => {
  const rule = '-'.repeat(82)
  return [
    '=== Docking Summary ===',
    `${'Protein'.padEnd(30)} ${'Ligand'.padEnd(30)} ${'Affinity (kcal/mol)'.padStart(20)}`,
    rule,
    ...results.map(
      ({ receptor, ligand, affinity }) =>
        `${receptor.padEnd(30)} ${ligand.padEnd(30)} ${formatAffinity(affinity).padStart(20)}`
    )
  ]
}

/**
 * Docks every prepared receptor against every prepared ligand, one pair at
 * a time. A failing docking run aborts the stage with the tool's status.
 */
const runDocking = async (ctx: StageContext): Promise<number> => {
  const { config, logger } = ctx
  const receptorFiles = withValidStems(
    await listInputFiles(config.dirs.receptors, ['.pdbqt']),
    logger
  )
  const ligandFiles = withValidStems(
    await listInputFiles(config.dirs.preparedLigands, ['.pdbqt']),
    logger
  )
  if (receptorFiles.length === 0) {
    throw new MissingInputError(`No receptor .pdbqt files in ${config.dirs.receptors}`)
  }
  if (ligandFiles.length === 0) {
    throw new MissingInputError(
      `No ligand .pdbqt files in ${config.dirs.preparedLigands}`
    )
  }
  await fs.ensureDir(config.dirs.dockingOutputs)

  const boxes: BoxCache = new Map()
  const results: DockingResult[] = []
  for (const receptorFile of receptorFiles) {
    for (const ligandFile of ligandFiles) {
      const pair = {
        receptor: stemOf(receptorFile),
        receptorFile,
        ligand: stemOf(ligandFile),
        ligandFile
      }
      try {
        results.push(await dockPair(ctx, pair, boxes))
      } catch (error) {
        logger.error(
          `[ERROR] Docking failed for ${path.basename(receptorFile)} + ${path.basename(ligandFile)}`
        )
        throw error
      }
    }
  }

  for (const line of formatSummary(results)) logger.info(line)
  return 0
}

export { runDocking, vinaArgs, formatSummary }
