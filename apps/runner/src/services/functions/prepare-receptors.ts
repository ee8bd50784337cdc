import fs from 'fs-extra'
import path from 'path'
import { stemOf } from '@dockrun/dock-utils'
import type { StageContext } from '../../types/index.js'
import { runToolOrThrow } from '../../helpers/runToolStep.js'
import {
  ChildProcessFailure,
  NoArtifactsProducedError,
  getErrorMessage
} from '../../helpers/errors.js'
import { listInputFiles, withValidStems } from './stage-utils.js'

export const PREPARE_RECEPTOR_SCRIPT = 'prepare_receptor4.py'
export const SPLIT_ALT_CONFS_SCRIPT = 'prepare_pdb_split_alt_confs.py'

const ALTLOC_DIR = 'altloc'

const newestFirst = async (files: string[]) => {
  const stamped = await Promise.all(
    files.map(async (file) => ({ file, mtime: (await fs.stat(file)).mtimeMs }))
  )
  return stamped.sort((a, b) => b.mtime - a.mtime).map(({ file }) => file)
}

/**
 * Picks the conformer file the splitter wrote for `base`: `_A`, then `_B`,
 * then the newest other `<base>_split*.pdb`. Null when there is none.
 */
const pickSplitOutput = async (
  dir: string,
  base: string
): Promise<string | null> => {
  const prefix = `${base}_split.pdb`
  for (const suffix of ['_A.pdb', '_B.pdb']) {
    const candidate = path.join(dir, `${prefix}${suffix}`)
    if (await fs.pathExists(candidate)) return candidate
  }
  if (!(await fs.pathExists(dir))) return null
  const others = (await fs.readdir(dir))
    .filter((name) => name.startsWith(`${base}_split`) && name.endsWith('.pdb'))
    .map((name) => path.join(dir, name))
  const [newest] = await newestFirst(others)
  return newest ?? null
}

/**
 * Splits alternate locations out of a receptor PDB. Any failure of the
 * splitter falls back to the original file.
 */
const splitAltLocations = async (
  ctx: StageContext,
  pdbFile: string
): Promise<string> => {
  const { config, logger, signal } = ctx
  const base = stemOf(pdbFile)
  const workDir = path.join(config.dirs.receptors, ALTLOC_DIR)
  await fs.ensureDir(workDir)
  try {
    await runToolOrThrow(
      config.environments.mgltools,
      [
        path.join(config.tools.mgltoolsUtilsDir, SPLIT_ALT_CONFS_SCRIPT),
        '-r',
        pdbFile,
        '-o',
        path.join(workDir, `${base}_split.pdb`)
      ],
      { logger, signal }
    )
  } catch (error) {
    if (!(error instanceof ChildProcessFailure)) throw error
    logger.warn(
      `[WARN] Alt-loc split failed for ${path.basename(pdbFile)}, using original: ${getErrorMessage(error)}`
    )
    return pdbFile
  }
  return (await pickSplitOutput(workDir, base)) ?? pdbFile
}

const runPrepareReceptors = async (ctx: StageContext): Promise<number> => {
  const { config, store, logger, signal } = ctx
  const proteins = withValidStems(
    await listInputFiles(config.dirs.proteins, ['.pdb']),
    logger
  )
  if (proteins.length === 0) {
    logger.info(`[INFO] No .pdb files found in ${config.dirs.proteins}`)
    return 0
  }

  let prepared = 0
  for (const pdbFile of proteins) {
    const key = { kind: 'receptor' as const, receptor: stemOf(pdbFile) }
    if (!(await store.shouldBuild(key, config.forceRebuild))) {
      prepared++
      continue
    }
    const source = await splitAltLocations(ctx, pdbFile)
    if (source !== pdbFile) {
      logger.info(`[INFO] Using split alt-loc file: ${source}`)
    }
    const published = await store.build([key], async ([staging]) => {
      await runToolOrThrow(
        config.environments.mgltools,
        [
          path.join(config.tools.mgltoolsUtilsDir, PREPARE_RECEPTOR_SCRIPT),
          '-r',
          source,
          '-o',
          staging,
          '-A',
          'hydrogens',
          '-U',
          config.receptorCleanFlag
        ],
        { logger, signal }
      )
    })
    if (published.length > 0) {
      prepared++
      logger.info(`[OK] Receptor -> ${published[0]}`)
    } else {
      logger.error(`[ERROR] No receptor written for ${path.basename(pdbFile)}`)
    }
  }

  logger.info(
    `Receptors prepared: ${prepared} / ${proteins.length} -> ${config.dirs.receptors}`
  )
  if (prepared === 0) {
    throw new NoArtifactsProducedError('No receptors were prepared')
  }
  return 0
}

export { runPrepareReceptors, pickSplitOutput }
