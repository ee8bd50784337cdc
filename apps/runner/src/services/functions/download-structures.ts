import axios from 'axios'
import fs from 'fs-extra'
import { z } from 'zod'
import type { ArtifactKey } from '@dockrun/types'
import type { StageContext } from '../../types/index.js'
import { NoArtifactsProducedError, getErrorMessage } from '../../helpers/errors.js'

const REQUEST_TIMEOUT_MS = 30_000

const CidResponseSchema = z.object({
  IdentifierList: z.object({
    CID: z.array(z.number().int()).nonempty()
  })
})

const fetchText = async (url: string): Promise<string> => {
  const response = await axios.get<string>(url, {
    responseType: 'text',
    timeout: REQUEST_TIMEOUT_MS
  })
  return response.data
}

const lookupCid = async (
  pubchemUrl: string,
  name: string
): Promise<number> => {
  const url = `${pubchemUrl}/compound/name/${encodeURIComponent(name)}/cids/JSON`
  const response = await axios.get<unknown>(url, { timeout: REQUEST_TIMEOUT_MS })
  const parsed = CidResponseSchema.safeParse(response.data)
  if (!parsed.success) {
    throw new Error(`no PubChem CID for ${name}`)
  }
  return parsed.data.IdentifierList.CID[0]
}

const describeFailure = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    return error.response
      ? `HTTP ${error.response.status} from ${error.config?.url ?? 'server'}`
      : error.message
  }
  return getErrorMessage(error)
}

/**
 * Downloads a file into the store. Returns true when the artifact is
 * present afterwards; download failures and invalid target names are
 * logged and return false.
 */
const obtain = async (
  ctx: StageContext,
  key: ArtifactKey,
  label: string,
  download: () => Promise<string>
): Promise<boolean> => {
  const { config, store, logger } = ctx
  try {
    // an unusable target name fails here and only costs this item
    if (!(await store.shouldBuild(key, config.forceRebuild))) return true
    logger.info(`Downloading ${label}...`)
    const published = await store.build([key], async ([staging]) => {
      await fs.writeFile(staging, await download())
    })
    logger.info(`[OK] Saved ${published.join(', ')}`)
    return published.length > 0
  } catch (error) {
    logger.warn(`[WARN] Failed to download ${label}: ${describeFailure(error)}`)
    return false
  }
}

const runDownload = async (ctx: StageContext): Promise<number> => {
  const { config, logger } = ctx
  const { proteins, ligands, antibodies } = config.targets
  const { rcsbUrl, pubchemUrl } = config.download
  await fs.ensureDir(config.dirs.proteins)
  await fs.ensureDir(config.dirs.ligands)

  let requested = 0
  let obtained = 0

  for (const [gene, pdbId] of Object.entries(proteins)) {
    requested++
    const ok = await obtain(
      ctx,
      { kind: 'structure', receptor: pdbId },
      `PDB ${pdbId} (${gene})`,
      () => fetchText(`${rcsbUrl}/${pdbId}.pdb`)
    )
    if (ok) obtained++
  }

  const skip = new Set(antibodies.map((name) => name.toUpperCase()))
  for (const name of ligands) {
    if (skip.has(name.toUpperCase())) {
      logger.info(`Skipping antibody ${name}`)
      continue
    }
    requested++
    const ok = await obtain(
      ctx,
      { kind: 'ligand-source', ligand: name },
      `SDF for ${name}`,
      async () => {
        const cid = await lookupCid(pubchemUrl, name)
        return fetchText(`${pubchemUrl}/compound/cid/${cid}/SDF?record_type=3d`)
      }
    )
    if (ok) obtained++
  }

  logger.info(`Downloads available: ${obtained} / ${requested}`)
  if (requested > 0 && obtained === 0) {
    throw new NoArtifactsProducedError('No structures or ligands could be downloaded')
  }
  return 0
}

export { runDownload, lookupCid }
