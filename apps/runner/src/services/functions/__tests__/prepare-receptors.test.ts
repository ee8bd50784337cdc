import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import fs from 'fs-extra'
import path from 'path'
import { runToolOrThrow } from '../../../helpers/runToolStep.js'
import { ChildProcessFailure, NoArtifactsProducedError } from '../../../helpers/errors.js'
import { pickSplitOutput, runPrepareReceptors } from '../prepare-receptors.js'
import { makeStageContext, makeTempDir, messages } from '../../../../test/helpers.js'

vi.mock('../../../helpers/runToolStep.js', () => ({
  runToolStep: vi.fn(),
  runToolOrThrow: vi.fn()
}))

const argAfter = (args: readonly string[], flag: string) => args[args.indexOf(flag) + 1]

interface FakeMglOptions {
  splitSuffixes?: string[]
  splitFails?: boolean
  writeReceptor?: boolean
}

const fakeMglTools = ({
  splitSuffixes = [],
  splitFails = false,
  writeReceptor = true
}: FakeMglOptions = {}) =>
  vi.mocked(runToolOrThrow).mockImplementation(async (_executable, args) => {
    const script = path.basename(args[0])
    if (script === 'prepare_pdb_split_alt_confs.py') {
      if (splitFails) throw new ChildProcessFailure('split', 1)
      for (const suffix of splitSuffixes) {
        await fs.writeFile(`${argAfter(args, '-o')}${suffix}`, 'ATOM split\n')
      }
      return
    }
    if (writeReceptor) {
      await fs.writeFile(argAfter(args, '-o'), `prepared from ${path.basename(argAfter(args, '-r'))}\n`)
    }
  })

const receptorCalls = () =>
  vi
    .mocked(runToolOrThrow)
    .mock.calls.filter(([, args]) => path.basename(args[0]) === 'prepare_receptor4.py')

describe('runPrepareReceptors', () => {
  let root: string
  let proteins: string
  let receptors: string

  beforeEach(async () => {
    vi.mocked(runToolOrThrow).mockReset()
    root = await makeTempDir('dockrun-receptors')
    proteins = path.join(root, 'data', 'proteins')
    receptors = path.join(root, 'results', 'docking', 'receptors')
    await fs.outputFile(path.join(proteins, '5CRB.pdb'), 'ATOM 5CRB\n')
    await fs.outputFile(path.join(proteins, '4G6J.pdb'), 'ATOM 4G6J\n')
  })

  afterEach(async () => {
    await fs.remove(root)
  })

  it('prepares each protein with the cleanup flag and reports a summary', async () => {
    fakeMglTools()
    const ctx = makeStageContext(root, { RECEPTOR_CLEAN_FLAG: 'nphs_lps' })
    expect(await runPrepareReceptors(ctx)).toBe(0)

    const [, args] = receptorCalls()[0]
    expect(args).toEqual([
      path.join(root, 'mgltools', 'Utilities24', 'prepare_receptor4.py'),
      '-r', path.join(proteins, '4G6J.pdb'),
      '-o', path.join(receptors, '.4G6J.partial.pdbqt'),
      '-A', 'hydrogens',
      '-U', 'nphs_lps'
    ])
    expect(await fs.readFile(path.join(receptors, '5CRB.pdbqt'), 'utf8')).toBe(
      'prepared from 5CRB.pdb\n'
    )
    expect(messages(ctx.logger.info)).toContain(`Receptors prepared: 2 / 2 -> ${receptors}`)
  })

  it('is idempotent and skips existing receptors on the next run', async () => {
    fakeMglTools()
    await runPrepareReceptors(makeStageContext(root))
    const first = await fs.readFile(path.join(receptors, '4G6J.pdbqt'), 'utf8')
    const callsAfterFirst = vi.mocked(runToolOrThrow).mock.calls.length

    const ctx = makeStageContext(root)
    expect(await runPrepareReceptors(ctx)).toBe(0)
    expect(vi.mocked(runToolOrThrow).mock.calls.length).toBe(callsAfterFirst)
    expect(await fs.readFile(path.join(receptors, '4G6J.pdbqt'), 'utf8')).toBe(first)
    expect(messages(ctx.logger.info)).toEqual([
      `[SKIP] receptor exists -> ${path.join(receptors, '4G6J.pdbqt')}`,
      `[SKIP] receptor exists -> ${path.join(receptors, '5CRB.pdbqt')}`,
      `Receptors prepared: 2 / 2 -> ${receptors}`
    ])
  })

  it('rebuilds every receptor when forced', async () => {
    fakeMglTools()
    await runPrepareReceptors(makeStageContext(root))
    await runPrepareReceptors(makeStageContext(root, {}, { forceRebuild: true }))
    expect(receptorCalls()).toHaveLength(4)
  })

  it('prepares from the A conformer when the splitter writes one', async () => {
    fakeMglTools({ splitSuffixes: ['_B.pdb', '_A.pdb'] })
    await runPrepareReceptors(makeStageContext(root))
    expect(await fs.readFile(path.join(receptors, '5CRB.pdbqt'), 'utf8')).toBe(
      'prepared from 5CRB_split.pdb_A.pdb\n'
    )
  })

  it('falls back to the original file when splitting fails', async () => {
    fakeMglTools({ splitFails: true })
    const ctx = makeStageContext(root)
    expect(await runPrepareReceptors(ctx)).toBe(0)
    expect(await fs.readFile(path.join(receptors, '4G6J.pdbqt'), 'utf8')).toBe(
      'prepared from 4G6J.pdb\n'
    )
    expect(messages(ctx.logger.warn)[0]).toBe(
      '[WARN] Alt-loc split failed for 4G6J.pdb, using original: Command failed with code 1: split'
    )
  })

  it('fails with exit code 2 when proteins exist but nothing was prepared', async () => {
    fakeMglTools({ writeReceptor: false })
    await expect(runPrepareReceptors(makeStageContext(root))).rejects.toBeInstanceOf(
      NoArtifactsProducedError
    )
  })

  it('aborts on a preparation failure', async () => {
    vi.mocked(runToolOrThrow).mockImplementation(async (_executable, args) => {
      if (path.basename(args[0]) === 'prepare_receptor4.py') {
        throw new ChildProcessFailure('prepare_receptor4.py', 3)
      }
    })
    await expect(runPrepareReceptors(makeStageContext(root))).rejects.toMatchObject({
      exitCode: 3
    })
    expect(await fs.pathExists(path.join(receptors, '4G6J.pdbqt'))).toBe(false)
  })

  it('treats an empty protein directory as nothing to do', async () => {
    await fs.emptyDir(proteins)
    const ctx = makeStageContext(root)
    expect(await runPrepareReceptors(ctx)).toBe(0)
    expect(runToolOrThrow).not.toHaveBeenCalled()
  })
})

describe('pickSplitOutput', () => {
  let dir: string

  beforeEach(async () => {
    dir = await makeTempDir('dockrun-altloc')
  })

  afterEach(async () => {
    await fs.remove(dir)
  })

  it('prefers B over other conformers when A is missing', async () => {
    await fs.writeFile(path.join(dir, '5CRB_split.pdb_C.pdb'), '')
    await fs.writeFile(path.join(dir, '5CRB_split.pdb_B.pdb'), '')
    expect(await pickSplitOutput(dir, '5CRB')).toBe(path.join(dir, '5CRB_split.pdb_B.pdb'))
  })

  it('takes the newest remaining split file', async () => {
    const older = path.join(dir, '5CRB_split.pdb_C.pdb')
    const newer = path.join(dir, '5CRB_split.pdb_D.pdb')
    await fs.writeFile(older, '')
    await fs.writeFile(newer, '')
    await fs.utimes(older, new Date(1_000_000), new Date(1_000_000))
    await fs.utimes(newer, new Date(2_000_000), new Date(2_000_000))
    expect(await pickSplitOutput(dir, '5CRB')).toBe(newer)
  })

  it('returns null when the splitter wrote nothing', async () => {
    expect(await pickSplitOutput(dir, '5CRB')).toBeNull()
  })
})
