import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import fs from 'fs-extra'
import path from 'path'
import { runToolOrThrow } from '../../../helpers/runToolStep.js'
import { NoArtifactsProducedError } from '../../../helpers/errors.js'
import { collectLigandInputs, runPrepareLigands } from '../prepare-ligands.js'
import { makeStageContext, makeTempDir, messages } from '../../../../test/helpers.js'

vi.mock('../../../helpers/runToolStep.js', () => ({
  runToolStep: vi.fn(),
  runToolOrThrow: vi.fn()
}))

const fakePrepareLigand = () =>
  vi.mocked(runToolOrThrow).mockImplementation(async (_executable, args, opts) => {
    const input = args[args.indexOf('-l') + 1]
    await fs.writeFile(
      args[args.indexOf('-o') + 1],
      `ligand from ${path.basename(opts.cwd ?? '')}/${input}\n`
    )
  })

describe('collectLigandInputs', () => {
  let root: string

  beforeEach(async () => {
    root = await makeTempDir('dockrun-ligand-inputs')
  })

  afterEach(async () => {
    await fs.remove(root)
  })

  it('takes the first directory holding a stem and sorts by stem', async () => {
    const first = path.join(root, 'ligands_pdb')
    const second = path.join(root, 'ligands')
    await fs.outputFile(path.join(first, 'MEROPENEM.pdb'), '')
    await fs.outputFile(path.join(second, 'MEROPENEM.sdf'), '')
    await fs.outputFile(path.join(second, 'ATENOLOL.sdf'), '')
    await fs.outputFile(path.join(second, 'notes.txt'), '')

    expect(await collectLigandInputs([first, second])).toEqual([
      path.join(second, 'ATENOLOL.sdf'),
      path.join(first, 'MEROPENEM.pdb')
    ])
  })

  it('returns nothing for missing directories', async () => {
    expect(await collectLigandInputs([path.join(root, 'absent')])).toEqual([])
  })
})

describe('runPrepareLigands', () => {
  let root: string
  let ligandsPdb: string
  let ligands: string
  let prepared: string

  beforeEach(async () => {
    vi.mocked(runToolOrThrow).mockReset()
    root = await makeTempDir('dockrun-ligands')
    ligandsPdb = path.join(root, 'data', 'ligands_pdb')
    ligands = path.join(root, 'data', 'ligands')
    prepared = path.join(root, 'results', 'docking', 'ligands')
    await fs.outputFile(path.join(ligandsPdb, 'ATENOLOL.pdb'), 'HETATM\n')
    await fs.outputFile(path.join(ligands, 'ATENOLOL.sdf'), 'sdf\n')
    await fs.outputFile(path.join(ligands, 'CAFFEINE.mol2'), 'mol2\n')
  })

  afterEach(async () => {
    await fs.remove(root)
  })

  it('runs the preparer from the ligand directory with a bare file name', async () => {
    fakePrepareLigand()
    const ctx = makeStageContext(root, { LIGAND_ADD_FLAG: 'hydrogens' })
    expect(await runPrepareLigands(ctx)).toBe(0)

    expect(runToolOrThrow).toHaveBeenCalledTimes(2)
    const [executable, args, opts] = vi.mocked(runToolOrThrow).mock.calls[0]
    expect(executable).toBe('python2')
    expect(args).toEqual([
      path.join(root, 'mgltools', 'Utilities24', 'prepare_ligand4.py'),
      '-l', 'ATENOLOL.pdb',
      '-o', path.join(prepared, '.ATENOLOL.partial.pdbqt'),
      '-A', 'hydrogens'
    ])
    expect(opts.cwd).toBe(ligandsPdb)
  })

  it('prefers ligands_pdb over ligands for the same stem', async () => {
    fakePrepareLigand()
    const ctx = makeStageContext(root)
    await runPrepareLigands(ctx)

    expect(await fs.readFile(path.join(prepared, 'ATENOLOL.pdbqt'), 'utf8')).toBe(
      'ligand from ligands_pdb/ATENOLOL.pdb\n'
    )
    expect(await fs.readFile(path.join(prepared, 'CAFFEINE.pdbqt'), 'utf8')).toBe(
      'ligand from ligands/CAFFEINE.mol2\n'
    )
    expect(messages(ctx.logger.info)).toContain(`Ligands prepared: 2 / 2 -> ${prepared}`)
  })

  it('skips prepared ligands unless forced', async () => {
    fakePrepareLigand()
    await runPrepareLigands(makeStageContext(root))

    const rerun = makeStageContext(root)
    await runPrepareLigands(rerun)
    expect(runToolOrThrow).toHaveBeenCalledTimes(2)
    expect(messages(rerun.logger.info)[0]).toBe(
      `[SKIP] ligand exists -> ${path.join(prepared, 'ATENOLOL.pdbqt')}`
    )

    await runPrepareLigands(makeStageContext(root, {}, { forceRebuild: true }))
    expect(runToolOrThrow).toHaveBeenCalledTimes(4)
  })

  it('fails with exit code 2 when no ligand was written', async () => {
    vi.mocked(runToolOrThrow).mockResolvedValue(undefined)
    const ctx = makeStageContext(root)
    await expect(runPrepareLigands(ctx)).rejects.toBeInstanceOf(NoArtifactsProducedError)
    expect(messages(ctx.logger.error)).toEqual([
      '[ERROR] No ligand written for ATENOLOL.pdb',
      '[ERROR] No ligand written for CAFFEINE.mol2'
    ])
  })

  it('skips files whose names cannot form a docking pair', async () => {
    fakePrepareLigand()
    await fs.outputFile(path.join(ligands, 'BAD__NAME.sdf'), '')
    const ctx = makeStageContext(root)
    await runPrepareLigands(ctx)
    expect(runToolOrThrow).toHaveBeenCalledTimes(2)
    expect(messages(ctx.logger.error)).toEqual([
      '[ERROR] Unusable file name, skipping: BAD__NAME.sdf'
    ])
  })
})
