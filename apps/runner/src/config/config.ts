import dotenv from 'dotenv'
import fs from 'fs-extra'
import path from 'path'
import { fileURLToPath } from 'node:url'
import moment from 'moment-timezone'
import { parse as parseYaml } from 'yaml'
import { z, type ZodIssue } from 'zod'
import type {
  ArtifactDirectories,
  BoundingBox,
  BoxParams,
  EnvironmentTagEnum
} from '@dockrun/types'
import {
  ConfigError,
  getErrorMessage,
  type ConfigValidationIssue
} from '../helpers/errors.js'

dotenv.config()

const TRUTHY = ['1', 'true', 'True']

const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value)

const text = (fallback: string) =>
  z.preprocess(blankAsUndefined, z.string().default(fallback))

const optionalText = z.preprocess(blankAsUndefined, z.string().optional())

const flag = optionalText.transform(
  (value) => value !== undefined && TRUTHY.includes(value)
)

const positive = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().positive().default(fallback))

const EnvSchema = z
  .object({
    DOCKRUN_ROOT: optionalText,
    DOCKRUN_LOGS: optionalText,
    LOG_LEVEL: text('info'),
    LOG_TIMEZONE: text('UTC').refine((tz) => moment.tz.zone(tz) !== null, {
      message: 'Unknown timezone'
    }),
    FORCE_REBUILD: flag,
    LIGAND_ADD_FLAG: text('checkhydrogens'),
    RECEPTOR_CLEAN_FLAG: text('nphs_lps_waters'),
    VIZ_IGNORE_PY_CHECK: flag,
    MGLTOOLS_PYTHON: text('python2'),
    MGLTOOLS_UTILS_DIR: optionalText,
    VIZDOCK_PYTHON: text('python3'),
    VINA_BIN: text('vina'),
    SCRIPTS_DIR: optionalText,
    VINA_EXHAUSTIVENESS: z.preprocess(
      blankAsUndefined,
      z.coerce.number().int().positive().default(8)
    ),
    VINA_VERBOSITY: z.preprocess(
      blankAsUndefined,
      z.coerce.number().int().min(0).max(2).default(2)
    ),
    BOX_MARGIN: z.preprocess(
      blankAsUndefined,
      z.coerce.number().nonnegative().default(8)
    ),
    BOX_MIN_SIZE: positive(20),
    BOX_MAX_SIZE: positive(28),
    MANUAL_BOXES_FILE: optionalText,
    TARGETS_FILE: optionalText,
    RCSB_URL: z.preprocess(
      blankAsUndefined,
      z.string().url().default('https://files.rcsb.org/download')
    ),
    PUBCHEM_URL: z.preprocess(
      blankAsUndefined,
      z.string().url().default('https://pubchem.ncbi.nlm.nih.gov/rest/pug')
    )
  })
  .refine((env) => env.BOX_MIN_SIZE <= env.BOX_MAX_SIZE, {
    message: 'BOX_MIN_SIZE must not exceed BOX_MAX_SIZE',
    path: ['BOX_MIN_SIZE']
  })

const Vec3Schema = z.tuple([z.number(), z.number(), z.number()])
const SizeSchema = z.tuple([
  z.number().positive(),
  z.number().positive(),
  z.number().positive()
])

const ManualBoxesSchema = z.object({
  boxes: z
    .record(z.object({ center: Vec3Schema, size: SizeSchema }))
    .default({})
})

const TargetsSchema = z.object({
  // gene symbol -> PDB ID
  proteins: z.record(z.string().min(1)).default({}),
  ligands: z.array(z.string().min(1)).default([]),
  // biologics that have no small-molecule record to download
  antibodies: z.array(z.string().min(1)).default([])
})

export type DownloadTargets = z.infer<typeof TargetsSchema>

export interface PipelineConfig {
  rootDir: string
  logDir: string
  logLevel: string
  logTimezone: string
  templatesDir: string
  forceRebuild: boolean
  ligandAddFlag: string
  receptorCleanFlag: string
  vizIgnorePyCheck: boolean
  environments: Record<EnvironmentTagEnum, string>
  tools: {
    mgltoolsUtilsDir: string
    scriptsDir: string
  }
  docking: {
    exhaustiveness: number
    verbosity: number
  }
  box: BoxParams
  manualBoxes: Record<string, BoundingBox>
  dirs: {
    proteins: string
    ligands: string
    ligandsPdb: string
    results: string
    receptors: string
    preparedLigands: string
    dockingOutputs: string
    visualizations: string
  }
  artifacts: ArtifactDirectories
  files: {
    bindingCsv: string
    readme: string
  }
  targets: DownloadTargets
  download: {
    rcsbUrl: string
    pubchemUrl: string
  }
}

export interface ConfigOverrides {
  forceRebuild?: boolean
}

const toIssues = (issues: ZodIssue[], prefix: string[] = []) =>
  issues.map(
    (issue): ConfigValidationIssue => ({
      path: [...prefix, ...issue.path],
      message: issue.message
    })
  )

const deepFreeze = <T extends object>(obj: T): Readonly<T> => {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return Object.freeze(obj)
}

const readYamlFile = (file: string, required: boolean): unknown => {
  if (!fs.pathExistsSync(file)) {
    if (required) {
      throw new ConfigError(`Configuration file not found: ${file}`)
    }
    return {}
  }
  try {
    return parseYaml(fs.readFileSync(file, 'utf8')) ?? {}
  } catch (error) {
    throw new ConfigError(`Cannot parse ${file}: ${getErrorMessage(error)}`)
  }
}

const parseWith = <S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  source: string
): z.infer<S> => {
  const result = schema.safeParse(input)
  if (!result.success) {
    const issues = toIssues(result.error.issues, [source])
    throw new ConfigError(
      `Invalid configuration: ${issues.length} validation error(s)`,
      issues
    )
  }
  return result.data
}

const trimSlash = (url: string) => url.replace(/\/+$/, '')

/**
 * Builds the frozen pipeline configuration from environment variables and
 * the optional YAML files they point at. Throws ConfigError on any invalid
 * value; nothing is read from the environment after this returns.
 */
const loadConfig = (
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): Readonly<PipelineConfig> => {
  const vars = parseWith(EnvSchema, env, 'env')
  const rootDir = path.resolve(vars.DOCKRUN_ROOT ?? process.cwd())
  const fromRoot = (...parts: string[]) => path.resolve(rootDir, ...parts)

  const boxesFile = vars.MANUAL_BOXES_FILE
    ? fromRoot(vars.MANUAL_BOXES_FILE)
    : fromRoot('config', 'boxes.yml')
  const targetsFile = vars.TARGETS_FILE
    ? fromRoot(vars.TARGETS_FILE)
    : fromRoot('config', 'targets.yml')

  const manual = parseWith(
    ManualBoxesSchema,
    readYamlFile(boxesFile, vars.MANUAL_BOXES_FILE !== undefined),
    path.basename(boxesFile)
  )
  const targets = parseWith(
    TargetsSchema,
    readYamlFile(targetsFile, vars.TARGETS_FILE !== undefined),
    path.basename(targetsFile)
  )

  const manualBoxes: Record<string, BoundingBox> = {}
  for (const [receptor, entry] of Object.entries(manual.boxes)) {
    manualBoxes[receptor] = {
      center: entry.center,
      size: entry.size,
      provenance: 'manual'
    }
  }

  const dirs = {
    proteins: fromRoot('data', 'proteins'),
    ligands: fromRoot('data', 'ligands'),
    ligandsPdb: fromRoot('data', 'ligands_pdb'),
    results: fromRoot('results'),
    receptors: fromRoot('results', 'docking', 'receptors'),
    preparedLigands: fromRoot('results', 'docking', 'ligands'),
    dockingOutputs: fromRoot('results', 'docking', 'vina_outputs'),
    visualizations: fromRoot('results', 'visualizations')
  }

  const config: PipelineConfig = {
    rootDir,
    logDir: vars.DOCKRUN_LOGS ? fromRoot(vars.DOCKRUN_LOGS) : rootDir,
    logLevel: vars.LOG_LEVEL,
    logTimezone: vars.LOG_TIMEZONE,
    templatesDir: fileURLToPath(new URL('../../templates', import.meta.url)),
    forceRebuild: overrides.forceRebuild ?? vars.FORCE_REBUILD,
    ligandAddFlag: vars.LIGAND_ADD_FLAG,
    receptorCleanFlag: vars.RECEPTOR_CLEAN_FLAG,
    vizIgnorePyCheck: vars.VIZ_IGNORE_PY_CHECK,
    environments: {
      mgltools: vars.MGLTOOLS_PYTHON,
      vina: vars.VINA_BIN,
      vizdock: vars.VIZDOCK_PYTHON
    },
    tools: {
      mgltoolsUtilsDir: vars.MGLTOOLS_UTILS_DIR
        ? fromRoot(vars.MGLTOOLS_UTILS_DIR)
        : fromRoot('mgltools', 'Utilities24'),
      scriptsDir: vars.SCRIPTS_DIR
        ? fromRoot(vars.SCRIPTS_DIR)
        : fromRoot('scripts')
    },
    docking: {
      exhaustiveness: vars.VINA_EXHAUSTIVENESS,
      verbosity: vars.VINA_VERBOSITY
    },
    box: {
      margin: vars.BOX_MARGIN,
      minSize: vars.BOX_MIN_SIZE,
      maxSize: vars.BOX_MAX_SIZE
    },
    manualBoxes,
    dirs,
    artifacts: {
      structure: dirs.proteins,
      'ligand-source': dirs.ligands,
      'ligand-pdb': dirs.ligandsPdb,
      receptor: dirs.receptors,
      ligand: dirs.preparedLigands,
      pose: dirs.dockingOutputs,
      'docking-log': dirs.dockingOutputs
    },
    files: {
      bindingCsv: fromRoot('results', 'binding_energies.csv'),
      readme: fromRoot('results', 'README.md')
    },
    targets,
    download: {
      rcsbUrl: trimSlash(vars.RCSB_URL),
      pubchemUrl: trimSlash(vars.PUBCHEM_URL)
    }
  }

  return deepFreeze(config)
}

export { loadConfig }
