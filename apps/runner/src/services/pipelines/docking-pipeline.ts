import path from 'path'
import type { Logger, PipelineReport } from '@dockrun/types'
import type { PipelineConfig } from '../../config/config.js'
import type { PipelineStage, StageContext } from '../../types/index.js'
import { ArtifactStore } from '../artifact-store.js'
import { StageSequencer } from '../sequencer.js'
import { runDownload } from '../functions/download-structures.js'
import { CONVERT_SCRIPT, runConvertLigands } from '../functions/convert-ligands.js'
import {
  PREPARE_RECEPTOR_SCRIPT,
  SPLIT_ALT_CONFS_SCRIPT,
  runPrepareReceptors
} from '../functions/prepare-receptors.js'
import {
  PREPARE_LIGAND_SCRIPT,
  runPrepareLigands
} from '../functions/prepare-ligands.js'
import { runDocking } from '../functions/docking.js'
import {
  collectDockingResults,
  runExtractResults
} from '../functions/extract-results.js'
import {
  CHECK_PACKAGES_SCRIPT,
  runCheckPackages
} from '../functions/check-packages.js'
import { VISUALIZE_SCRIPT, runVisualize } from '../functions/visualize.js'
import { createReadmeFile } from '../functions/create-readme-file.js'
import { getErrorMessage } from '../../helpers/errors.js'

const buildDockingStages = (config: Readonly<PipelineConfig>): PipelineStage[] => {
  const { dirs, tools } = config
  const mgltool = (script: string) => path.join(tools.mgltoolsUtilsDir, script)
  const helper = (script: string) => path.join(tools.scriptsDir, script)
  return [
    {
      name: 'download',
      description: 'Downloading protein and ligand data...',
      requiredInputs: [],
      outputs: [dirs.proteins, dirs.ligands],
      run: runDownload
    },
    {
      name: 'convert',
      description: 'Converting ligand SDF to PDB format...',
      environment: 'vizdock',
      requiredTools: [helper(CONVERT_SCRIPT)],
      requiredInputs: [dirs.ligands],
      outputs: [dirs.ligandsPdb],
      run: runConvertLigands
    },
    {
      name: 'prepare-receptors',
      description: 'Preparing receptors...',
      environment: 'mgltools',
      requiredTools: [mgltool(PREPARE_RECEPTOR_SCRIPT), mgltool(SPLIT_ALT_CONFS_SCRIPT)],
      requiredInputs: [dirs.proteins],
      outputs: [dirs.receptors],
      run: runPrepareReceptors
    },
    {
      name: 'prepare-ligands',
      description: 'Preparing ligands...',
      environment: 'mgltools',
      requiredTools: [mgltool(PREPARE_LIGAND_SCRIPT)],
      requiredInputs: [],
      outputs: [dirs.preparedLigands],
      run: runPrepareLigands
    },
    {
      name: 'docking',
      description: 'Running docking...',
      environment: 'vina',
      requiredInputs: [dirs.receptors, dirs.preparedLigands],
      outputs: [dirs.dockingOutputs],
      run: runDocking
    },
    {
      name: 'extract',
      description: 'Extracting results...',
      requiredInputs: [dirs.dockingOutputs],
      outputs: [config.files.bindingCsv],
      run: runExtractResults
    },
    {
      name: 'check-packages',
      description: 'Checking visualization packages...',
      environment: 'vizdock',
      requiredTools: [helper(CHECK_PACKAGES_SCRIPT)],
      requiredInputs: [],
      outputs: [],
      run: runCheckPackages
    },
    {
      name: 'visualize',
      description: 'Generating visualizations...',
      environment: 'vizdock',
      requiredTools: [helper(VISUALIZE_SCRIPT)],
      requiredInputs: [dirs.ligands, dirs.dockingOutputs],
      outputs: [dirs.visualizations],
      run: runVisualize
    }
  ]
}

export interface PipelineRunOptions {
  stages?: readonly PipelineStage[]
  signal?: AbortSignal
}

/**
 * Runs every docking stage in order and, when all succeed, writes the
 * results README. Returns the sequencer's report.
 */
const runDockingPipeline = async (
  config: Readonly<PipelineConfig>,
  logger: Logger,
  logFile: string,
  { stages = buildDockingStages(config), signal }: PipelineRunOptions = {}
): Promise<PipelineReport> => {
  const context: StageContext = {
    config,
    store: new ArtifactStore(config.artifacts, logger),
    logger,
    signal
  }
  const sequencer = new StageSequencer<StageContext>({
    environments: config.environments
  })
  const report = await sequencer.run(stages, context)

  if (report.finalState.state === 'completed') {
    try {
      const results = await collectDockingResults(config.dirs.dockingOutputs, logger)
      await createReadmeFile(config, report, results, logFile, logger)
    } catch (error) {
      logger.warn(`[WARN] Could not write results README: ${getErrorMessage(error)}`)
    }
  }
  return report
}

export { buildDockingStages, runDockingPipeline }
