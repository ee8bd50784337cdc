#!/usr/bin/env tsx
import { Command } from 'commander'
import {
  runBoxCommand,
  runExtractCommand,
  runPipelineCommand
} from './commands.js'

const program = new Command()

program
  .name('dockrun')
  .description('Receptor/ligand docking pipeline')
  .version('1.0.0')

program
  .command('pipeline')
  .description('Run every pipeline stage in order')
  .option('-f, --force', 'Rebuild artifacts that already exist')
  .action(async (options: { force?: boolean }) => {
    process.exitCode = await runPipelineCommand(options)
  })

program
  .command('extract')
  .description('Collect binding affinities from docking logs into a CSV')
  .argument('<dockingDir>', 'directory holding <receptor>__<ligand>.log files')
  .argument('<outputCsv>', 'CSV file to write')
  .action(async (dockingDir: string, outputCsv: string) => {
    process.exitCode = await runExtractCommand(dockingDir, outputCsv)
  })

program
  .command('box')
  .description('Print the docking search box for a receptor file')
  .argument('<receptorFile>', 'receptor PDB or PDBQT file')
  .option('-r, --receptor <id>', 'receptor identifier for manual box lookup')
  .action(async (receptorFile: string, options: { receptor?: string }) => {
    process.exitCode = await runBoxCommand(receptorFile, options)
  })

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
