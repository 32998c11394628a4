import * as fs from 'fs/promises'
import * as path from 'path'
import type { CommandModule } from 'yargs'
import { checkpointPathFor, removeCheckpoint } from '../progress/store.js'

interface ClearArgs {
  input: string
  'dry-run': boolean
}

/**
 * Delete the saved progress for an input file, or only report it when
 * `dryRun` is set
 */
export async function clearProgress(
  inputPath: string,
  dryRun: boolean,
): Promise<string> {
  const checkpointPath = checkpointPathFor(inputPath)

  if (dryRun) {
    try {
      await fs.access(checkpointPath)
      return `Would remove ${checkpointPath}`
    } catch {
      return `No saved progress for ${inputPath}`
    }
  }

  const removed = await removeCheckpoint(checkpointPath)
  return removed
    ? `Removed saved progress ${checkpointPath}`
    : `No saved progress for ${inputPath}`
}

export const clearCommand: CommandModule<{}, ClearArgs> = {
  command: 'clear <input>',
  describe: 'Delete saved scan progress so the next scan starts over',
  builder: yargs => {
    return yargs
      .positional('input', {
        describe: 'Package list the scan was started with',
        type: 'string',
        demandOption: true,
      })
      .option('dry-run', {
        alias: 'd',
        describe: 'Show what would be removed without actually removing',
        type: 'boolean',
        default: false,
      })
  },
  handler: async argv => {
    try {
      console.log(await clearProgress(path.resolve(argv.input), argv['dry-run']))
      process.exit(0)
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err)
      console.error(`Error: ${errorMessage}`)
      process.exit(1)
    }
  },
}
