import * as path from 'path'
import type { CommandModule } from 'yargs'
import { checkpointPathFor, loadCheckpoint } from '../progress/store.js'
import { summarizeScan, uniquePackages } from '../report/model.js'
import { warn } from '../utils.js'

interface StatusArgs {
  input: string
}

/**
 * Describe the saved progress for an input file
 */
export async function describeProgress(
  inputPath: string,
  onWarning: (message: string) => void = warn,
): Promise<string> {
  const checkpointPath = checkpointPathFor(inputPath)
  const state = await loadCheckpoint(checkpointPath, { onWarning })
  if (!state) {
    return `No saved progress for ${inputPath}`
  }

  const summary = summarizeScan(state)
  const remaining = uniquePackages(state.packages).length - summary.scanned
  return [
    `Saved progress: ${checkpointPath}`,
    `  Resolved:  ${summary.scanned}/${summary.total}`,
    `  Remaining: ${remaining}`,
    `  Failed:    ${summary.failed}`,
    `  Versions in window so far: ${summary.versionsFound}`,
  ].join('\n')
}

export const statusCommand: CommandModule<{}, StatusArgs> = {
  command: 'status <input>',
  describe: 'Show saved scan progress for an input file',
  builder: yargs => {
    return yargs.positional('input', {
      describe: 'Package list the scan was started with',
      type: 'string',
      demandOption: true,
    })
  },
  handler: async argv => {
    try {
      console.log(await describeProgress(path.resolve(argv.input)))
      process.exit(0)
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err)
      console.error(`Error: ${errorMessage}`)
      process.exit(1)
    }
  },
}
