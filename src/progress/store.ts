import * as fs from 'fs/promises'
import * as path from 'path'
import { CHECKPOINT_SUFFIX } from '../constants.js'
import {
  CHECKPOINT_FORMAT_VERSION,
  CheckpointSchema,
  type Checkpoint,
} from '../schema/checkpoint-schema.js'
import type { ScanState } from '../types.js'
import { errorMessage } from '../utils.js'

export interface SaveResult {
  success: boolean
  error?: string
}

export interface LoadOptions {
  /** Called when a checkpoint exists but cannot be used */
  onWarning?: (message: string) => void
}

/**
 * Where the checkpoint for an input file lives. The same input path always
 * maps to the same checkpoint, next to the input file.
 */
export function checkpointPathFor(inputPath: string): string {
  const resolved = path.resolve(inputPath)
  return path.join(
    path.dirname(resolved),
    `.${path.basename(resolved)}${CHECKPOINT_SUFFIX}`,
  )
}

export function serializeScanState(
  state: ScanState,
  now: Date = new Date(),
): Checkpoint {
  return {
    version: CHECKPOINT_FORMAT_VERSION,
    packages: [...state.packages],
    scanned: [...state.resolved],
    results: Object.fromEntries(state.results),
    updatedAt: now.toISOString(),
  }
}

/**
 * Rebuild a scan state from a parsed checkpoint.
 * Names outside the package list, repeated names and names without a
 * result are dropped.
 */
export function deserializeCheckpoint(checkpoint: Checkpoint): ScanState {
  const known = new Set(checkpoint.packages)
  const resolved: string[] = []
  const results: ScanState['results'] = new Map()

  for (const name of checkpoint.scanned) {
    if (
      !known.has(name) ||
      results.has(name) ||
      !Object.hasOwn(checkpoint.results, name)
    ) {
      continue
    }
    resolved.push(name)
    results.set(name, checkpoint.results[name])
  }

  return { packages: [...checkpoint.packages], resolved, results }
}

/**
 * Replace the checkpoint file with the given state. The content goes to a
 * sibling temp file first and is renamed over the checkpoint.
 * Never throws; a failed write is returned to the caller.
 */
export async function saveCheckpoint(
  filePath: string,
  state: ScanState,
): Promise<SaveResult> {
  try {
    const content = JSON.stringify(serializeScanState(state), null, 2)
    const tempPath = `${filePath}.tmp`
    await fs.writeFile(tempPath, content + '\n', 'utf-8')
    await fs.rename(tempPath, filePath)
    return { success: true }
  } catch (err) {
    return { success: false, error: errorMessage(err) }
  }
}

/**
 * Read a checkpoint. Missing files and unusable content both yield null.
 */
export async function loadCheckpoint(
  filePath: string,
  options: LoadOptions = {},
): Promise<ScanState | null> {
  let content: string
  try {
    content = await fs.readFile(filePath, 'utf-8')
  } catch (err) {
    if (isMissingFile(err)) return null
    options.onWarning?.(`Could not read checkpoint ${filePath}: ${errorMessage(err)}`)
    return null
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    options.onWarning?.(`Ignoring malformed checkpoint ${filePath}: ${errorMessage(err)}`)
    return null
  }

  const result = CheckpointSchema.safeParse(parsed)
  if (!result.success) {
    options.onWarning?.(
      `Ignoring invalid checkpoint ${filePath}: ${result.error.issues[0]?.message ?? 'unknown error'}`,
    )
    return null
  }
  return deserializeCheckpoint(result.data)
}

/**
 * Delete the checkpoint. Returns true if a file was removed.
 */
export async function removeCheckpoint(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath)
    return true
  } catch (err) {
    if (isMissingFile(err)) return false
    throw err
  }
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  )
}

/**
 * Checkpoint persistence as seen by the scan coordinator
 */
export interface CheckpointStore {
  save(state: ScanState): Promise<SaveResult>
  remove(): Promise<void>
}

export function createFileCheckpointStore(filePath: string): CheckpointStore {
  return {
    save: state => saveCheckpoint(filePath, state),
    remove: async () => {
      await removeCheckpoint(filePath)
    },
  }
}
