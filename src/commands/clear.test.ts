import { describe, it, beforeEach, afterEach } from 'node:test'
import assert from 'node:assert/strict'
import * as fs from 'fs/promises'
import * as path from 'path'
import { clearProgress } from './clear.js'
import { checkpointPathFor, saveCheckpoint } from '../progress/store.js'
import { createTestDir, createTestState, removeTestDir } from '../test-utils.js'

describe('clear command', () => {
  let testDir: string
  let inputPath: string
  let checkpointPath: string

  beforeEach(async () => {
    testDir = await createTestDir('clear-test-')
    inputPath = path.join(testDir, 'deps.xlsx')
    checkpointPath = checkpointPathFor(inputPath)
  })

  afterEach(async () => {
    await removeTestDir(testDir)
  })

  it('should leave the checkpoint in place on a dry run', async () => {
    await saveCheckpoint(checkpointPath, createTestState(['lodash']))

    assert.equal(
      await clearProgress(inputPath, true),
      `Would remove ${checkpointPath}`,
    )
    await fs.access(checkpointPath)
  })

  it('should remove the checkpoint', async () => {
    await saveCheckpoint(checkpointPath, createTestState(['lodash']))

    assert.equal(
      await clearProgress(inputPath, false),
      `Removed saved progress ${checkpointPath}`,
    )
    await assert.rejects(fs.access(checkpointPath))
  })

  it('should report when there is nothing to clear', async () => {
    assert.equal(
      await clearProgress(inputPath, false),
      `No saved progress for ${inputPath}`,
    )
    assert.equal(
      await clearProgress(inputPath, true),
      `No saved progress for ${inputPath}`,
    )
  })
})
