import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { runScanner } from './run.js'

describe('runScanner', () => {
  it('should return 1 when no command is given', async () => {
    assert.equal(await runScanner([]), 1)
  })

  it('should return 1 for an unknown command', async () => {
    assert.equal(await runScanner(['inventory']), 1)
  })

  it('should return 1 when scan is missing its input file', async () => {
    assert.equal(await runScanner(['scan']), 1)
  })
})
