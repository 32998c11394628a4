import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import { RegistryClient, encodePackageName } from './client.js'
import { startMockRegistry, type MockRegistry } from '../test-utils.js'

const LEFT_PAD = {
  name: 'left-pad',
  time: {
    created: '2014-03-01T00:00:00.000Z',
    '1.3.0': '2024-04-01T00:00:00.000Z',
  },
  versions: {
    '1.3.0': { description: 'String left pad' },
  },
}

describe('encodePackageName', () => {
  it('should keep plain names', () => {
    assert.equal(encodePackageName('left-pad'), 'left-pad')
  })

  it('should escape the slash of scoped names', () => {
    assert.equal(encodePackageName('@scope/pkg'), '@scope%2Fpkg')
  })
})

describe('RegistryClient', () => {
  let registry: MockRegistry

  before(async () => {
    registry = await startMockRegistry({
      '/left-pad': { status: 200, body: JSON.stringify(LEFT_PAD) },
      '/@scope%2Fpkg': { status: 200, body: JSON.stringify({ name: '@scope/pkg' }) },
      '/private-pkg': { status: 401, body: '{"error":"unauthorized"}' },
      '/broken': { status: 500, body: 'Internal Server Error' },
      '/busy': { status: 429, body: '{}' },
      '/garbled': { status: 200, body: '{"time": ' },
      '/array': { status: 200, body: '[1, 2, 3]' },
      '/slow': { status: 200, body: JSON.stringify(LEFT_PAD), delayMs: 500 },
    })
  })

  after(async () => {
    await registry.close()
  })

  it('should return parsed metadata on success', async () => {
    const client = new RegistryClient({ registryUrl: registry.url, token: 'test-token' })
    const result = await client.fetchPackage('left-pad')

    assert.equal(result.ok, true)
    if (result.ok) {
      assert.equal(result.metadata.name, 'left-pad')
      assert.deepEqual(result.metadata.time, LEFT_PAD.time)
      assert.deepEqual(result.metadata.versions, LEFT_PAD.versions)
    }
  })

  it('should send the bearer token and accept header', async () => {
    const client = new RegistryClient({ registryUrl: registry.url, token: 'test-token' })
    const seen = registry.requests.length
    await client.fetchPackage('left-pad')

    const request = registry.requests[seen]
    assert.equal(request.url, '/left-pad')
    assert.equal(request.headers['authorization'], 'Bearer test-token')
    assert.equal(request.headers['accept'], 'application/json')
  })

  it('should omit the authorization header without a token', async () => {
    const client = new RegistryClient({ registryUrl: registry.url })
    const seen = registry.requests.length
    await client.fetchPackage('left-pad')

    assert.equal(registry.requests[seen].headers['authorization'], undefined)
  })

  it('should ignore a trailing slash on the registry URL', async () => {
    const client = new RegistryClient({ registryUrl: `${registry.url}/` })
    const result = await client.fetchPackage('left-pad')
    assert.equal(result.ok, true)
  })

  it('should request scoped packages with an escaped slash', async () => {
    const client = new RegistryClient({ registryUrl: registry.url })
    const result = await client.fetchPackage('@scope/pkg')
    assert.equal(result.ok, true)
  })

  it('should report missing packages', async () => {
    const client = new RegistryClient({ registryUrl: registry.url })
    assert.deepEqual(await client.fetchPackage('does-not-exist'), {
      ok: false,
      error: 'Package not found',
    })
  })

  it('should report unauthorized requests', async () => {
    const client = new RegistryClient({ registryUrl: registry.url })
    assert.deepEqual(await client.fetchPackage('private-pkg'), {
      ok: false,
      error: 'Unauthorized: invalid registry token',
    })
  })

  it('should report rate limiting', async () => {
    const client = new RegistryClient({ registryUrl: registry.url })
    assert.deepEqual(await client.fetchPackage('busy'), {
      ok: false,
      error: 'Rate limit exceeded',
    })
  })

  it('should report other error statuses', async () => {
    const client = new RegistryClient({ registryUrl: registry.url })
    assert.deepEqual(await client.fetchPackage('broken'), {
      ok: false,
      error: 'Registry request failed with status 500',
    })
  })

  it('should report malformed JSON', async () => {
    const client = new RegistryClient({ registryUrl: registry.url })
    const result = await client.fetchPackage('garbled')

    assert.equal(result.ok, false)
    if (!result.ok) {
      assert.match(result.error, /^Failed to parse response: SyntaxError/)
    }
  })

  it('should reject documents that are not objects', async () => {
    const client = new RegistryClient({ registryUrl: registry.url })
    assert.deepEqual(await client.fetchPackage('array'), {
      ok: false,
      error: 'Failed to parse response: unexpected metadata shape',
    })
  })

  it('should time out slow responses', async () => {
    const client = new RegistryClient({ registryUrl: registry.url, timeoutMs: 50 })
    assert.deepEqual(await client.fetchPackage('slow'), {
      ok: false,
      error: 'Request timed out after 50ms',
    })
  })

  it('should report connection failures', async () => {
    const client = new RegistryClient({ registryUrl: 'http://127.0.0.1:1' })
    const result = await client.fetchPackage('left-pad')

    assert.equal(result.ok, false)
    if (!result.ok) {
      assert.match(result.error, /^Network error: /)
    }
  })

  it('should not send a request for an empty name', async () => {
    const client = new RegistryClient({ registryUrl: registry.url })
    const seen = registry.requests.length

    assert.deepEqual(await client.fetchPackage('  '), {
      ok: false,
      error: 'Package name must not be empty',
    })
    assert.equal(registry.requests.length, seen)
  })
})
