import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../../../src/core/errors.ts'
import { createTestClient } from '../../helpers/client.ts'
import { makeContext, makePage } from '../../helpers/factories.ts'

describe('CircleCI.contexts', () => {
  it('lists the contexts of an org by owner slug', async () => {
    const { client, fetchMock } = createTestClient()
    const contexts = [makeContext()]
    fetchMock.pushJson(makePage(contexts))

    await expect(client.contexts.getContexts({ org: 'acme' })).resolves.toEqual(contexts)
    expect(fetchMock.lastCall().url).toBe(
      'https://circleci.test/api/v2/context?owner-type=organization&owner-slug=github%2Facme',
    )
  })

  it('lists the contexts of an owner id', async () => {
    const { client, fetchMock } = createTestClient()
    fetchMock.pushJson(makePage([]))

    await client.contexts.getContexts({ ownerId: 'owner-1', ownerType: 'account' })
    expect(fetchMock.lastCall().url).toBe(
      'https://circleci.test/api/v2/context?owner-type=account&owner-id=owner-1',
    )
  })

  it('requires an org or an owner id', async () => {
    const { client, fetchMock } = createTestClient()

    await expect(client.contexts.getContexts({})).rejects.toThrow(
      'A context owner needs either org or ownerId',
    )
    await expect(client.contexts.addContext('deploy', {})).rejects.toBeInstanceOf(
      ConfigurationError,
    )
    expect(fetchMock.fetch).not.toHaveBeenCalled()
  })

  it('creates, reads and deletes a context', async () => {
    const { client, fetchMock } = createTestClient()
    const context = makeContext({ id: 'ctx-1', name: 'deploy' })
    fetchMock.pushJson(context)
    fetchMock.pushJson(context)
    fetchMock.pushJson({ message: 'Context deleted.' })

    await client.contexts.addContext('deploy', { org: 'acme' })
    await client.contexts.getContext('ctx-1')
    await client.contexts.deleteContext('ctx-1')

    const [add, read, remove] = fetchMock.calls
    expect(add?.url).toBe('https://circleci.test/api/v2/context')
    expect(add?.body).toEqual({
      name: 'deploy',
      owner: { type: 'organization', slug: 'github/acme' },
    })
    expect(read?.url).toBe('https://circleci.test/api/v2/context/ctx-1')
    expect(remove?.method).toBe('DELETE')
  })

  it('manages context environment variables', async () => {
    const { client, fetchMock } = createTestClient()
    const envvar = { variable: 'API_KEY', context_id: 'ctx-1', created_at: '2024-01-01T00:00:00Z' }
    fetchMock.pushJson(makePage([envvar]))
    fetchMock.pushJson(envvar)
    fetchMock.pushJson({ message: 'Environment variable deleted.' })

    const envvars = await client.contexts.getContextEnvvars('ctx-1')
    await client.contexts.addContextEnvvar('ctx-1', 'API_KEY', 'test-secret')
    await client.contexts.deleteContextEnvvar('ctx-1', 'API_KEY')

    expect(envvars).toHaveLength(1)
    expect(fetchMock.calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      'GET https://circleci.test/api/v2/context/ctx-1/environment-variable',
      'PUT https://circleci.test/api/v2/context/ctx-1/environment-variable/API_KEY',
      'DELETE https://circleci.test/api/v2/context/ctx-1/environment-variable/API_KEY',
    ])
    expect(fetchMock.calls[1]?.body).toEqual({ value: 'test-secret' })
  })
})
