import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../../../src/core/errors.ts'
import type { TBuildSummaryOptions } from '../../../src/domains/builds/builds.api.ts'
import { createTestClient } from '../../helpers/client.ts'
import { makeBuildSummary } from '../../helpers/factories.ts'

describe('CircleCI.builds', () => {
  it('lists build summaries with the default window', async () => {
    const { client, fetchMock } = createTestClient()
    const builds = [makeBuildSummary(), makeBuildSummary()]
    fetchMock.pushJson(builds)

    await expect(client.builds.getProjectBuildSummary('acme', 'api')).resolves.toEqual(builds)
    expect(fetchMock.lastCall().url).toBe(
      'https://circleci.test/api/v1.1/project/github/acme/api?limit=30&offset=0',
    )
  })

  it('narrows the summary to a branch and status', async () => {
    const { client, fetchMock } = createTestClient()
    fetchMock.pushJson([])

    await client.builds.getProjectBuildSummary('acme', 'api', {
      branch: 'feature/x',
      statusFilter: 'failed',
      shallow: true,
      limit: 5,
    })

    expect(fetchMock.lastCall().url).toBe(
      'https://circleci.test/api/v1.1/project/github/acme/api/tree/feature%2Fx' +
        '?limit=5&offset=0&shallow=true&filter=failed',
    )
  })

  it('rejects an unknown status filter', async () => {
    const { client, fetchMock } = createTestClient()
    // options arriving from untyped input
    const options: TBuildSummaryOptions = JSON.parse('{"statusFilter": "pending"}')

    await expect(client.builds.getProjectBuildSummary('acme', 'api', options)).rejects.toThrow(
      ConfigurationError,
    )
    expect(fetchMock.fetch).not.toHaveBeenCalled()
  })

  it('reads recent builds, build info and test metadata', async () => {
    const { client, fetchMock } = createTestClient()
    fetchMock.pushJson([])
    fetchMock.pushJson(makeBuildSummary({ build_num: 42 }))
    fetchMock.pushJson({ tests: [] })

    await client.builds.getRecentBuilds({ offset: 30 })
    await client.builds.getBuildInfo('acme', 'api', 42)
    await client.builds.getTestMetadata('acme', 'api', 42)

    expect(fetchMock.calls.map((call) => call.url)).toEqual([
      'https://circleci.test/api/v1.1/recent-builds?limit=30&offset=30',
      'https://circleci.test/api/v1.1/project/github/acme/api/42',
      'https://circleci.test/api/v1.1/project/github/acme/api/42/tests',
    ])
  })

  it('retries, cancels and opens SSH on a build', async () => {
    const { client, fetchMock } = createTestClient()
    fetchMock.pushJson(makeBuildSummary())
    fetchMock.pushJson(makeBuildSummary())
    fetchMock.pushJson(makeBuildSummary())
    fetchMock.pushJson(makeBuildSummary())

    await client.builds.retryBuild('acme', 'api', 7)
    await client.builds.retryBuild('acme', 'api', 7, { ssh: true })
    await client.builds.cancelBuild('acme', 'api', 7)
    await client.builds.addSshUser('acme', 'api', 7)

    expect(fetchMock.calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      'POST https://circleci.test/api/v1.1/project/github/acme/api/7/retry',
      'POST https://circleci.test/api/v1.1/project/github/acme/api/7/ssh',
      'POST https://circleci.test/api/v1.1/project/github/acme/api/7/cancel',
      'POST https://circleci.test/api/v1.1/project/github/acme/api/7/ssh-users',
    ])
  })

  it('triggers a build on master with extra parameters', async () => {
    const { client, fetchMock } = createTestClient()
    fetchMock.pushJson(makeBuildSummary())

    await client.builds.triggerBuild('acme', 'api', { params: { RUN_EXTRA: 'yes' } })

    const call = fetchMock.lastCall()
    expect(call.url).toBe('https://circleci.test/api/v1.1/project/github/acme/api/tree/master')
    expect(call.body).toEqual({ parallel: null, revision: null, tag: null, RUN_EXTRA: 'yes' })
    expect(call.headers.get('authorization')).toBe(
      `Basic ${Buffer.from('test-token:').toString('base64')}`,
    )
  })
})
