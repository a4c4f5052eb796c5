import { mkdtemp, readFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ConfigurationError } from '../../../src/core/errors.ts'
import { createTestClient } from '../../helpers/client.ts'
import { makeArtifact } from '../../helpers/factories.ts'

describe('CircleCI.artifacts', () => {
  let directory: string

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'circleci-artifacts-'))
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  it('lists the artifacts of a build', async () => {
    const { client, fetchMock } = createTestClient()
    const artifacts = [makeArtifact()]
    fetchMock.pushJson(artifacts)

    await expect(client.artifacts.getArtifacts('acme', 'api', 12)).resolves.toEqual(artifacts)
    expect(fetchMock.lastCall().url).toBe(
      'https://circleci.test/api/v1.1/project/github/acme/api/12/artifacts',
    )
  })

  it('reads the latest artifacts, completed builds by default', async () => {
    const { client, fetchMock } = createTestClient()
    fetchMock.pushJson([])
    fetchMock.pushJson([])

    await client.artifacts.getLatestArtifact('acme', 'api')
    await client.artifacts.getLatestArtifact('acme', 'api', {
      branch: 'main',
      statusFilter: 'failed',
    })

    expect(fetchMock.calls.map((call) => call.url)).toEqual([
      'https://circleci.test/api/v1.1/project/github/acme/api/latest/artifacts?filter=completed',
      'https://circleci.test/api/v1.1/project/github/acme/api/latest/artifacts' +
        '?filter=failed&branch=main',
    ])
  })

  it('downloads an artifact under its own file name', async () => {
    const { client, fetchMock } = createTestClient()
    fetchMock.push(new Response('<testsuite/>'))

    const path = await client.artifacts.downloadArtifact(
      'https://output.circle-artifacts.test/0/reports/junit%20results.xml',
      { destinationDirectory: directory },
    )

    expect(path).toBe(join(directory, 'junit results.xml'))
    await expect(readFile(path, 'utf8')).resolves.toBe('<testsuite/>')
    expect(fetchMock.lastCall().headers.get('circle-token')).toBe('test-token')
  })

  it('honors an explicit file name', async () => {
    const { client, fetchMock } = createTestClient()
    fetchMock.push(new Response('log'))

    const path = await client.artifacts.downloadArtifact(
      'https://output.circle-artifacts.test/0/build.log',
      { destinationDirectory: directory, filename: 'renamed.log' },
    )

    expect(path).toBe(join(directory, 'renamed.log'))
  })

  it('rejects a URL without a file name', async () => {
    const { client, fetchMock } = createTestClient()

    await expect(
      client.artifacts.downloadArtifact('https://output.circle-artifacts.test/', {
        destinationDirectory: directory,
      }),
    ).rejects.toBeInstanceOf(ConfigurationError)
    expect(fetchMock.fetch).not.toHaveBeenCalled()
  })
})
