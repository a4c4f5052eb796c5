import { writeFile } from 'fs/promises'
import { join } from 'path'
import { ConfigurationError } from '../../core/errors.ts'
import { encodeSlug, projectSlug } from '../../core/slug.ts'
import type { Transport } from '../../core/transport.ts'
import type { TProjectOptions } from '../../core/types.ts'
import { assertOneOf } from '../../core/utils.ts'
import type { TArtifact, TBuildStatusFilter } from '../../types/api.ts'

type TLatestArtifactFilter = Exclude<TBuildStatusFilter, 'running'>

const LATEST_ARTIFACT_FILTERS: readonly TLatestArtifactFilter[] = [
  'completed',
  'successful',
  'failed',
]

export type TArtifactsApiOptions = {
  transport: Transport
}

export type TLatestArtifactOptions = TProjectOptions & {
  /** Latest build of the whole project when omitted */
  branch?: string
  /** Defaults to `completed` */
  statusFilter?: TLatestArtifactFilter
}

export type TDownloadArtifactOptions = {
  /** Defaults to the current working directory */
  destinationDirectory?: string
  /** Defaults to the last path segment of the artifact URL */
  filename?: string
  signal?: AbortSignal
}

/** Thin HTTP client over the build artifact endpoints. */
export class ArtifactsApi {
  private transport: Transport

  constructor(options: TArtifactsApiOptions) {
    this.transport = options.transport
  }

  public async getArtifacts(
    org: string,
    repo: string,
    buildNumber: number,
    options: TProjectOptions = {},
  ): Promise<TArtifact[]> {
    const slug = encodeSlug(projectSlug(org, repo, options.vcsType))
    return await this.transport.request<TArtifact[]>(
      'GET',
      `project/${slug}/${encodeURIComponent(String(buildNumber))}/artifacts`,
      { signal: options.signal },
    )
  }

  /**
   * Artifacts of the latest build matching the filter.
   * CircleCI answers 404 instead of an empty list when that build has no artifacts.
   */
  public async getLatestArtifact(
    org: string,
    repo: string,
    options: TLatestArtifactOptions = {},
  ): Promise<TArtifact[]> {
    const statusFilter = options.statusFilter ?? 'completed'
    assertOneOf(statusFilter, LATEST_ARTIFACT_FILTERS, 'status')

    const slug = encodeSlug(projectSlug(org, repo, options.vcsType))
    return await this.transport.request<TArtifact[]>('GET', `project/${slug}/latest/artifacts`, {
      queryString: { filter: statusFilter, branch: options.branch || undefined },
      signal: options.signal,
    })
  }

  /** Downloads an artifact URL to disk and returns the written path. */
  public async downloadArtifact(
    url: string,
    options: TDownloadArtifactOptions = {},
  ): Promise<string> {
    let target: URL
    try {
      target = new URL(url)
    } catch {
      throw new ConfigurationError(`Invalid artifact URL: ${url}`)
    }

    const destinationDirectory = options.destinationDirectory ?? process.cwd()
    const filename = options.filename ?? decodeURIComponent(target.pathname.split('/').pop() ?? '')
    if (!filename) {
      throw new ConfigurationError(`Cannot derive a file name from artifact URL: ${url}`)
    }

    const content: Uint8Array = await this.transport.download(url, options.signal)
    const path = join(destinationDirectory, filename)
    await writeFile(path, content)
    return path
  }
}
