import { encodeSlug, projectSlug } from '../../core/slug.ts'
import type { Transport } from '../../core/transport.ts'
import type { TProjectOptions, TQueryParams } from '../../core/types.ts'
import { assertOneOf } from '../../core/utils.ts'
import type {
  TBuild,
  TBuildStatusFilter,
  TBuildSummary,
  TTestMetadata,
  TTriggerParameters,
} from '../../types/api.ts'

const BUILD_STATUS_FILTERS: readonly TBuildStatusFilter[] = [
  'completed',
  'successful',
  'failed',
  'running',
]

export type TBuildsApiOptions = {
  transport: Transport
}

export type TBuildListOptions = {
  /** Maximum 100, defaults to 30 */
  limit?: number
  /** Defaults to 0 */
  offset?: number
  /** Lighter payloads; only sent when true */
  shallow?: boolean
}

export type TBuildSummaryOptions = TProjectOptions &
  TBuildListOptions & {
    statusFilter?: TBuildStatusFilter
    /** Restricts the summary to one branch */
    branch?: string
  }

export type TRetryBuildOptions = TProjectOptions & {
  /** Rerun with SSH enabled */
  ssh?: boolean
}

export type TTriggerBuildOptions = TProjectOptions & {
  /** Defaults to master */
  branch?: string
  /** Mutually exclusive with `tag` */
  revision?: string
  /** Mutually exclusive with `revision` */
  tag?: string
  /** Ignored by CircleCI 2.0 projects */
  parallel?: number
  /** Extra build parameters merged into the request body */
  params?: TTriggerParameters
}

function listQuery(options: TBuildListOptions): TQueryParams {
  return {
    limit: options.limit ?? 30,
    offset: options.offset ?? 0,
    shallow: options.shallow ? true : undefined,
  }
}

/** Thin HTTP client over the v1.1 build endpoints. */
export class BuildsApi {
  private transport: Transport

  constructor(options: TBuildsApiOptions) {
    this.transport = options.transport
  }

  /** Summary of each of the last builds of one project, newest first. */
  public async getProjectBuildSummary(
    org: string,
    repo: string,
    options: TBuildSummaryOptions = {},
  ): Promise<TBuildSummary[]> {
    if (options.statusFilter !== undefined) {
      assertOneOf(options.statusFilter, BUILD_STATUS_FILTERS, 'status')
    }

    let path = `project/${encodeSlug(projectSlug(org, repo, options.vcsType))}`
    if (options.branch) path += `/tree/${encodeURIComponent(options.branch)}`

    return await this.transport.request<TBuildSummary[]>('GET', path, {
      queryString: { ...listQuery(options), filter: options.statusFilter },
      signal: options.signal,
    })
  }

  /** Summary of the most recent builds across all followed projects. */
  public async getRecentBuilds(
    options: TBuildListOptions & { signal?: AbortSignal } = {},
  ): Promise<TBuildSummary[]> {
    return await this.transport.request<TBuildSummary[]>('GET', 'recent-builds', {
      queryString: listQuery(options),
      signal: options.signal,
    })
  }

  public async getBuildInfo(
    org: string,
    repo: string,
    buildNumber: number,
    options: TProjectOptions = {},
  ): Promise<TBuild> {
    return await this.transport.request<TBuild>(
      'GET',
      this.buildPath(org, repo, buildNumber, options),
      { signal: options.signal },
    )
  }

  public async getTestMetadata(
    org: string,
    repo: string,
    buildNumber: number,
    options: TProjectOptions = {},
  ): Promise<TTestMetadata> {
    return await this.transport.request<TTestMetadata>(
      'GET',
      `${this.buildPath(org, repo, buildNumber, options)}/tests`,
      { signal: options.signal },
    )
  }

  public async retryBuild(
    org: string,
    repo: string,
    buildNumber: number,
    options: TRetryBuildOptions = {},
  ): Promise<TBuild> {
    const action = options.ssh ? 'ssh' : 'retry'
    return await this.transport.request<TBuild>(
      'POST',
      `${this.buildPath(org, repo, buildNumber, options)}/${action}`,
      { signal: options.signal },
    )
  }

  public async cancelBuild(
    org: string,
    repo: string,
    buildNumber: number,
    options: TProjectOptions = {},
  ): Promise<TBuild> {
    return await this.transport.request<TBuild>(
      'POST',
      `${this.buildPath(org, repo, buildNumber, options)}/cancel`,
      { signal: options.signal },
    )
  }

  /** Grants the token's user SSH access to a running build. */
  public async addSshUser(
    org: string,
    repo: string,
    buildNumber: number,
    options: TProjectOptions = {},
  ): Promise<TBuild> {
    return await this.transport.request<TBuild>(
      'POST',
      `${this.buildPath(org, repo, buildNumber, options)}/ssh-users`,
      { signal: options.signal },
    )
  }

  public async triggerBuild(
    org: string,
    repo: string,
    options: TTriggerBuildOptions = {},
  ): Promise<TBuildSummary> {
    const branch = options.branch ?? 'master'
    const body = {
      parallel: options.parallel ?? null,
      revision: options.revision ?? null,
      tag: options.tag ?? null,
      ...options.params,
    }
    const slug = encodeSlug(projectSlug(org, repo, options.vcsType))
    return await this.transport.request<TBuildSummary>(
      'POST',
      `project/${slug}/tree/${encodeURIComponent(branch)}`,
      { body, signal: options.signal },
    )
  }

  private buildPath(
    org: string,
    repo: string,
    buildNumber: number,
    options: TProjectOptions,
  ): string {
    const slug = encodeSlug(projectSlug(org, repo, options.vcsType))
    return `project/${slug}/${encodeURIComponent(String(buildNumber))}`
  }
}
