import { encodeSlug, projectSlug, splitProjectSlug } from '../../core/slug.ts'
import type { Transport } from '../../core/transport.ts'
import type { TProjectOptions } from '../../core/types.ts'
import type {
  TFollowedProject,
  TFollowProjectResponse,
  TJsonObject,
  TProject,
} from '../../types/api.ts'

export type TProjectsApiOptions = {
  transport: Transport
}

/** Thin HTTP client over the project endpoints. */
export class ProjectsApi {
  private transport: Transport

  constructor(options: TProjectsApiOptions) {
    this.transport = options.transport
  }

  /** @param slug - project slug such as `gh/acme/api` */
  public async getProject(slug: string, signal?: AbortSignal): Promise<TProject> {
    splitProjectSlug(slug)
    return await this.transport.request<TProject>('GET', `project/${encodeSlug(slug)}`, {
      apiVersion: 'v2',
      signal,
    })
  }

  /** Projects the user follows. */
  public async getProjects(signal?: AbortSignal): Promise<TFollowedProject[]> {
    return await this.transport.request<TFollowedProject[]>('GET', 'projects', { signal })
  }

  public async followProject(
    org: string,
    repo: string,
    options: TProjectOptions = {},
  ): Promise<TFollowProjectResponse> {
    const slug = encodeSlug(projectSlug(org, repo, options.vcsType))
    return await this.transport.request<TFollowProjectResponse>(
      'POST',
      `project/${slug}/follow`,
      { signal: options.signal },
    )
  }

  /** Advanced settings of a project. */
  public async getProjectSettings(
    org: string,
    repo: string,
    options: TProjectOptions = {},
  ): Promise<TJsonObject> {
    const slug = encodeSlug(projectSlug(org, repo, options.vcsType))
    return await this.transport.request<TJsonObject>('GET', `project/${slug}/settings`, {
      signal: options.signal,
    })
  }

  /** Updates advanced settings; `settings` takes the shape `getProjectSettings` returns. */
  public async updateProjectSettings(
    org: string,
    repo: string,
    settings: TJsonObject,
    options: TProjectOptions = {},
  ): Promise<TJsonObject> {
    const slug = encodeSlug(projectSlug(org, repo, options.vcsType))
    return await this.transport.request<TJsonObject>('PUT', `project/${slug}/settings`, {
      body: settings,
      signal: options.signal,
    })
  }
}
