import { encodeSlug, projectSlug } from '../../core/slug.ts'
import type { Transport } from '../../core/transport.ts'
import type { TProjectOptions } from '../../core/types.ts'
import type { TJob, TMessageResponse } from '../../types/api.ts'

export type TJobsApiOptions = {
  transport: Transport
}

/** Thin HTTP client over the v2 job endpoints. */
export class JobsApi {
  private transport: Transport

  constructor(options: TJobsApiOptions) {
    this.transport = options.transport
  }

  public async getJobDetails(
    org: string,
    repo: string,
    jobNumber: number,
    options: TProjectOptions = {},
  ): Promise<TJob> {
    return await this.transport.request<TJob>('GET', this.jobPath(org, repo, jobNumber, options), {
      apiVersion: 'v2',
      signal: options.signal,
    })
  }

  public async cancelJob(
    org: string,
    repo: string,
    jobNumber: number,
    options: TProjectOptions = {},
  ): Promise<TMessageResponse> {
    return await this.transport.request<TMessageResponse>(
      'POST',
      `${this.jobPath(org, repo, jobNumber, options)}/cancel`,
      { apiVersion: 'v2', signal: options.signal },
    )
  }

  private jobPath(org: string, repo: string, jobNumber: number, options: TProjectOptions): string {
    const slug = encodeSlug(projectSlug(org, repo, options.vcsType))
    return `project/${slug}/job/${encodeURIComponent(String(jobNumber))}`
  }
}
