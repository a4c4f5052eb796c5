import { encodeSlug, projectSlug } from '../../core/slug.ts'
import type { Transport } from '../../core/transport.ts'
import type { TPageOptions, TProjectOptions, TQueryParams } from '../../core/types.ts'
import type {
  TInsightsMetrics,
  TInsightsRun,
  TProjectBranches,
  TTestMetrics,
} from '../../types/api.ts'

export type TInsightsApiOptions = {
  transport: Transport
}

export type TInsightsQueryOptions = TProjectOptions & {
  /**
   * Passed through as query parameters,
   * e.g. `{ branch: 'main', 'reporting-window': 'last-7-days' }`
   */
  params?: TQueryParams
}

export type TInsightsListOptions = TInsightsQueryOptions & TPageOptions

/** Thin HTTP client over the v2 insights endpoints. */
export class InsightsApi {
  private transport: Transport

  constructor(options: TInsightsApiOptions) {
    this.transport = options.transport
  }

  /** Branches currently known to Insights for a project. */
  public async getProjectBranches(
    org: string,
    repo: string,
    options: TProjectOptions & { workflowName?: string } = {},
  ): Promise<TProjectBranches> {
    return await this.transport.request<TProjectBranches>(
      'GET',
      `${this.insightsPath(org, repo, options)}/branches`,
      {
        apiVersion: 'v2',
        queryString: { 'workflow-name': options.workflowName || undefined },
        signal: options.signal,
      },
    )
  }

  /** Summary metrics for each workflow of a project. */
  public async getProjectWorkflowsMetrics(
    org: string,
    repo: string,
    options: TInsightsListOptions = {},
  ): Promise<TInsightsMetrics[]> {
    return await this.list<TInsightsMetrics>(
      `${this.insightsPath(org, repo, options)}/workflows`,
      options,
    )
  }

  /** Recent runs of one workflow. */
  public async getProjectWorkflowMetrics(
    org: string,
    repo: string,
    workflowName: string,
    options: TInsightsListOptions = {},
  ): Promise<TInsightsRun[]> {
    return await this.list<TInsightsRun>(
      this.workflowPath(org, repo, workflowName, options),
      options,
    )
  }

  public async getProjectWorkflowTestMetrics(
    org: string,
    repo: string,
    workflowName: string,
    options: TInsightsQueryOptions = {},
  ): Promise<TTestMetrics> {
    return await this.transport.request<TTestMetrics>(
      'GET',
      `${this.workflowPath(org, repo, workflowName, options)}/test-metrics`,
      { apiVersion: 'v2', queryString: options.params, signal: options.signal },
    )
  }

  /** Summary metrics for each job of one workflow. */
  public async getProjectWorkflowJobsMetrics(
    org: string,
    repo: string,
    workflowName: string,
    options: TInsightsListOptions = {},
  ): Promise<TInsightsMetrics[]> {
    return await this.list<TInsightsMetrics>(
      `${this.workflowPath(org, repo, workflowName, options)}/jobs`,
      options,
    )
  }

  /** Recent runs of one job of a workflow. */
  public async getProjectWorkflowJobMetrics(
    org: string,
    repo: string,
    workflowName: string,
    jobName: string,
    options: TInsightsListOptions = {},
  ): Promise<TInsightsRun[]> {
    return await this.list<TInsightsRun>(
      `${this.workflowPath(org, repo, workflowName, options)}/jobs/${encodeURIComponent(jobName)}`,
      options,
    )
  }

  private async list<TItem>(path: string, options: TInsightsListOptions): Promise<TItem[]> {
    return await this.transport.requestItems<TItem>(path, {
      queryString: options.params,
      paginate: options.paginate,
      limit: options.limit,
      signal: options.signal,
    })
  }

  private insightsPath(org: string, repo: string, options: TProjectOptions): string {
    return `insights/${encodeSlug(projectSlug(org, repo, options.vcsType))}`
  }

  private workflowPath(
    org: string,
    repo: string,
    workflowName: string,
    options: TProjectOptions,
  ): string {
    return `${this.insightsPath(org, repo, options)}/workflows/${encodeURIComponent(workflowName)}`
  }
}
