import type { Transport } from '../../core/transport.ts'
import type { TPageOptions } from '../../core/types.ts'
import type {
  TMessageResponse,
  TRerunWorkflowResponse,
  TWorkflow,
  TWorkflowJob,
} from '../../types/api.ts'

export type TWorkflowsApiOptions = {
  transport: Transport
}

export type TRerunWorkflowOptions = {
  /** Job UUIDs to rerun */
  jobs?: string[]
  /** Rerun from the failed jobs; mutually exclusive with `jobs` */
  fromFailed?: boolean
  /** Sparse tree rerun; requires `jobs` */
  sparseTree?: boolean
  signal?: AbortSignal
}

/** Thin HTTP client over the v2 workflow endpoints. */
export class WorkflowsApi {
  private transport: Transport

  constructor(options: TWorkflowsApiOptions) {
    this.transport = options.transport
  }

  public async getWorkflow(workflowId: string, signal?: AbortSignal): Promise<TWorkflow> {
    return await this.transport.request<TWorkflow>('GET', this.workflowPath(workflowId), {
      apiVersion: 'v2',
      signal,
    })
  }

  public async getWorkflowJobs(
    workflowId: string,
    options: TPageOptions = {},
  ): Promise<TWorkflowJob[]> {
    return await this.transport.requestItems<TWorkflowJob>(
      `${this.workflowPath(workflowId)}/job`,
      options,
    )
  }

  public async cancelWorkflow(
    workflowId: string,
    signal?: AbortSignal,
  ): Promise<TMessageResponse> {
    return await this.transport.request<TMessageResponse>(
      'POST',
      `${this.workflowPath(workflowId)}/cancel`,
      { apiVersion: 'v2', signal },
    )
  }

  public async rerunWorkflow(
    workflowId: string,
    options: TRerunWorkflowOptions = {},
  ): Promise<TRerunWorkflowResponse> {
    const body: { from_failed: boolean; sparse_tree: boolean; jobs?: string[] } = {
      from_failed: options.fromFailed ?? false,
      sparse_tree: options.sparseTree ?? false,
    }
    if (options.jobs && options.jobs.length > 0) body.jobs = options.jobs

    return await this.transport.request<TRerunWorkflowResponse>(
      'POST',
      `${this.workflowPath(workflowId)}/rerun`,
      { apiVersion: 'v2', body, signal: options.signal },
    )
  }

  /** Approves a pending approval job; `approvalRequestId` is the approval job's id. */
  public async approveJob(
    workflowId: string,
    approvalRequestId: string,
    signal?: AbortSignal,
  ): Promise<TMessageResponse> {
    return await this.transport.request<TMessageResponse>(
      'POST',
      `${this.workflowPath(workflowId)}/approve/${encodeURIComponent(approvalRequestId)}`,
      { apiVersion: 'v2', signal },
    )
  }

  private workflowPath(workflowId: string): string {
    return `workflow/${encodeURIComponent(workflowId)}`
  }
}
